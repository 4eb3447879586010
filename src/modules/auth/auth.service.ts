import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import * as crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import {
  Account,
  AccountRole,
  AccountStatus,
} from '../../database/entities/account.entity';
import { ConstraintViolationError } from './exceptions/constraint-violation.error';
import { DomainException } from './exceptions/domain.exception';
import * as lifecycle from './lifecycle/account-lifecycle';
import { CredentialService } from './services/credential.service';
import { TokenService } from './services/token.service';
import { ACCOUNT_STORE, AccountStore } from './stores/account-store.interface';
import {
  AccountRegisteredEvent,
  AccountStatusChangedEvent,
  IdentityEvents,
  SingleUseTokenIssuedEvent,
} from './events/identity.events';
import {
  AccountList,
  AccountStatistics,
  AdminCreateAccountCommand,
  AdminUpdateAccountCommand,
  BulkAccountAction,
  BulkActionCommand,
  BulkActionFailure,
  BulkActionResult,
  AccountView,
  AuthResult,
  ExternalAuthResult,
  ExternalLoginCommand,
  ListAccountsQuery,
  LoginCommand,
  OperationOptions,
  RegisterCommand,
  RegistrationResult,
  UpdateProfileCommand,
} from './interfaces/identity.interfaces';

export const MIN_PASSWORD_LENGTH = 8;
/** bcrypt reads no further than this many bytes of its input. */
export const MAX_PASSWORD_BYTES = 72;
export const MAX_LIST_LIMIT = 100;
export const DEFAULT_LIST_LIMIT = 20;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const USERNAME_PATTERN = /^[a-z0-9_.-]{3,100}$/;
const USERNAME_ATTEMPTS = 5;

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function normalizeUsername(username: string): string {
  return username.trim().toLowerCase();
}

export function toAccountView(account: Account): AccountView {
  return {
    id: account.id,
    email: account.email,
    username: account.username,
    firstName: account.firstName,
    lastName: account.lastName,
    nickname: account.nickname,
    phone: account.phone,
    avatarUrl: account.avatarUrl,
    bio: account.bio,
    authProvider: account.authProvider,
    emailVerified: account.emailVerified,
    role: account.role,
    status: account.status,
    isActive: account.isActive,
    lastLoginAt: account.lastLoginAt,
    lastLoginIp: account.lastLoginIp,
    createdAt: account.createdAt,
    updatedAt: account.updatedAt,
    deletedAt: account.deletedAt,
  };
}

function profileOf(fields: lifecycle.AccountProfile): lifecycle.AccountProfile {
  return {
    firstName: fields.firstName,
    lastName: fields.lastName,
    nickname: fields.nickname,
    phone: fields.phone,
    avatarUrl: fields.avatarUrl,
    bio: fields.bio,
  };
}

/**
 * Registration, sign-in, single-use token flows and administrative status
 * changes. Every persisted mutation goes through the account lifecycle
 * functions first; failures surface as DomainException.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(ACCOUNT_STORE)
    private readonly accountStore: AccountStore,
    private readonly credentialService: CredentialService,
    private readonly tokenService: TokenService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async register(
    command: RegisterCommand,
    options: OperationOptions = {},
  ): Promise<RegistrationResult> {
    const email = this.validEmail(command.email);
    const username = this.validUsername(command.username);

    if (!command.password && !command.provider) {
      throw DomainException.validation(
        'Either a password or an identity provider is required',
        'credential_required',
      );
    }
    if (Boolean(command.provider) !== Boolean(command.providerId)) {
      throw DomainException.validation(
        'provider and providerId must be supplied together',
        'provider_pair',
      );
    }
    if (command.password !== undefined) {
      this.assertPasswordPolicy(command.password);
    }

    // 1. Uniqueness among live accounts
    if (await this.accountStore.existsByEmail(email)) {
      this.logger.warn(`Duplicate email registration attempt: ${email}`);
      throw DomainException.conflict(`Email already registered: ${email}`, 'email');
    }
    if (await this.accountStore.existsByUsername(username)) {
      throw DomainException.conflict(`Username already taken: ${username}`, 'username');
    }
    if (
      command.provider &&
      command.providerId &&
      (await this.accountStore.findByExternalIdentity(command.provider, command.providerId))
    ) {
      throw DomainException.conflict('External identity already registered', 'external_identity');
    }

    // 2. Hash outside the request path
    const passwordHash = command.password
      ? await this.credentialService.hash(command.password, options.signal)
      : null;
    options.signal?.throwIfAborted();

    // 3. Build the account in its initial lifecycle state
    const init = { id: uuidv4(), email, username, profile: command.profile };
    let verification: { value: string; expiresAt: Date } | null = null;
    let account: Account;
    if (command.provider && command.providerId) {
      account = lifecycle.createExternalAccount(
        init,
        { provider: command.provider, providerId: command.providerId },
        passwordHash,
      );
    } else if (passwordHash) {
      verification = this.tokenService.issueSingleUse('email_verification');
      account = lifecycle.createPasswordAccount(init, passwordHash, {
        token: verification.value,
        expiresAt: verification.expiresAt,
      });
    } else {
      throw DomainException.validation('A password is required', 'credential_required');
    }

    // 4. Persist; the store's unique indexes settle concurrent registrations
    const saved = await this.saveChecked(account);
    this.logger.log(`Account registered: ${saved.id} (${saved.email}) status=${saved.status}`);

    this.emit<AccountRegisteredEvent>(IdentityEvents.ACCOUNT_REGISTERED, {
      accountId: saved.id,
      email: saved.email,
      viaProvider: saved.authProvider !== null,
    });
    if (verification) {
      this.emit<SingleUseTokenIssuedEvent>(IdentityEvents.VERIFICATION_REQUESTED, {
        accountId: saved.id,
        email: saved.email,
        token: verification.value,
        expiresAt: verification.expiresAt,
      });
    }

    return { accountId: saved.id, email: saved.email, username: saved.username };
  }

  async login(command: LoginCommand, options: OperationOptions = {}): Promise<AuthResult> {
    const email = normalizeEmail(command.email);

    // 1. Find account; a soft-deleted one still answers so a correct password
    //    reports ACCOUNT_INACTIVE instead of INVALID_CREDENTIALS
    const account = await this.accountStore.findByEmail(email, { includeDeleted: true });
    if (!account) {
      this.logger.warn(`Failed login attempt for unknown email from IP: ${command.originAddress}`);
      throw DomainException.invalidCredentials();
    }
    if (!account.passwordHash) {
      this.logger.warn(`Password login attempted on provider-only account ${account.id}`);
      throw DomainException.invalidCredentials();
    }

    // 2. Verify password before revealing anything about account status
    const matches = await this.credentialService.verify(
      command.password,
      account.passwordHash,
      options.signal,
    );
    if (!matches) {
      this.logger.warn(
        `Failed login attempt for account ${account.id}: incorrect password from IP: ${command.originAddress}`,
      );
      throw DomainException.invalidCredentials();
    }

    // 3. Status gate
    if (account.status !== AccountStatus.ACTIVE) {
      this.logger.warn(`Login refused for account ${account.id} in status ${account.status}`);
      throw DomainException.accountInactive(account.status);
    }

    // 4. Record login and issue tokens
    lifecycle.recordLogin(account, command.originAddress);
    options.signal?.throwIfAborted();
    await this.accountStore.save(account);

    this.logger.log(`Successful login for account ${account.id} from IP: ${command.originAddress}`);
    return this.issueAuthResult(account.id);
  }

  /**
   * Sign-in through an identity provider. The first sighting of a
   * (provider, providerId) pair creates the account; when several first
   * sightings race, the store's unique index lets one insert win and the
   * others re-read the winner and continue as an ordinary login.
   */
  async externalLogin(command: ExternalLoginCommand): Promise<ExternalAuthResult> {
    const email = this.validEmail(command.email);
    if (!command.providerId) {
      throw DomainException.validation('providerId is required', 'provider_pair');
    }

    let account = await this.accountStore.findByExternalIdentity(
      command.provider,
      command.providerId,
    );
    let isNewAccount = false;

    if (!account) {
      const outcome = await this.createFromExternalIdentity(command, email);
      account = outcome.account;
      isNewAccount = outcome.created;
    }

    if (account.status !== AccountStatus.ACTIVE) {
      this.logger.warn(
        `External login refused for account ${account.id} in status ${account.status}`,
      );
      throw DomainException.accountInactive(account.status);
    }

    lifecycle.recordLogin(account, command.originAddress);
    await this.accountStore.save(account);

    this.logger.log(
      `External login (${command.provider}) for account ${account.id}, new=${isNewAccount}`,
    );
    return { ...this.issueAuthResult(account.id), isNewAccount };
  }

  async refresh(refreshToken: string): Promise<AuthResult> {
    const claims = this.tokenService.verifySigned(refreshToken, 'refresh');

    const account = await this.accountStore.findById(claims.sub);
    if (!account) {
      this.logger.warn(`Refresh token presented for unknown account ${claims.sub}`);
      throw DomainException.tokenInvalid('subject_unknown');
    }
    if (account.status !== AccountStatus.ACTIVE) {
      throw DomainException.accountInactive(account.status);
    }

    this.logger.log(`Tokens refreshed for account ${account.id}`);
    return this.issueAuthResult(account.id);
  }

  async changePassword(
    accountId: string,
    currentPassword: string,
    newPassword: string,
    options: OperationOptions = {},
  ): Promise<{ success: boolean }> {
    const account = await this.requireAccount(accountId);
    lifecycle.assertMutable(account, 'change_password');

    if (!account.passwordHash) {
      throw DomainException.noPasswordSet();
    }
    this.assertPasswordPolicy(newPassword);

    const matches = await this.credentialService.verify(
      currentPassword,
      account.passwordHash,
      options.signal,
    );
    if (!matches) {
      this.logger.warn(`Failed password change attempt for account: ${accountId}`);
      throw DomainException.invalidCredentials();
    }
    if (currentPassword === newPassword) {
      throw DomainException.validation(
        'New password must be different from current password',
        'password_unchanged',
      );
    }

    const passwordHash = await this.credentialService.hash(newPassword, options.signal);
    lifecycle.setPassword(account, passwordHash);
    options.signal?.throwIfAborted();
    await this.accountStore.save(account);

    this.logger.log(`Password changed successfully for account: ${accountId}`);
    return { success: true };
  }

  /**
   * Always acknowledges. Whether the address exists, has a password, or the
   * store failed is only visible in the logs.
   */
  async requestPasswordReset(email: string): Promise<{ acknowledged: true }> {
    try {
      const normalized = normalizeEmail(email);
      const account = EMAIL_PATTERN.test(normalized)
        ? await this.accountStore.findByEmail(normalized)
        : null;

      if (!account) {
        this.logger.log('Password reset requested for an unknown email');
      } else if (!account.passwordHash) {
        this.logger.log(`Password reset skipped for provider-only account ${account.id}`);
      } else {
        const reset = this.tokenService.issueSingleUse('password_reset');
        lifecycle.issuePasswordResetToken(account, reset.value, reset.expiresAt);
        await this.accountStore.save(account);

        this.logger.log(`Password reset token issued for account ${account.id}`);
        this.emit<SingleUseTokenIssuedEvent>(IdentityEvents.PASSWORD_RESET_REQUESTED, {
          accountId: account.id,
          email: account.email,
          token: reset.value,
          expiresAt: reset.expiresAt,
        });
      }
    } catch (error) {
      this.logger.error(
        'Password reset request could not be completed',
        error instanceof Error ? error.stack : String(error),
      );
    }

    return { acknowledged: true };
  }

  async confirmPasswordReset(
    token: string,
    newPassword: string,
    options: OperationOptions = {},
  ): Promise<{ success: boolean }> {
    this.assertPasswordPolicy(newPassword);

    const account = await this.tokenService.consumeSingleUse(token, 'password_reset');
    const passwordHash = await this.credentialService.hash(newPassword, options.signal);

    // Digest and token clearing land in the same save
    lifecycle.resetPassword(account, passwordHash);
    options.signal?.throwIfAborted();
    await this.accountStore.save(account);

    this.logger.log(`Password reset completed for account ${account.id}`);
    return { success: true };
  }

  async verifyEmail(token: string): Promise<{ verified: boolean }> {
    const account = await this.tokenService.consumeSingleUse(token, 'email_verification');
    const previous = account.status;

    lifecycle.verifyEmail(account);
    await this.accountStore.save(account);

    this.logger.log(`Email verified for account ${account.id} (${previous} -> ${account.status})`);
    if (previous !== account.status) {
      this.emitStatusChange(account, previous);
    }
    return { verified: true };
  }

  async resendEmailVerification(accountId: string): Promise<{ sent: true }> {
    const account = await this.requireAccount(accountId);
    if (account.emailVerified) {
      throw DomainException.illegalTransition(account.status, 'resend_verification');
    }

    const verification = this.tokenService.issueSingleUse('email_verification');
    lifecycle.issueVerificationToken(account, verification.value, verification.expiresAt);
    await this.accountStore.save(account);

    this.emit<SingleUseTokenIssuedEvent>(IdentityEvents.VERIFICATION_REQUESTED, {
      accountId: account.id,
      email: account.email,
      token: verification.value,
      expiresAt: verification.expiresAt,
    });
    return { sent: true };
  }

  async getAccount(accountId: string): Promise<AccountView> {
    return toAccountView(await this.requireAccount(accountId));
  }

  async updateProfile(accountId: string, command: UpdateProfileCommand): Promise<AccountView> {
    const account = await this.requireAccount(accountId);
    lifecycle.assertMutable(account, 'update_profile');

    await this.applyUsernameChange(account, command.username);
    const verification = await this.applyEmailChange(account, command.email);
    lifecycle.updateProfile(account, profileOf(command));

    const saved = await this.saveChecked(account);
    this.announceVerification(saved, verification);
    return toAccountView(saved);
  }

  async checkEmailAvailable(email: string): Promise<{ available: boolean }> {
    const normalized = this.validEmail(email);
    return { available: !(await this.accountStore.existsByEmail(normalized)) };
  }

  async checkUsernameAvailable(username: string): Promise<{ available: boolean }> {
    const normalized = this.validUsername(username);
    return { available: !(await this.accountStore.existsByUsername(normalized)) };
  }

  async listAccounts(query: ListAccountsQuery): Promise<AccountList> {
    const skip = Math.max(0, query.skip ?? 0);
    const limit = Math.min(MAX_LIST_LIMIT, Math.max(1, query.limit ?? DEFAULT_LIST_LIMIT));

    const page = await this.accountStore.search({
      search: query.search?.trim() || undefined,
      role: query.role,
      status: query.status,
      provider: query.provider,
      emailVerified: query.emailVerified,
      isActive: query.isActive,
      skip,
      limit,
    });

    return { items: page.items.map(toAccountView), total: page.total, skip, limit };
  }

  async getStatistics(): Promise<AccountStatistics> {
    const counts = await this.accountStore.countByStatus();
    return {
      totalAccounts: counts.total,
      pendingAccounts: counts[AccountStatus.PENDING],
      activeAccounts: counts[AccountStatus.ACTIVE],
      inactiveAccounts: counts[AccountStatus.INACTIVE],
      suspendedAccounts: counts[AccountStatus.SUSPENDED],
      deletedAccounts: counts[AccountStatus.DELETED],
      adminAccounts: counts.admins,
      verifiedAccounts: counts.verified,
      unverifiedAccounts: counts.total - counts.verified,
    };
  }

  async suspend(accountId: string, reason: string | null = null): Promise<AccountView> {
    return this.transition(accountId, (account) => lifecycle.suspend(account, reason), reason);
  }

  async activate(accountId: string): Promise<AccountView> {
    return this.transition(accountId, (account) => lifecycle.activate(account));
  }

  async deactivate(accountId: string): Promise<AccountView> {
    return this.transition(accountId, (account) => lifecycle.deactivate(account));
  }

  async softDelete(accountId: string): Promise<AccountView> {
    return this.transition(accountId, (account) => lifecycle.softDelete(account));
  }

  async promote(
    accountId: string,
    role: AccountRole.ADMIN | AccountRole.MODERATOR = AccountRole.ADMIN,
  ): Promise<AccountView> {
    const account = await this.requireAccount(accountId);
    lifecycle.changeRole(account, role);
    const saved = await this.accountStore.save(account);
    this.logger.log(`Account ${accountId} promoted to ${role}`);
    return toAccountView(saved);
  }

  async demote(accountId: string): Promise<AccountView> {
    const account = await this.requireAccount(accountId);
    lifecycle.changeRole(account, AccountRole.USER);
    const saved = await this.accountStore.save(account);
    this.logger.log(`Account ${accountId} demoted to ${AccountRole.USER}`);
    return toAccountView(saved);
  }

  /**
   * Administrator-created accounts skip email verification: no token is
   * issued and the account starts in the requested live status.
   */
  async createAccountByAdmin(command: AdminCreateAccountCommand): Promise<AccountView> {
    const email = this.validEmail(command.email);
    const username = this.validUsername(command.username);
    this.assertPasswordPolicy(command.password);

    if (await this.accountStore.existsByEmail(email)) {
      throw DomainException.conflict(`Email already registered: ${email}`, 'email');
    }
    if (await this.accountStore.existsByUsername(username)) {
      throw DomainException.conflict(`Username already taken: ${username}`, 'username');
    }

    const passwordHash = await this.credentialService.hash(command.password);
    const account = lifecycle.createProvisionedAccount(
      { id: uuidv4(), email, username, profile: command.profile },
      passwordHash,
      {
        role: command.role ?? AccountRole.USER,
        status: command.status ?? AccountStatus.ACTIVE,
        emailVerified: command.emailVerified ?? true,
      },
    );

    const saved = await this.saveChecked(account);
    this.logger.log(`Account ${saved.id} provisioned with status ${saved.status}`);
    this.emit<AccountRegisteredEvent>(IdentityEvents.ACCOUNT_REGISTERED, {
      accountId: saved.id,
      email: saved.email,
      viaProvider: false,
    });
    return toAccountView(saved);
  }

  /**
   * Edits identity, profile, role, status and the verified flag in one save.
   * Marking a PENDING account verified activates it, as a consumed token would.
   */
  async updateAccountByAdmin(
    accountId: string,
    command: AdminUpdateAccountCommand,
  ): Promise<AccountView> {
    const account = await this.requireAccount(accountId);
    lifecycle.assertMutable(account, 'admin_update');
    const previous = account.status;

    await this.applyUsernameChange(account, command.username);
    const verification = await this.applyEmailChange(account, command.email);
    lifecycle.updateProfile(account, profileOf(command));

    if (command.emailVerified === true && !account.emailVerified) {
      lifecycle.verifyEmail(account);
    } else if (command.emailVerified === false && account.emailVerified) {
      lifecycle.revokeEmailVerification(account);
    }
    if (command.role !== undefined && command.role !== account.role) {
      lifecycle.changeRole(account, command.role);
    }
    if (command.status !== undefined && command.status !== account.status) {
      lifecycle.setAdministeredStatus(account, command.status, null);
    }

    const saved = await this.saveChecked(account);
    this.logger.log(`Account ${accountId} updated by an administrator`);
    this.announceVerification(saved, verification);
    if (saved.status !== previous) {
      this.emitStatusChange(saved, previous);
    }
    return toAccountView(saved);
  }

  /**
   * Applies one administrative action to each id in turn. A DomainException
   * for one id is recorded and the batch carries on; any other error aborts.
   */
  async bulkAction(command: BulkActionCommand): Promise<BulkActionResult> {
    const succeeded: string[] = [];
    const failed: BulkActionFailure[] = [];

    for (const accountId of new Set(command.accountIds)) {
      try {
        await this.applyBulkAction(command.action, accountId, command.reason ?? null);
        succeeded.push(accountId);
      } catch (error) {
        if (!(error instanceof DomainException)) {
          throw error;
        }
        failed.push({
          accountId,
          kind: error.kind,
          reason: error.reason,
          message: error.message,
        });
      }
    }

    this.logger.log(
      `Bulk ${command.action}: ${succeeded.length} succeeded, ${failed.length} failed`,
    );
    return {
      action: command.action,
      successCount: succeeded.length,
      failedCount: failed.length,
      succeeded,
      failed,
    };
  }

  /**
   * Irreversible removal of the row. Not part of the status lifecycle.
   */
  async hardDelete(accountId: string): Promise<{ deleted: true }> {
    const removed = await this.accountStore.hardDelete(accountId);
    if (!removed) {
      throw DomainException.notFound();
    }
    this.logger.warn(`Account hard deleted: ${accountId}`);
    return { deleted: true };
  }

  private async transition(
    accountId: string,
    apply: (account: Account) => Account,
    reason: string | null = null,
  ): Promise<AccountView> {
    const account = await this.requireAccount(accountId);
    const previous = account.status;

    try {
      apply(account);
    } catch (error) {
      if (error instanceof DomainException) {
        this.logger.warn(`Rejected transition for account ${accountId}: ${error.message}`);
      }
      throw error;
    }

    const saved = await this.accountStore.save(account);
    this.logger.log(`Account ${accountId} status ${previous} -> ${saved.status}`);
    this.emitStatusChange(saved, previous, reason);
    return toAccountView(saved);
  }

  private async createFromExternalIdentity(
    command: ExternalLoginCommand,
    email: string,
  ): Promise<{ account: Account; created: boolean }> {
    const identity = { provider: command.provider, providerId: command.providerId };

    // A live local account already owns this email: link when its address is
    // verified and it has no identity yet, otherwise refuse.
    const holder = await this.accountStore.findByEmail(email);
    if (holder) {
      if (
        holder.authProvider === command.provider &&
        holder.authProviderId === command.providerId
      ) {
        // Created by a concurrent first sign-in since the lookup above
        return { account: holder, created: false };
      }
      if (holder.authProviderId !== null || !holder.emailVerified) {
        throw DomainException.conflict(`Email already registered: ${email}`, 'email');
      }
      if (holder.status !== AccountStatus.ACTIVE) {
        this.logger.warn(
          `External identity not linked to account ${holder.id} in status ${holder.status}`,
        );
        throw DomainException.accountInactive(holder.status);
      }
      lifecycle.linkExternalIdentity(holder, identity);
      try {
        const linked = await this.accountStore.save(holder);
        this.logger.log(`Linked ${command.provider} identity to account ${linked.id}`);
        return { account: linked, created: false };
      } catch (error) {
        return this.convergeOnExisting(command, error);
      }
    }

    const username = await this.pickUsername(
      command.profile?.username ?? email.split('@')[0],
    );
    const account = lifecycle.createExternalAccount(
      {
        id: uuidv4(),
        email,
        username,
        profile: profileOf(command.profile ?? {}),
      },
      identity,
    );

    try {
      const created = await this.accountStore.save(account);
      this.emit<AccountRegisteredEvent>(IdentityEvents.ACCOUNT_REGISTERED, {
        accountId: created.id,
        email: created.email,
        viaProvider: true,
      });
      return { account: created, created: true };
    } catch (error) {
      return this.convergeOnExisting(command, error);
    }
  }

  /**
   * Insert lost a race: whoever won owns the identity now. Any other
   * constraint is a genuine conflict.
   */
  private async convergeOnExisting(
    command: ExternalLoginCommand,
    error: unknown,
  ): Promise<{ account: Account; created: boolean }> {
    if (!(error instanceof ConstraintViolationError)) {
      throw error;
    }

    const winner = await this.accountStore.findByExternalIdentity(
      command.provider,
      command.providerId,
    );
    if (winner) {
      this.logger.log(
        `Concurrent first sign-in for ${command.provider} identity resolved to account ${winner.id}`,
      );
      return { account: winner, created: false };
    }

    throw DomainException.conflict(
      `Unique constraint violated: ${error.constraint}`,
      error.constraint,
    );
  }

  private applyBulkAction(
    action: BulkAccountAction,
    accountId: string,
    reason: string | null,
  ): Promise<AccountView> {
    switch (action) {
      case BulkAccountAction.ACTIVATE:
        return this.activate(accountId);
      case BulkAccountAction.DEACTIVATE:
        return this.deactivate(accountId);
      case BulkAccountAction.SUSPEND:
        return this.suspend(accountId, reason);
      case BulkAccountAction.DELETE:
        return this.softDelete(accountId);
      case BulkAccountAction.PROMOTE:
        return this.promote(accountId);
      case BulkAccountAction.DEMOTE:
        return this.demote(accountId);
    }
  }

  private async applyUsernameChange(account: Account, requested: string | undefined): Promise<void> {
    if (requested === undefined) {
      return;
    }
    const username = this.validUsername(requested);
    if (username === account.username) {
      return;
    }
    if (await this.accountStore.existsByUsername(username)) {
      throw DomainException.conflict(`Username already taken: ${username}`, 'username');
    }
    lifecycle.changeUsername(account, username);
  }

  /** Returns the verification token issued for the new address, if any. */
  private async applyEmailChange(
    account: Account,
    requested: string | undefined,
  ): Promise<{ value: string; expiresAt: Date } | null> {
    if (requested === undefined) {
      return null;
    }
    const email = this.validEmail(requested);
    if (email === account.email) {
      return null;
    }
    if (await this.accountStore.existsByEmail(email)) {
      throw DomainException.conflict(`Email already registered: ${email}`, 'email');
    }
    const verification = this.tokenService.issueSingleUse('email_verification');
    lifecycle.changeEmail(account, email, {
      token: verification.value,
      expiresAt: verification.expiresAt,
    });
    return verification;
  }

  /** Sends the token only while it is still the account's pending one. */
  private announceVerification(
    account: Account,
    verification: { value: string; expiresAt: Date } | null,
  ): void {
    if (!verification || account.emailVerificationToken !== verification.value) {
      return;
    }
    this.emit<SingleUseTokenIssuedEvent>(IdentityEvents.VERIFICATION_REQUESTED, {
      accountId: account.id,
      email: account.email,
      token: verification.value,
      expiresAt: verification.expiresAt,
    });
  }

  private async pickUsername(seed: string): Promise<string> {
    let base = normalizeUsername(seed).replace(/[^a-z0-9_.-]/g, '').slice(0, 90);
    if (base.length < 3) {
      base = `user${base}`;
    }

    let candidate = base;
    for (let attempt = 0; attempt < USERNAME_ATTEMPTS; attempt++) {
      if (!(await this.accountStore.existsByUsername(candidate))) {
        return candidate;
      }
      candidate = `${base}_${crypto.randomBytes(2).toString('hex')}`;
    }
    throw DomainException.conflict('Could not allocate a unique username', 'username');
  }

  private async saveChecked(account: Account): Promise<Account> {
    try {
      return await this.accountStore.save(account);
    } catch (error) {
      if (error instanceof ConstraintViolationError) {
        this.logger.warn(`Save rejected by unique constraint ${error.constraint}`);
        throw DomainException.conflict(
          `Unique constraint violated: ${error.constraint}`,
          error.constraint,
        );
      }
      throw error;
    }
  }

  private async requireAccount(accountId: string): Promise<Account> {
    const account = await this.accountStore.findById(accountId);
    if (!account) {
      throw DomainException.notFound();
    }
    return account;
  }

  private issueAuthResult(accountId: string): AuthResult {
    return {
      accessToken: this.tokenService.issueAccess(accountId),
      refreshToken: this.tokenService.issueRefresh(accountId),
      tokenType: 'bearer',
      expiresInSeconds: this.tokenService.accessTtlSeconds,
    };
  }

  private assertPasswordPolicy(password: string): void {
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw DomainException.validation(
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
        'password_too_short',
      );
    }
    if (Buffer.byteLength(password, 'utf8') > MAX_PASSWORD_BYTES) {
      throw DomainException.validation(
        `Password must be at most ${MAX_PASSWORD_BYTES} bytes long`,
        'password_too_long',
      );
    }
  }

  private validEmail(email: string): string {
    const normalized = normalizeEmail(email);
    if (!EMAIL_PATTERN.test(normalized)) {
      throw DomainException.validation('Invalid email format', 'email_format');
    }
    return normalized;
  }

  private validUsername(username: string): string {
    const normalized = normalizeUsername(username);
    if (!USERNAME_PATTERN.test(normalized)) {
      throw DomainException.validation(
        'Username must be 3-100 characters of letters, digits, dot, dash or underscore',
        'username_format',
      );
    }
    return normalized;
  }

  private emitStatusChange(account: Account, from: string, reason: string | null = null): void {
    this.emit<AccountStatusChangedEvent>(IdentityEvents.STATUS_CHANGED, {
      accountId: account.id,
      from,
      to: account.status,
      reason,
    });
  }

  private emit<T>(event: string, payload: T): void {
    this.eventEmitter.emit(event, payload);
  }
}
