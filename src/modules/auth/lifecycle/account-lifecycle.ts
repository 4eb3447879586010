import {
  Account,
  AccountRole,
  AccountStatus,
  AuthProvider,
} from '../../../database/entities/account.entity';
import { DomainException } from '../exceptions/domain.exception';

export enum LifecycleEvent {
  VERIFY_EMAIL = 'verify_email',
  ACTIVATE = 'activate',
  DEACTIVATE = 'deactivate',
  SUSPEND = 'suspend',
  SOFT_DELETE = 'soft_delete',
}

type TransitionMap = Partial<Record<AccountStatus, AccountStatus>>;

const NON_TERMINAL: AccountStatus[] = [
  AccountStatus.PENDING,
  AccountStatus.ACTIVE,
  AccountStatus.INACTIVE,
  AccountStatus.SUSPENDED,
];

const toSingleTarget = (
  from: AccountStatus[],
  to: AccountStatus,
): TransitionMap =>
  from.reduce<TransitionMap>((map, status) => ({ ...map, [status]: to }), {});

/**
 * Status transitions by event: from -> to. A status missing from an event's
 * map means the event is rejected in that status. DELETED appears in no map.
 *
 * VERIFY_EMAIL only moves PENDING; on the other live statuses it sets the
 * verified flag and leaves the status alone.
 */
export const ACCOUNT_TRANSITIONS: Record<LifecycleEvent, TransitionMap> = {
  [LifecycleEvent.VERIFY_EMAIL]: {
    [AccountStatus.PENDING]: AccountStatus.ACTIVE,
    [AccountStatus.ACTIVE]: AccountStatus.ACTIVE,
    [AccountStatus.INACTIVE]: AccountStatus.INACTIVE,
    [AccountStatus.SUSPENDED]: AccountStatus.SUSPENDED,
  },
  [LifecycleEvent.ACTIVATE]: toSingleTarget(
    [AccountStatus.ACTIVE, AccountStatus.INACTIVE, AccountStatus.SUSPENDED],
    AccountStatus.ACTIVE,
  ),
  [LifecycleEvent.DEACTIVATE]: toSingleTarget(
    [AccountStatus.ACTIVE, AccountStatus.INACTIVE, AccountStatus.SUSPENDED],
    AccountStatus.INACTIVE,
  ),
  [LifecycleEvent.SUSPEND]: toSingleTarget(NON_TERMINAL, AccountStatus.SUSPENDED),
  [LifecycleEvent.SOFT_DELETE]: toSingleTarget(NON_TERMINAL, AccountStatus.DELETED),
};

export function canTransition(status: AccountStatus, event: LifecycleEvent): boolean {
  return ACCOUNT_TRANSITIONS[event][status] !== undefined;
}

function nextStatus(account: Account, event: LifecycleEvent): AccountStatus {
  const target = ACCOUNT_TRANSITIONS[event][account.status];
  if (target === undefined) {
    throw DomainException.illegalTransition(account.status, event);
  }
  return target;
}

/**
 * Guards every mutation that is not itself a status transition (password,
 * profile, login bookkeeping, token issue, role change).
 */
export function assertMutable(account: Account, action: string): void {
  if (account.status === AccountStatus.DELETED || account.deletedAt !== null) {
    throw DomainException.illegalTransition(AccountStatus.DELETED, action);
  }
}

function touch(account: Account, now: Date): Account {
  account.updatedAt = now;
  return account;
}

export interface AccountProfile {
  firstName?: string | null;
  lastName?: string | null;
  nickname?: string | null;
  phone?: string | null;
  avatarUrl?: string | null;
  bio?: string | null;
}

export interface NewAccount {
  id: string;
  email: string;
  username: string;
  profile?: AccountProfile;
}

function blankAccount(init: NewAccount, now: Date): Account {
  const account = new Account();
  account.id = init.id;
  account.email = init.email;
  account.username = init.username;
  account.passwordHash = null;
  account.authProvider = null;
  account.authProviderId = null;
  account.firstName = init.profile?.firstName ?? null;
  account.lastName = init.profile?.lastName ?? null;
  account.nickname = init.profile?.nickname ?? null;
  account.phone = init.profile?.phone ?? null;
  account.avatarUrl = init.profile?.avatarUrl ?? null;
  account.bio = init.profile?.bio ?? null;
  account.emailVerified = false;
  account.emailVerificationToken = null;
  account.emailVerificationExpiresAt = null;
  account.passwordResetToken = null;
  account.passwordResetExpiresAt = null;
  account.role = AccountRole.USER;
  account.status = AccountStatus.PENDING;
  account.suspensionReason = null;
  account.isActive = true;
  account.lastLoginAt = null;
  account.lastLoginIp = null;
  account.createdAt = now;
  account.updatedAt = now;
  account.deletedAt = null;
  return account;
}

/** Password registration: PENDING until the email is verified. */
export function createPasswordAccount(
  init: NewAccount,
  passwordHash: string,
  verification: { token: string; expiresAt: Date },
  now = new Date(),
): Account {
  const account = blankAccount(init, now);
  account.passwordHash = passwordHash;
  account.emailVerificationToken = verification.token;
  account.emailVerificationExpiresAt = verification.expiresAt;
  return account;
}

/** First sighting of an external identity: ACTIVE and verified. */
export function createExternalAccount(
  init: NewAccount,
  identity: { provider: AuthProvider; providerId: string },
  passwordHash: string | null = null,
  now = new Date(),
): Account {
  const account = blankAccount(init, now);
  account.passwordHash = passwordHash;
  account.authProvider = identity.provider;
  account.authProviderId = identity.providerId;
  account.emailVerified = true;
  account.status = AccountStatus.ACTIVE;
  return account;
}

/** Statuses an administrator may assign directly. */
export type AdministeredStatus =
  | AccountStatus.ACTIVE
  | AccountStatus.INACTIVE
  | AccountStatus.SUSPENDED;

/**
 * Administrator provisioning: no verification token is issued and the
 * account starts ACTIVE, then moves to the requested status through the
 * transition table.
 */
export function createProvisionedAccount(
  init: NewAccount,
  passwordHash: string,
  settings: { role: AccountRole; status: AdministeredStatus; emailVerified: boolean },
  now = new Date(),
): Account {
  const account = blankAccount(init, now);
  account.passwordHash = passwordHash;
  account.role = settings.role;
  account.emailVerified = settings.emailVerified;
  account.status = AccountStatus.ACTIVE;
  if (settings.status !== AccountStatus.ACTIVE) {
    setAdministeredStatus(account, settings.status, null, now);
  }
  return account;
}

export function verifyEmail(account: Account, now = new Date()): Account {
  account.status = nextStatus(account, LifecycleEvent.VERIFY_EMAIL);
  account.emailVerified = true;
  account.emailVerificationToken = null;
  account.emailVerificationExpiresAt = null;
  return touch(account, now);
}

export function activate(account: Account, now = new Date()): Account {
  account.status = nextStatus(account, LifecycleEvent.ACTIVATE);
  account.isActive = true;
  account.suspensionReason = null;
  return touch(account, now);
}

export function deactivate(account: Account, now = new Date()): Account {
  account.status = nextStatus(account, LifecycleEvent.DEACTIVATE);
  account.isActive = false;
  account.suspensionReason = null;
  return touch(account, now);
}

export function suspend(account: Account, reason: string | null, now = new Date()): Account {
  account.status = nextStatus(account, LifecycleEvent.SUSPEND);
  account.isActive = false;
  account.suspensionReason = reason;
  return touch(account, now);
}

export function setAdministeredStatus(
  account: Account,
  status: AdministeredStatus,
  reason: string | null,
  now = new Date(),
): Account {
  switch (status) {
    case AccountStatus.ACTIVE:
      return activate(account, now);
    case AccountStatus.INACTIVE:
      return deactivate(account, now);
    case AccountStatus.SUSPENDED:
      return suspend(account, reason, now);
  }
}

export function softDelete(account: Account, now = new Date()): Account {
  account.status = nextStatus(account, LifecycleEvent.SOFT_DELETE);
  account.isActive = false;
  account.deletedAt = now;
  account.emailVerificationToken = null;
  account.emailVerificationExpiresAt = null;
  account.passwordResetToken = null;
  account.passwordResetExpiresAt = null;
  return touch(account, now);
}

export function changeRole(account: Account, role: AccountRole, now = new Date()): Account {
  assertMutable(account, role === AccountRole.USER ? 'demote' : 'promote');
  account.role = role;
  return touch(account, now);
}

export function recordLogin(account: Account, originAddress: string | null, now = new Date()): Account {
  assertMutable(account, 'login');
  account.lastLoginAt = now;
  if (originAddress) {
    account.lastLoginIp = originAddress;
  }
  return touch(account, now);
}

export function setPassword(account: Account, passwordHash: string, now = new Date()): Account {
  assertMutable(account, 'change_password');
  account.passwordHash = passwordHash;
  return touch(account, now);
}

export function issueVerificationToken(
  account: Account,
  token: string,
  expiresAt: Date,
  now = new Date(),
): Account {
  assertMutable(account, 'issue_verification');
  account.emailVerificationToken = token;
  account.emailVerificationExpiresAt = expiresAt;
  return touch(account, now);
}

export function issuePasswordResetToken(
  account: Account,
  token: string,
  expiresAt: Date,
  now = new Date(),
): Account {
  assertMutable(account, 'issue_password_reset');
  account.passwordResetToken = token;
  account.passwordResetExpiresAt = expiresAt;
  return touch(account, now);
}

/** Consumes the reset token together with the new digest, in one mutation. */
export function resetPassword(account: Account, passwordHash: string, now = new Date()): Account {
  setPassword(account, passwordHash, now);
  account.passwordResetToken = null;
  account.passwordResetExpiresAt = null;
  return account;
}

/** Administrative reset of the verified flag; the status is untouched. */
export function revokeEmailVerification(account: Account, now = new Date()): Account {
  assertMutable(account, 'revoke_verification');
  account.emailVerified = false;
  return touch(account, now);
}

export function linkExternalIdentity(
  account: Account,
  identity: { provider: AuthProvider; providerId: string },
  now = new Date(),
): Account {
  assertMutable(account, 'link_identity');
  account.authProvider = identity.provider;
  account.authProviderId = identity.providerId;
  return touch(account, now);
}

export function updateProfile(account: Account, profile: AccountProfile, now = new Date()): Account {
  assertMutable(account, 'update_profile');
  if (profile.firstName !== undefined) account.firstName = profile.firstName;
  if (profile.lastName !== undefined) account.lastName = profile.lastName;
  if (profile.nickname !== undefined) account.nickname = profile.nickname;
  if (profile.phone !== undefined) account.phone = profile.phone;
  if (profile.avatarUrl !== undefined) account.avatarUrl = profile.avatarUrl;
  if (profile.bio !== undefined) account.bio = profile.bio;
  return touch(account, now);
}

export function changeUsername(account: Account, username: string, now = new Date()): Account {
  assertMutable(account, 'change_username');
  account.username = username;
  return touch(account, now);
}

/**
 * An email change drops verification; the status is left as it is so an
 * ACTIVE account stays usable while the new address is confirmed.
 */
export function changeEmail(
  account: Account,
  email: string,
  verification: { token: string; expiresAt: Date },
  now = new Date(),
): Account {
  assertMutable(account, 'change_email');
  account.email = email;
  account.emailVerified = false;
  account.emailVerificationToken = verification.token;
  account.emailVerificationExpiresAt = verification.expiresAt;
  return touch(account, now);
}
