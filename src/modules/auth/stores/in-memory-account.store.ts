import { Injectable } from '@nestjs/common';
import {
  Account,
  AccountRole,
  AccountStatus,
  AuthProvider,
} from '../../../database/entities/account.entity';
import { ConstraintViolationError } from '../exceptions/constraint-violation.error';
import {
  AccountCounts,
  AccountPage,
  AccountSearchFilter,
  AccountStore,
  FindOptions,
  SingleUsePurpose,
} from './account-store.interface';

const clone = (account: Account): Account => Object.assign(new Account(), account);

const isLive = (account: Account): boolean => account.deletedAt === null;

/**
 * Process-local AccountStore. Applies the same live-row uniqueness rules as
 * the Postgres partial indexes; every call yields once so concurrent callers
 * interleave the way they would against a real database.
 */
@Injectable()
export class InMemoryAccountStore implements AccountStore {
  private readonly rows = new Map<string, Account>();

  async save(account: Account): Promise<Account> {
    await Promise.resolve();

    if (isLive(account)) {
      for (const other of this.rows.values()) {
        if (other.id === account.id || !isLive(other)) continue;
        if (
          account.authProviderId !== null &&
          other.authProvider === account.authProvider &&
          other.authProviderId === account.authProviderId
        ) {
          throw new ConstraintViolationError('external_identity');
        }
        if (other.email === account.email) {
          throw new ConstraintViolationError('email');
        }
        if (other.username === account.username) {
          throw new ConstraintViolationError('username');
        }
      }
    }

    this.rows.set(account.id, clone(account));
    return clone(account);
  }

  async findById(id: string): Promise<Account | null> {
    await Promise.resolve();
    const row = this.rows.get(id);
    return row ? clone(row) : null;
  }

  async findByEmail(email: string, options: FindOptions = {}): Promise<Account | null> {
    await Promise.resolve();
    const matches = [...this.rows.values()].filter((row) => row.email === email);
    const live = matches.find(isLive);
    if (live) return clone(live);
    if (!options.includeDeleted) return null;

    const latestDeleted = matches.sort(
      (a, b) => (b.deletedAt?.getTime() ?? 0) - (a.deletedAt?.getTime() ?? 0),
    )[0];
    return latestDeleted ? clone(latestDeleted) : null;
  }

  async findByUsername(username: string): Promise<Account | null> {
    return this.findLive((row) => row.username === username);
  }

  async findByExternalIdentity(
    provider: AuthProvider,
    providerId: string,
  ): Promise<Account | null> {
    return this.findLive(
      (row) => row.authProvider === provider && row.authProviderId === providerId,
    );
  }

  async findBySingleUseToken(
    value: string,
    purpose: SingleUsePurpose,
  ): Promise<Account | null> {
    return this.findLive((row) =>
      purpose === 'email_verification'
        ? row.emailVerificationToken === value
        : row.passwordResetToken === value,
    );
  }

  async existsByEmail(email: string, excludeDeleted = true): Promise<boolean> {
    await Promise.resolve();
    return [...this.rows.values()].some(
      (row) => row.email === email && (!excludeDeleted || isLive(row)),
    );
  }

  async existsByUsername(username: string, excludeDeleted = true): Promise<boolean> {
    await Promise.resolve();
    return [...this.rows.values()].some(
      (row) => row.username === username && (!excludeDeleted || isLive(row)),
    );
  }

  async search(filter: AccountSearchFilter): Promise<AccountPage> {
    await Promise.resolve();
    const term = filter.search?.toLowerCase();
    const matches = [...this.rows.values()]
      .filter((row) => {
        if (term) {
          const haystack = [row.email, row.username, row.nickname ?? ''];
          if (!haystack.some((value) => value.toLowerCase().includes(term))) {
            return false;
          }
        }
        if (filter.role !== undefined && row.role !== filter.role) return false;
        if (filter.status !== undefined && row.status !== filter.status) return false;
        if (filter.provider !== undefined && row.authProvider !== filter.provider) return false;
        if (filter.emailVerified !== undefined && row.emailVerified !== filter.emailVerified) {
          return false;
        }
        if (filter.isActive !== undefined && row.isActive !== filter.isActive) return false;
        return true;
      })
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    return {
      items: matches.slice(filter.skip, filter.skip + filter.limit).map(clone),
      total: matches.length,
    };
  }

  async countByStatus(): Promise<AccountCounts> {
    await Promise.resolve();
    const counts: AccountCounts = {
      [AccountStatus.PENDING]: 0,
      [AccountStatus.ACTIVE]: 0,
      [AccountStatus.INACTIVE]: 0,
      [AccountStatus.SUSPENDED]: 0,
      [AccountStatus.DELETED]: 0,
      total: 0,
      admins: 0,
      verified: 0,
    };
    for (const row of this.rows.values()) {
      counts[row.status] += 1;
      counts.total += 1;
      if (row.role === AccountRole.ADMIN) counts.admins += 1;
      if (row.emailVerified) counts.verified += 1;
    }
    return counts;
  }

  async hardDelete(id: string): Promise<boolean> {
    await Promise.resolve();
    return this.rows.delete(id);
  }

  private async findLive(predicate: (row: Account) => boolean): Promise<Account | null> {
    await Promise.resolve();
    for (const row of this.rows.values()) {
      if (isLive(row) && predicate(row)) return clone(row);
    }
    return null;
  }
}
