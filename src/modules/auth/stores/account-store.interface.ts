import {
  Account,
  AccountRole,
  AccountStatus,
  AuthProvider,
} from '../../../database/entities/account.entity';

export const ACCOUNT_STORE = Symbol('ACCOUNT_STORE');

export type SingleUsePurpose = 'email_verification' | 'password_reset';

export interface FindOptions {
  /**
   * When no live row matches, fall back to the most recently soft-deleted
   * one. Defaults to false.
   */
  includeDeleted?: boolean;
}

export interface AccountSearchFilter {
  search?: string;
  role?: AccountRole;
  status?: AccountStatus;
  provider?: AuthProvider;
  emailVerified?: boolean;
  isActive?: boolean;
  skip: number;
  limit: number;
}

export interface AccountPage {
  items: Account[];
  total: number;
}

export type AccountCounts = Record<AccountStatus, number> & {
  total: number;
  admins: number;
  verified: number;
};

/**
 * Persistence contract for the identity core.
 *
 * - `save` upserts and enforces uniqueness of email, username and
 *   (provider, providerId) among non-deleted rows, rejecting with
 *   ConstraintViolationError.
 * - Lookups resolve to `null` when nothing matches; absence is not an error.
 * - Email, username, external-identity and token lookups only see live
 *   rows unless told otherwise; `findById` sees every row.
 * - Implementations bound every call in time and reject with an
 *   INFRASTRUCTURE DomainException on timeout or driver failure.
 */
export interface AccountStore {
  save(account: Account): Promise<Account>;
  findById(id: string): Promise<Account | null>;
  findByEmail(email: string, options?: FindOptions): Promise<Account | null>;
  findByUsername(username: string): Promise<Account | null>;
  findByExternalIdentity(provider: AuthProvider, providerId: string): Promise<Account | null>;
  findBySingleUseToken(value: string, purpose: SingleUsePurpose): Promise<Account | null>;
  existsByEmail(email: string, excludeDeleted?: boolean): Promise<boolean>;
  existsByUsername(username: string, excludeDeleted?: boolean): Promise<boolean>;
  search(filter: AccountSearchFilter): Promise<AccountPage>;
  countByStatus(): Promise<AccountCounts>;
  hardDelete(id: string): Promise<boolean>;
}
