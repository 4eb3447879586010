import {
  AccountRole,
  AccountStatus,
  AuthProvider,
} from '../../../database/entities/account.entity';
import { DomainErrorKind } from '../exceptions/domain.exception';
import { AccountProfile, AdministeredStatus } from '../lifecycle/account-lifecycle';

export interface RegisterCommand {
  email: string;
  username: string;
  password?: string;
  provider?: AuthProvider;
  providerId?: string;
  profile?: AccountProfile;
}

export interface LoginCommand {
  email: string;
  password: string;
  originAddress: string | null;
}

export interface ExternalProfile extends AccountProfile {
  username?: string;
}

export interface ExternalLoginCommand {
  provider: AuthProvider;
  providerId: string;
  email: string;
  profile?: ExternalProfile;
  originAddress: string | null;
}

export interface UpdateProfileCommand extends AccountProfile {
  email?: string;
  username?: string;
}

export interface AdminCreateAccountCommand {
  email: string;
  username: string;
  password: string;
  profile?: AccountProfile;
  /** Defaults to USER. */
  role?: AccountRole;
  /** Defaults to ACTIVE. */
  status?: AdministeredStatus;
  /** Defaults to true; no verification token is issued either way. */
  emailVerified?: boolean;
}

export interface AdminUpdateAccountCommand extends AccountProfile {
  email?: string;
  username?: string;
  role?: AccountRole;
  status?: AdministeredStatus;
  emailVerified?: boolean;
}

export enum BulkAccountAction {
  ACTIVATE = 'activate',
  DEACTIVATE = 'deactivate',
  SUSPEND = 'suspend',
  DELETE = 'delete',
  PROMOTE = 'promote',
  DEMOTE = 'demote',
}

export interface BulkActionCommand {
  accountIds: string[];
  action: BulkAccountAction;
  /** Recorded as the suspension reason when the action is suspend. */
  reason?: string;
}

export interface BulkActionFailure {
  accountId: string;
  kind: DomainErrorKind;
  reason?: string;
  message: string;
}

export interface BulkActionResult {
  action: BulkAccountAction;
  successCount: number;
  failedCount: number;
  succeeded: string[];
  failed: BulkActionFailure[];
}

export interface ListAccountsQuery {
  search?: string;
  role?: AccountRole;
  status?: AccountStatus;
  provider?: AuthProvider;
  emailVerified?: boolean;
  isActive?: boolean;
  skip?: number;
  limit?: number;
}

/** Honoured at scheduling boundaries: before hashing and before store writes. */
export interface OperationOptions {
  signal?: AbortSignal;
}

export interface RegistrationResult {
  accountId: string;
  email: string;
  username: string;
}

export interface AuthResult {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
  expiresInSeconds: number;
}

export interface ExternalAuthResult extends AuthResult {
  isNewAccount: boolean;
}

export interface AccountView {
  id: string;
  email: string;
  username: string;
  firstName: string | null;
  lastName: string | null;
  nickname: string | null;
  phone: string | null;
  avatarUrl: string | null;
  bio: string | null;
  authProvider: AuthProvider | null;
  emailVerified: boolean;
  role: AccountRole;
  status: AccountStatus;
  isActive: boolean;
  lastLoginAt: Date | null;
  lastLoginIp: string | null;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface AccountList {
  items: AccountView[];
  total: number;
  skip: number;
  limit: number;
}

export interface AccountStatistics {
  totalAccounts: number;
  pendingAccounts: number;
  activeAccounts: number;
  inactiveAccounts: number;
  suspendedAccounts: number;
  deletedAccounts: number;
  adminAccounts: number;
  verifiedAccounts: number;
  unverifiedAccounts: number;
}
