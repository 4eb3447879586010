import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  AccountRole,
  AccountStatus,
  AuthProvider,
} from '../../../database/entities/account.entity';
import { DomainErrorKind } from '../exceptions/domain.exception';
import { BulkAccountAction } from '../interfaces/identity.interfaces';

export class RegistrationResponseDto {
  @ApiProperty({ example: '6f1c2b4e-1d2a-4c5b-9f0e-2a3b4c5d6e7f' })
  accountId!: string;

  @ApiProperty({ example: 'user@example.com' })
  email!: string;

  @ApiProperty({ example: 'ada_l' })
  username!: string;
}

export class AuthResponseDto {
  @ApiProperty({ example: 'jwt-access-token...' })
  accessToken!: string;

  @ApiProperty({ example: 'jwt-refresh-token...' })
  refreshToken!: string;

  @ApiProperty({ example: 'bearer' })
  tokenType!: 'bearer';

  @ApiProperty({ example: 1800, description: 'Access token lifetime in seconds' })
  expiresInSeconds!: number;
}

export class ExternalAuthResponseDto extends AuthResponseDto {
  @ApiProperty({ description: 'True only for the call that created the account' })
  isNewAccount!: boolean;
}

export class AccountResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  email!: string;

  @ApiProperty()
  username!: string;

  @ApiPropertyOptional({ nullable: true })
  firstName!: string | null;

  @ApiPropertyOptional({ nullable: true })
  lastName!: string | null;

  @ApiPropertyOptional({ nullable: true })
  nickname!: string | null;

  @ApiPropertyOptional({ nullable: true })
  phone!: string | null;

  @ApiPropertyOptional({ nullable: true })
  avatarUrl!: string | null;

  @ApiPropertyOptional({ nullable: true })
  bio!: string | null;

  @ApiPropertyOptional({ enum: AuthProvider, nullable: true })
  authProvider!: AuthProvider | null;

  @ApiProperty()
  emailVerified!: boolean;

  @ApiProperty({ enum: AccountRole })
  role!: AccountRole;

  @ApiProperty({ enum: AccountStatus })
  status!: AccountStatus;

  @ApiProperty()
  isActive!: boolean;

  @ApiPropertyOptional({ nullable: true })
  lastLoginAt!: Date | null;

  @ApiPropertyOptional({ nullable: true })
  lastLoginIp!: string | null;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;

  @ApiPropertyOptional({ nullable: true })
  deletedAt!: Date | null;
}

export class AccountListResponseDto {
  @ApiProperty({ type: [AccountResponseDto] })
  items!: AccountResponseDto[];

  @ApiProperty()
  total!: number;

  @ApiProperty()
  skip!: number;

  @ApiProperty()
  limit!: number;
}

export class AccountStatisticsResponseDto {
  @ApiProperty() totalAccounts!: number;
  @ApiProperty() pendingAccounts!: number;
  @ApiProperty() activeAccounts!: number;
  @ApiProperty() inactiveAccounts!: number;
  @ApiProperty() suspendedAccounts!: number;
  @ApiProperty() deletedAccounts!: number;
  @ApiProperty() adminAccounts!: number;
  @ApiProperty() verifiedAccounts!: number;
  @ApiProperty() unverifiedAccounts!: number;
}

export class BulkActionFailureDto {
  @ApiProperty()
  accountId!: string;

  @ApiProperty({ enum: DomainErrorKind, example: DomainErrorKind.ILLEGAL_TRANSITION })
  kind!: DomainErrorKind;

  @ApiPropertyOptional({ example: 'deleted:activate' })
  reason?: string;

  @ApiProperty({ example: 'Cannot activate an account in status deleted' })
  message!: string;
}

export class BulkActionResponseDto {
  @ApiProperty({ enum: BulkAccountAction })
  action!: BulkAccountAction;

  @ApiProperty({ example: 3 })
  successCount!: number;

  @ApiProperty({ example: 1 })
  failedCount!: number;

  @ApiProperty({ type: [String] })
  succeeded!: string[];

  @ApiProperty({ type: [BulkActionFailureDto] })
  failed!: BulkActionFailureDto[];
}
