import { Entity, Column, PrimaryColumn, Index } from 'typeorm';
import {
  IsEmail,
  IsNotEmpty,
  IsBoolean,
  IsOptional,
  IsEnum,
} from 'class-validator';

export enum AccountRole {
  USER = 'user',
  MODERATOR = 'moderator',
  ADMIN = 'admin',
}

export enum AccountStatus {
  PENDING = 'pending',
  ACTIVE = 'active',
  INACTIVE = 'inactive',
  SUSPENDED = 'suspended',
  DELETED = 'deleted',
}

/**
 * Accounts carry at most one external identity. `null` provider means the
 * account authenticates by password only.
 */
export enum AuthProvider {
  GOOGLE = 'google',
  GITHUB = 'github',
  KAKAO = 'kakao',
  NAVER = 'naver',
}

/**
 * Uniqueness of email, username and the provider pair only holds among rows
 * whose deleted_at is null; the partial indexes are created by migration
 * 1760000000000-CreateAccounts and mirrored here so schema diffs stay empty.
 */
@Entity('accounts')
@Index('uq_accounts_email_live', ['email'], {
  unique: true,
  where: '"deleted_at" IS NULL',
})
@Index('uq_accounts_username_live', ['username'], {
  unique: true,
  where: '"deleted_at" IS NULL',
})
@Index('uq_accounts_external_identity_live', ['authProvider', 'authProviderId'], {
  unique: true,
  where: '"deleted_at" IS NULL AND "auth_provider_id" IS NOT NULL',
})
export class Account {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  @IsEmail()
  @IsNotEmpty()
  email!: string;

  @Column({ type: 'varchar', length: 100 })
  @IsNotEmpty()
  username!: string;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'password_hash' })
  @IsOptional()
  passwordHash!: string | null;

  @Column({ type: 'varchar', length: 32, nullable: true, name: 'auth_provider' })
  @IsOptional()
  @IsEnum(AuthProvider)
  authProvider!: AuthProvider | null;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'auth_provider_id' })
  @IsOptional()
  authProviderId!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true, name: 'first_name' })
  @IsOptional()
  firstName!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true, name: 'last_name' })
  @IsOptional()
  lastName!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  @IsOptional()
  nickname!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  @IsOptional()
  phone!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true, name: 'avatar_url' })
  @IsOptional()
  avatarUrl!: string | null;

  @Column({ type: 'text', nullable: true })
  @IsOptional()
  bio!: string | null;

  @Column({ type: 'boolean', default: false, name: 'email_verified' })
  @IsBoolean()
  emailVerified!: boolean;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'email_verification_token' })
  @Index('idx_accounts_email_verification_token')
  @IsOptional()
  emailVerificationToken!: string | null;

  @Column({ type: 'timestamp', nullable: true, name: 'email_verification_expires_at' })
  @IsOptional()
  emailVerificationExpiresAt!: Date | null;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'password_reset_token' })
  @Index('idx_accounts_password_reset_token')
  @IsOptional()
  passwordResetToken!: string | null;

  @Column({ type: 'timestamp', nullable: true, name: 'password_reset_expires_at' })
  @IsOptional()
  passwordResetExpiresAt!: Date | null;

  @Column({ type: 'varchar', length: 16, default: AccountRole.USER })
  @IsEnum(AccountRole)
  role!: AccountRole;

  @Column({ type: 'varchar', length: 16, default: AccountStatus.PENDING })
  @IsEnum(AccountStatus)
  status!: AccountStatus;

  @Column({ type: 'varchar', length: 500, nullable: true, name: 'suspension_reason' })
  @IsOptional()
  suspensionReason!: string | null;

  @Column({ type: 'boolean', default: true, name: 'is_active' })
  @IsBoolean()
  isActive!: boolean;

  @Column({ type: 'timestamp', nullable: true, name: 'last_login_at' })
  @IsOptional()
  lastLoginAt!: Date | null;

  @Column({ type: 'varchar', length: 45, nullable: true, name: 'last_login_ip' })
  @IsOptional()
  lastLoginIp!: string | null;

  @Column({ type: 'timestamp', name: 'created_at' })
  createdAt!: Date;

  @Column({ type: 'timestamp', name: 'updated_at' })
  updatedAt!: Date;

  @Column({ type: 'timestamp', nullable: true, name: 'deleted_at' })
  @Index('idx_accounts_deleted_at')
  @IsOptional()
  deletedAt!: Date | null;
}
