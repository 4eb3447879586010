import {
  ArrayMaxSize,
  ArrayMinSize,
  IsByteLength,
  IsArray,
  IsBoolean,
  IsEmail,
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  Max,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  AccountRole,
  AccountStatus,
  AuthProvider,
} from '../../../database/entities/account.entity';
import {
  toBoolean,
  toTrimmedLowerCase,
} from '../../../common/transformers/query-value.transformers';
import { BulkAccountAction } from '../interfaces/identity.interfaces';
import { AdministeredStatus } from '../lifecycle/account-lifecycle';
import { ProfileFieldsDto, USERNAME_FORMAT } from './register.dto';

const ADMINISTERED_STATUSES: AdministeredStatus[] = [
  AccountStatus.ACTIVE,
  AccountStatus.INACTIVE,
  AccountStatus.SUSPENDED,
];

export const MAX_BULK_ACCOUNTS = 100;

export class ListAccountsQueryDto {
  @ApiPropertyOptional({ description: 'Matches email, username or nickname' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  search?: string;

  @ApiPropertyOptional({ enum: AccountRole })
  @IsOptional()
  @IsEnum(AccountRole)
  role?: AccountRole;

  @ApiPropertyOptional({ enum: AccountStatus })
  @IsOptional()
  @IsEnum(AccountStatus)
  status?: AccountStatus;

  @ApiPropertyOptional({ enum: AuthProvider })
  @IsOptional()
  @IsEnum(AuthProvider)
  provider?: AuthProvider;

  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  emailVerified?: boolean;

  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  isActive?: boolean;

  @ApiPropertyOptional({ default: 0 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  skip?: number = 0;

  @ApiPropertyOptional({ default: 20, maximum: 100 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number = 20;
}

export class SuspendAccountDto {
  @ApiPropertyOptional({ example: 'Repeated abuse reports' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  reason?: string;
}

export class PromoteAccountDto {
  @ApiPropertyOptional({ enum: [AccountRole.ADMIN, AccountRole.MODERATOR], default: AccountRole.ADMIN })
  @IsOptional()
  @IsIn([AccountRole.ADMIN, AccountRole.MODERATOR])
  role?: AccountRole.ADMIN | AccountRole.MODERATOR;
}

export class AdminCreateAccountDto extends ProfileFieldsDto {
  @ApiProperty({ example: 'user@example.com' })
  @Transform(toTrimmedLowerCase)
  @IsEmail({}, { message: 'Invalid email format' })
  @MaxLength(255)
  email!: string;

  @ApiProperty({ example: 'ada_l' })
  @Transform(toTrimmedLowerCase)
  @IsString()
  @MinLength(3)
  @MaxLength(100)
  @Matches(USERNAME_FORMAT, {
    message: 'Username may only contain letters, digits, dot, dash and underscore',
  })
  username!: string;

  @ApiProperty({ minLength: 8 })
  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters long' })
  @IsByteLength(1, 72, { message: 'Password must be at most 72 bytes' })
  password!: string;

  @ApiPropertyOptional({ enum: AccountRole, default: AccountRole.USER })
  @IsOptional()
  @IsEnum(AccountRole)
  role?: AccountRole;

  @ApiPropertyOptional({ enum: ADMINISTERED_STATUSES, default: AccountStatus.ACTIVE })
  @IsOptional()
  @IsIn(ADMINISTERED_STATUSES)
  status?: AdministeredStatus;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  emailVerified?: boolean;
}

export class AdminUpdateAccountDto extends ProfileFieldsDto {
  @ApiPropertyOptional({ example: 'new@example.com' })
  @IsOptional()
  @Transform(toTrimmedLowerCase)
  @IsEmail({}, { message: 'Invalid email format' })
  @MaxLength(255)
  email?: string;

  @ApiPropertyOptional({ example: 'ada_l' })
  @IsOptional()
  @Transform(toTrimmedLowerCase)
  @IsString()
  @MinLength(3)
  @MaxLength(100)
  @Matches(USERNAME_FORMAT)
  username?: string;

  @ApiPropertyOptional({ enum: AccountRole })
  @IsOptional()
  @IsEnum(AccountRole)
  role?: AccountRole;

  @ApiPropertyOptional({ enum: ADMINISTERED_STATUSES })
  @IsOptional()
  @IsIn(ADMINISTERED_STATUSES)
  status?: AdministeredStatus;

  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  emailVerified?: boolean;
}

export class BulkActionDto {
  @ApiProperty({ type: [String], example: ['6f1c2b4e-1d2a-4c5b-9f0e-2a3b4c5d6e7f'] })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(MAX_BULK_ACCOUNTS)
  @IsUUID('all', { each: true })
  accountIds!: string[];

  @ApiProperty({ enum: BulkAccountAction, example: BulkAccountAction.ACTIVATE })
  @IsEnum(BulkAccountAction)
  action!: BulkAccountAction;

  @ApiPropertyOptional({ description: 'Suspension reason, used by the suspend action' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  reason?: string;
}
