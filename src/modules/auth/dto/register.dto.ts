import {
  IsByteLength,
  IsEmail,
  IsEnum,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  MaxLength,
  MinLength,
  ValidateIf,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { AuthProvider } from '../../../database/entities/account.entity';
import {
  toTrimmed,
  toTrimmedLowerCase,
} from '../../../common/transformers/query-value.transformers';

export const USERNAME_FORMAT = /^[a-zA-Z0-9_.-]+$/;

/**
 * Optional profile fields shared by registration, external sign-in and
 * profile updates.
 */
export class ProfileFieldsDto {
  @ApiPropertyOptional({ example: 'Ada' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  @Transform(toTrimmed)
  firstName?: string;

  @ApiPropertyOptional({ example: 'Lovelace' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  @Transform(toTrimmed)
  lastName?: string;

  @ApiPropertyOptional({ example: 'ada' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  nickname?: string;

  @ApiPropertyOptional({ example: '+15550100' })
  @IsOptional()
  @IsString()
  @MaxLength(20)
  phone?: string;

  @ApiPropertyOptional({ example: 'https://cdn.example.com/avatar.png' })
  @IsOptional()
  @IsUrl({}, { message: 'avatarUrl must be a URL' })
  @MaxLength(500)
  avatarUrl?: string;

  @ApiPropertyOptional({ example: 'Writes programs for engines.' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  bio?: string;
}

export class RegisterDto extends ProfileFieldsDto {
  @ApiProperty({
    example: 'user@example.com',
    description: 'Email address, stored lower-cased',
  })
  @Transform(toTrimmedLowerCase)
  @IsEmail({}, { message: 'Invalid email format' })
  @MaxLength(255)
  email!: string;

  @ApiProperty({
    example: 'ada_l',
    description: 'Unique handle, 3-100 characters, stored lower-cased',
  })
  @Transform(toTrimmedLowerCase)
  @IsString()
  @MinLength(3)
  @MaxLength(100)
  @Matches(USERNAME_FORMAT, {
    message: 'Username may only contain letters, digits, dot, dash and underscore',
  })
  username!: string;

  @ApiPropertyOptional({
    example: 'correct horse battery',
    description: 'Required unless an identity provider is given (min 8 chars)',
    minLength: 8,
  })
  @ValidateIf((dto: RegisterDto) => dto.provider === undefined || dto.password !== undefined)
  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters long' })
  @IsByteLength(1, 72, { message: 'Password must be at most 72 bytes' })
  password?: string;

  @ApiPropertyOptional({ enum: AuthProvider })
  @IsOptional()
  @IsEnum(AuthProvider)
  provider?: AuthProvider;

  @ApiPropertyOptional({ example: '109876543210' })
  @ValidateIf((dto: RegisterDto) => dto.provider !== undefined)
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  providerId?: string;
}
