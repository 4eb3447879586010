import { IsByteLength, IsEmail, IsNotEmpty, IsString, MaxLength, MinLength } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';
import { toTrimmedLowerCase } from '../../../common/transformers/query-value.transformers';

export class VerifyEmailDto {
  @ApiProperty({ description: 'Value delivered in the verification email' })
  @IsString()
  @IsNotEmpty({ message: 'Token is required' })
  @MaxLength(255)
  token!: string;
}

export class RequestPasswordResetDto {
  @ApiProperty({ example: 'user@example.com' })
  @Transform(toTrimmedLowerCase)
  @IsEmail({}, { message: 'Invalid email format' })
  email!: string;
}

export class ConfirmPasswordResetDto {
  @ApiProperty({ description: 'Value delivered in the reset email' })
  @IsString()
  @IsNotEmpty({ message: 'Token is required' })
  @MaxLength(255)
  token!: string;

  @ApiProperty({ minLength: 8 })
  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters long' })
  @IsByteLength(1, 72, { message: 'Password must be at most 72 bytes' })
  newPassword!: string;
}
