import { IsEmail, IsOptional, IsString, Matches, MaxLength, MinLength } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { toTrimmedLowerCase } from '../../../common/transformers/query-value.transformers';
import { ProfileFieldsDto, USERNAME_FORMAT } from './register.dto';

export class UpdateProfileDto extends ProfileFieldsDto {
  @ApiPropertyOptional({
    example: 'new@example.com',
    description: 'Changing the email clears verification and sends a new token',
  })
  @IsOptional()
  @Transform(toTrimmedLowerCase)
  @IsEmail({}, { message: 'Invalid email format' })
  email?: string;

  @ApiPropertyOptional({ example: 'ada_l' })
  @IsOptional()
  @Transform(toTrimmedLowerCase)
  @IsString()
  @MinLength(3)
  @MaxLength(100)
  @Matches(USERNAME_FORMAT)
  username?: string;
}
