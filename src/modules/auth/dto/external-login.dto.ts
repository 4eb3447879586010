import {
  IsEmail,
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { AuthProvider } from '../../../database/entities/account.entity';
import { toTrimmedLowerCase } from '../../../common/transformers/query-value.transformers';
import { ProfileFieldsDto } from './register.dto';

/**
 * Identity already asserted by the provider. Exchanging the provider's
 * authorization code happens upstream of this endpoint.
 */
export class ExternalLoginDto extends ProfileFieldsDto {
  @ApiProperty({ enum: AuthProvider, example: AuthProvider.GITHUB })
  @IsEnum(AuthProvider)
  provider!: AuthProvider;

  @ApiProperty({ example: '583231', description: 'Subject id at the provider' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  providerId!: string;

  @ApiProperty({ example: 'octo@example.com' })
  @Transform(toTrimmedLowerCase)
  @IsEmail({}, { message: 'Invalid email format' })
  email!: string;

  @ApiPropertyOptional({
    example: 'octocat',
    description: 'Preferred handle; a suffix is added when taken',
  })
  @IsOptional()
  @IsString()
  @MaxLength(90)
  username?: string;
}
