import { IsEmail, IsString, IsNotEmpty } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { toTrimmedLowerCase } from '../../../common/transformers/query-value.transformers';

export class LoginDto {
  @ApiProperty({
    example: 'user@example.com',
    description: 'Account email address',
  })
  @IsEmail({}, { message: 'Invalid email format' })
  @Transform(toTrimmedLowerCase)
  email!: string;

  @ApiProperty({
    example: 'correct horse battery',
    description: 'Account password',
  })
  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;
}
