import { validate } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { LoginDto } from './login.dto';

describe('LoginDto', () => {
  it('should accept an email and password', async () => {
    const dto = plainToInstance(LoginDto, {
      email: 'user@example.com',
      password: 'correct horse',
    });

    expect(await validate(dto)).toHaveLength(0);
  });

  it('should normalise the email before validation', () => {
    const dto = plainToInstance(LoginDto, {
      email: ' User@Example.com',
      password: 'correct horse',
    });

    expect(dto.email).toBe('user@example.com');
  });

  it('should reject an invalid email', async () => {
    const dto = plainToInstance(LoginDto, { email: 'nope', password: 'correct horse' });

    const errors = await validate(dto);
    expect(errors).toHaveLength(1);
    expect(errors[0].constraints?.isEmail).toBe('Invalid email format');
  });

  it('should reject an empty password', async () => {
    const dto = plainToInstance(LoginDto, { email: 'user@example.com', password: '' });

    const errors = await validate(dto);
    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('password');
    expect(errors[0].constraints?.isNotEmpty).toBe('Password is required');
  });
});
