import { BadRequestException, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { HttpExceptionFilter } from './http-exception.filter';
import {
  DomainErrorKind,
  DomainException,
} from '../../modules/auth/exceptions/domain.exception';

describe('HttpExceptionFilter', () => {
  let filter: HttpExceptionFilter;
  let headers: Map<string, string>;
  let errorSpy: jest.SpyInstance;

  const response = {
    status: jest.fn(),
    json: jest.fn(),
    setHeader: jest.fn((name: string, value: string) => {
      headers.set(name.toLowerCase(), value);
    }),
    getHeader: jest.fn((name: string) => headers.get(name.toLowerCase())),
  };
  const request = { url: '/api/auth/login', ip: '203.0.113.5' };

  beforeEach(() => {
    jest.clearAllMocks();
    headers = new Map();
    response.status.mockReturnValue(response);
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
    filter = new HttpExceptionFilter();
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  const catchWith = (exception: unknown) =>
    filter.catch(exception, new ExecutionContextHost([request, response]));

  it('should keep kind, reason and retryable for domain failures', () => {
    catchWith(DomainException.conflict('Email already registered: a@x.com', 'email'));

    expect(response.status).toHaveBeenCalledWith(HttpStatus.CONFLICT);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 409,
      kind: DomainErrorKind.CONFLICT,
      reason: 'email',
      retryable: false,
      message: 'Email already registered: a@x.com',
      error: 'CONFLICT',
      timestamp: expect.any(String),
      path: '/api/auth/login',
    });
  });

  it('should omit the reason when a domain failure has none', () => {
    catchWith(DomainException.invalidCredentials());

    const body = response.json.mock.calls[0][0];
    expect(body).not.toHaveProperty('reason');
    expect(body.kind).toBe(DomainErrorKind.INVALID_CREDENTIALS);
    expect(body.statusCode).toBe(401);
  });

  it('should join validation messages', () => {
    catchWith(new BadRequestException(['email must be an email', 'password is too short']));

    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 400,
        message: 'email must be an email, password is too short',
        error: 'BAD_REQUEST',
      }),
    );
  });

  it('should hide the details of unexpected errors', () => {
    catchWith(new Error('relation "accounts" does not exist'));

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 500,
        message: 'Internal server error',
        error: 'INTERNAL_SERVER_ERROR',
      }),
    );
    expect(errorSpy).toHaveBeenCalled();
  });

  it('should mark infrastructure failures retryable with Retry-After', () => {
    catchWith(DomainException.infrastructure('Account store save timed out', 'timeout'));

    expect(response.status).toHaveBeenCalledWith(503);
    expect(response.json).toHaveBeenCalledWith(expect.objectContaining({ retryable: true }));
    expect(headers.get('retry-after')).toBe('5');
  });

  it('should add Retry-After to throttling responses that lack one', () => {
    catchWith(new HttpException('ThrottlerException: Too Many Requests', 429));

    expect(headers.get('retry-after')).toBe('900');
  });

  it('should keep the throttler Retry-After value', () => {
    headers.set('retry-after', '42');

    catchWith(new HttpException('ThrottlerException: Too Many Requests', 429));

    expect(headers.get('retry-after')).toBe('42');
  });

  it('should not log ordinary client errors', () => {
    catchWith(DomainException.validation('Invalid email format', 'email_format'));

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
