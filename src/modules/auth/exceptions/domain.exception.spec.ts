import { HttpStatus } from '@nestjs/common';
import { DomainErrorKind, DomainException, isDomainException } from './domain.exception';

describe('DomainException', () => {
  it('should map each kind to its HTTP status', () => {
    expect(DomainException.validation('bad').getStatus()).toBe(HttpStatus.BAD_REQUEST);
    expect(DomainException.conflict('taken', 'email').getStatus()).toBe(HttpStatus.CONFLICT);
    expect(DomainException.invalidCredentials().getStatus()).toBe(HttpStatus.UNAUTHORIZED);
    expect(DomainException.accountInactive('suspended').getStatus()).toBe(HttpStatus.FORBIDDEN);
    expect(DomainException.notFound().getStatus()).toBe(HttpStatus.NOT_FOUND);
    expect(DomainException.tokenExpired().getStatus()).toBe(HttpStatus.UNAUTHORIZED);
    expect(DomainException.tokenInvalid('not_found').getStatus()).toBe(HttpStatus.BAD_REQUEST);
    expect(DomainException.illegalTransition('deleted', 'activate').getStatus()).toBe(
      HttpStatus.CONFLICT,
    );
    expect(DomainException.noPasswordSet().getStatus()).toBe(HttpStatus.BAD_REQUEST);
    expect(DomainException.infrastructure('down').getStatus()).toBe(
      HttpStatus.SERVICE_UNAVAILABLE,
    );
    expect(DomainException.credentialCorrupt().getStatus()).toBe(
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  });

  it('should mark only infrastructure failures as retryable', () => {
    expect(DomainException.infrastructure('timeout', 'store_timeout').retryable).toBe(true);
    expect(DomainException.conflict('taken').retryable).toBe(false);
    expect(DomainException.tokenExpired().retryable).toBe(false);
    expect(DomainException.credentialCorrupt().retryable).toBe(false);
  });

  it('should carry kind, reason and retryable in the response body', () => {
    const error = DomainException.conflict('Email is already registered', 'email');

    expect(error.getResponse()).toEqual({
      kind: DomainErrorKind.CONFLICT,
      reason: 'email',
      message: 'Email is already registered',
      retryable: false,
    });
  });

  it('should use the status as the reason of an inactive-account failure', () => {
    const error = DomainException.accountInactive('suspended');

    expect(error.kind).toBe(DomainErrorKind.ACCOUNT_INACTIVE);
    expect(error.reason).toBe('suspended');
  });

  it('should name the resource in not-found messages', () => {
    expect(DomainException.notFound().message).toBe('Account not found');
    expect(DomainException.notFound('Token').message).toBe('Token not found');
  });

  describe('isDomainException', () => {
    it('should narrow by kind when one is given', () => {
      const error: unknown = DomainException.tokenExpired();

      expect(isDomainException(error)).toBe(true);
      expect(isDomainException(error, DomainErrorKind.TOKEN_EXPIRED)).toBe(true);
      expect(isDomainException(error, DomainErrorKind.TOKEN_INVALID)).toBe(false);
    });

    it('should reject plain errors', () => {
      expect(isDomainException(new Error('boom'))).toBe(false);
    });
  });
});
