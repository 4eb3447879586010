import { HttpException, HttpStatus } from '@nestjs/common';

export enum DomainErrorKind {
  VALIDATION = 'VALIDATION',
  CONFLICT = 'CONFLICT',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
  ACCOUNT_INACTIVE = 'ACCOUNT_INACTIVE',
  NOT_FOUND = 'NOT_FOUND',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  TOKEN_INVALID = 'TOKEN_INVALID',
  ILLEGAL_TRANSITION = 'ILLEGAL_TRANSITION',
  NO_PASSWORD_SET = 'NO_PASSWORD_SET',
  INFRASTRUCTURE = 'INFRASTRUCTURE',
  CREDENTIAL_CORRUPT = 'CREDENTIAL_CORRUPT',
}

const STATUS_BY_KIND: Record<DomainErrorKind, HttpStatus> = {
  [DomainErrorKind.VALIDATION]: HttpStatus.BAD_REQUEST,
  [DomainErrorKind.CONFLICT]: HttpStatus.CONFLICT,
  [DomainErrorKind.INVALID_CREDENTIALS]: HttpStatus.UNAUTHORIZED,
  [DomainErrorKind.ACCOUNT_INACTIVE]: HttpStatus.FORBIDDEN,
  [DomainErrorKind.NOT_FOUND]: HttpStatus.NOT_FOUND,
  [DomainErrorKind.TOKEN_EXPIRED]: HttpStatus.UNAUTHORIZED,
  [DomainErrorKind.TOKEN_INVALID]: HttpStatus.BAD_REQUEST,
  [DomainErrorKind.ILLEGAL_TRANSITION]: HttpStatus.CONFLICT,
  [DomainErrorKind.NO_PASSWORD_SET]: HttpStatus.BAD_REQUEST,
  [DomainErrorKind.INFRASTRUCTURE]: HttpStatus.SERVICE_UNAVAILABLE,
  [DomainErrorKind.CREDENTIAL_CORRUPT]: HttpStatus.INTERNAL_SERVER_ERROR,
};

/**
 * Single typed failure for the identity core. Callers branch on `kind`
 * (and `reason` where one is set), never on the message text.
 *
 * Only INFRASTRUCTURE failures are retryable; every other kind needs new
 * input before the same call can succeed.
 */
export class DomainException extends HttpException {
  readonly kind: DomainErrorKind;
  readonly reason?: string;

  constructor(kind: DomainErrorKind, message: string, reason?: string) {
    super(
      {
        kind,
        reason,
        message,
        retryable: kind === DomainErrorKind.INFRASTRUCTURE,
      },
      STATUS_BY_KIND[kind],
    );
    this.name = 'DomainException';
    this.kind = kind;
    this.reason = reason;
  }

  get retryable(): boolean {
    return this.kind === DomainErrorKind.INFRASTRUCTURE;
  }

  static validation(message: string, reason?: string): DomainException {
    return new DomainException(DomainErrorKind.VALIDATION, message, reason);
  }

  static conflict(message: string, reason?: string): DomainException {
    return new DomainException(DomainErrorKind.CONFLICT, message, reason);
  }

  static invalidCredentials(): DomainException {
    return new DomainException(
      DomainErrorKind.INVALID_CREDENTIALS,
      'Invalid email or password',
    );
  }

  static accountInactive(status: string): DomainException {
    return new DomainException(
      DomainErrorKind.ACCOUNT_INACTIVE,
      'Account is not active',
      status,
    );
  }

  static notFound(resource = 'Account'): DomainException {
    return new DomainException(DomainErrorKind.NOT_FOUND, `${resource} not found`);
  }

  static tokenExpired(): DomainException {
    return new DomainException(DomainErrorKind.TOKEN_EXPIRED, 'Token has expired');
  }

  static tokenInvalid(reason: string): DomainException {
    return new DomainException(DomainErrorKind.TOKEN_INVALID, 'Token is invalid', reason);
  }

  static illegalTransition(from: string, event: string): DomainException {
    return new DomainException(
      DomainErrorKind.ILLEGAL_TRANSITION,
      `Cannot ${event} an account in status ${from}`,
      `${from}:${event}`,
    );
  }

  static noPasswordSet(): DomainException {
    return new DomainException(
      DomainErrorKind.NO_PASSWORD_SET,
      'Account has no password; sign in with its identity provider',
    );
  }

  static infrastructure(message: string, reason?: string): DomainException {
    return new DomainException(DomainErrorKind.INFRASTRUCTURE, message, reason);
  }

  /** The stored digest cannot be parsed; no retry will fix the row. */
  static credentialCorrupt(): DomainException {
    return new DomainException(
      DomainErrorKind.CREDENTIAL_CORRUPT,
      'Stored password digest is corrupt',
      'digest_corrupt',
    );
  }
}

export function isDomainException(
  error: unknown,
  kind?: DomainErrorKind,
): error is DomainException {
  return (
    error instanceof DomainException && (kind === undefined || error.kind === kind)
  );
}
