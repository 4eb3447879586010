import { ConfigService } from '@nestjs/config';

export const IDENTITY_OPTIONS = Symbol('IDENTITY_OPTIONS');

export type SigningAlgorithm = 'HS256' | 'HS384' | 'HS512';

export const SIGNING_ALGORITHMS: readonly SigningAlgorithm[] = ['HS256', 'HS384', 'HS512'];

export interface IdentityOptions {
  jwtSecret: string;
  jwtAlgorithm: SigningAlgorithm;
  accessTokenTtlMinutes: number;
  refreshTokenTtlDays: number;
  emailVerificationTtlHours: number;
  passwordResetTtlMinutes: number;
  bcryptRounds: number;
  passwordPepper: string | null;
  hashPoolSize: number;
  storeTimeoutMs: number;
}

export const IDENTITY_DEFAULTS = {
  jwtAlgorithm: 'HS256',
  accessTokenTtlMinutes: 30,
  refreshTokenTtlDays: 7,
  emailVerificationTtlHours: 24,
  passwordResetTtlMinutes: 60,
  bcryptRounds: 12,
  hashPoolSize: 2,
  storeTimeoutMs: 5000,
} as const;

export function isSigningAlgorithm(value: string): value is SigningAlgorithm {
  return SIGNING_ALGORITHMS.some((algorithm) => algorithm === value);
}

function readInt(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Reads the identity settings once at module construction. Values were
 * already checked by validateEnvironmentVariables() at bootstrap.
 */
export function loadIdentityOptions(config: ConfigService): IdentityOptions {
  const jwtSecret = config.get<string>('JWT_SECRET');
  if (!jwtSecret) {
    throw new Error(
      'JWT_SECRET is not defined in environment variables. Please set JWT_SECRET in .env file.',
    );
  }

  const algorithm = config.get<string>('JWT_ALGORITHM') ?? IDENTITY_DEFAULTS.jwtAlgorithm;
  if (!isSigningAlgorithm(algorithm)) {
    throw new Error(
      `JWT_ALGORITHM must be one of ${SIGNING_ALGORITHMS.join(', ')}. Got: ${algorithm}`,
    );
  }

  const pepper = config.get<string>('PASSWORD_PEPPER');

  return {
    jwtSecret,
    jwtAlgorithm: algorithm,
    accessTokenTtlMinutes: readInt(
      config,
      'ACCESS_TOKEN_TTL_MINUTES',
      IDENTITY_DEFAULTS.accessTokenTtlMinutes,
    ),
    refreshTokenTtlDays: readInt(
      config,
      'REFRESH_TOKEN_TTL_DAYS',
      IDENTITY_DEFAULTS.refreshTokenTtlDays,
    ),
    emailVerificationTtlHours: readInt(
      config,
      'EMAIL_VERIFICATION_TTL_HOURS',
      IDENTITY_DEFAULTS.emailVerificationTtlHours,
    ),
    passwordResetTtlMinutes: readInt(
      config,
      'PASSWORD_RESET_TTL_MINUTES',
      IDENTITY_DEFAULTS.passwordResetTtlMinutes,
    ),
    bcryptRounds: readInt(config, 'BCRYPT_ROUNDS', IDENTITY_DEFAULTS.bcryptRounds),
    passwordPepper: pepper ? pepper : null,
    hashPoolSize: readInt(config, 'HASH_POOL_SIZE', IDENTITY_DEFAULTS.hashPoolSize),
    storeTimeoutMs: readInt(config, 'STORE_TIMEOUT_MS', IDENTITY_DEFAULTS.storeTimeoutMs),
  };
}
