import { Logger } from '@nestjs/common';
import { SIGNING_ALGORITHMS, isSigningAlgorithm } from '../../modules/auth/config/identity-options';

export interface EnvironmentReport {
  errors: string[];
  warnings: string[];
}

const BCRYPT_MIN_ROUNDS = 4;
const BCRYPT_MAX_ROUNDS = 31;
const STORE_DRIVERS: readonly string[] = ['postgres', 'typeorm', 'memory'];

function checkPositiveInt(
  env: NodeJS.ProcessEnv,
  key: string,
  errors: string[],
  range?: { min: number; max: number },
): void {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    errors.push(`${key} must be a positive integer. Got: ${raw}`);
    return;
  }
  if (range && (value < range.min || value > range.max)) {
    errors.push(`${key} must be between ${range.min} and ${range.max}. Got: ${value}`);
  }
}

/**
 * Collects configuration problems without throwing.
 */
export function checkEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentReport {
  const errors: string[] = [];
  const warnings: string[] = [];
  const production = env.NODE_ENV === 'production';

  // Critical: JWT Secret
  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    errors.push('JWT_SECRET is not defined. Set a secure random string (min 32 characters).');
  } else if (jwtSecret.length < 32) {
    errors.push(`JWT_SECRET must be at least 32 characters long. Current length: ${jwtSecret.length}`);
  }

  const algorithm = env.JWT_ALGORITHM;
  if (algorithm && !isSigningAlgorithm(algorithm)) {
    errors.push(`JWT_ALGORITHM must be one of ${SIGNING_ALGORITHMS.join(', ')}. Got: ${algorithm}`);
  }

  checkPositiveInt(env, 'ACCESS_TOKEN_TTL_MINUTES', errors);
  checkPositiveInt(env, 'REFRESH_TOKEN_TTL_DAYS', errors);
  checkPositiveInt(env, 'EMAIL_VERIFICATION_TTL_HOURS', errors);
  checkPositiveInt(env, 'PASSWORD_RESET_TTL_MINUTES', errors);
  checkPositiveInt(env, 'HASH_POOL_SIZE', errors);
  checkPositiveInt(env, 'STORE_TIMEOUT_MS', errors);
  checkPositiveInt(env, 'BCRYPT_ROUNDS', errors, { min: BCRYPT_MIN_ROUNDS, max: BCRYPT_MAX_ROUNDS });

  const rounds = Number(env.BCRYPT_ROUNDS);
  if (production && Number.isInteger(rounds) && rounds > 0 && rounds < 10) {
    warnings.push(`BCRYPT_ROUNDS=${rounds} is low for production.`);
  }

  const driver = env.ACCOUNT_STORE_DRIVER;
  if (driver && !STORE_DRIVERS.includes(driver)) {
    errors.push(`ACCOUNT_STORE_DRIVER must be "postgres" or "memory". Got: ${driver}`);
  }

  if (driver === 'memory') {
    if (production) {
      errors.push('ACCOUNT_STORE_DRIVER=memory loses every account on restart and cannot run in production.');
    }
  } else {
    // Critical: Database Password
    const dbPassword = env.DATABASE_PASSWORD;
    if (!dbPassword) {
      errors.push('DATABASE_PASSWORD is not defined.');
    } else if (dbPassword === 'identity_password' || dbPassword === 'password' || dbPassword === 'admin') {
      if (production) {
        errors.push('DATABASE_PASSWORD uses a default/insecure value in production. Change immediately!');
      } else {
        warnings.push('DATABASE_PASSWORD uses a default value. This is acceptable for development but MUST be changed for production.');
      }
    }

    if (!env.DATABASE_HOST) {
      warnings.push('DATABASE_HOST not set, using default: localhost');
    }
    if (!env.DATABASE_NAME) {
      warnings.push('DATABASE_NAME not set, using default: identity_db');
    }
    if (!env.DATABASE_USER) {
      warnings.push('DATABASE_USER not set, using default: identity');
    }
  }

  if (production) {
    if (!env.CORS_ORIGIN) {
      errors.push('CORS_ORIGIN must be set in production to restrict API access.');
    }
    if (env.DATABASE_HOST === 'localhost') {
      warnings.push('DATABASE_HOST is localhost in production. This may be incorrect.');
    }
  }

  return { errors, warnings };
}

/**
 * Validates critical environment variables on application startup
 * Prevents application from starting with insecure or missing configuration
 */
export function validateEnvironmentVariables(env: NodeJS.ProcessEnv = process.env): void {
  const logger = new Logger('EnvironmentValidation');
  const { errors, warnings } = checkEnvironment(env);

  if (warnings.length > 0) {
    logger.warn('Environment configuration warnings:');
    warnings.forEach((warning, index) => {
      logger.warn(`  ${index + 1}. ${warning}`);
    });
  }

  if (errors.length > 0) {
    logger.error('Environment configuration errors:');
    errors.forEach((error, index) => {
      logger.error(`  ${index + 1}. ${error}`);
    });
    throw new Error(
      `Environment validation failed with ${errors.length} error(s). Application cannot start.`,
    );
  }

  logger.log('Environment validation passed');
}
