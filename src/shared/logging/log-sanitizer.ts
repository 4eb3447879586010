/**
 * Log Sanitizer
 *
 * Redacts credentials from log lines and structured log metadata: passwords,
 * password digests, signed tokens, single-use token values and Authorization
 * headers.
 */

export const REDACTED = '[REDACTED]';

/** Object keys whose values are never logged, matched case-insensitively as substrings. */
const SENSITIVE_KEYS = [
  'password',
  'passwordhash',
  'token',
  'secret',
  'pepper',
  'authorization',
  'cookie',
];

const JWT_PATTERN = /\beyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]*/g;
const BCRYPT_PATTERN = /\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}/g;
const BEARER_PATTERN = /\b(Bearer)\s+[A-Za-z0-9._~+/=-]+/gi;
const KEY_VALUE_PATTERN =
  /\b(password|new_?password|current_?password|token|refresh_?token|access_?token|secret)\s*([=:])\s*[^\s,;&})"']+/gi;
const JSON_PAIR_PATTERN =
  /"(password|newPassword|currentPassword|token|refreshToken|accessToken|secret)"\s*:\s*"[^"]*"/g;

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lower.includes(sensitive));
}

/**
 * Sanitizes a string by redacting credentials embedded in free text.
 */
export function sanitizeString(str: string): string {
  if (!str) {
    return str;
  }

  return str
    .replace(JWT_PATTERN, REDACTED)
    .replace(BCRYPT_PATTERN, REDACTED)
    .replace(BEARER_PATTERN, `$1 ${REDACTED}`)
    .replace(JSON_PAIR_PATTERN, `"$1":"${REDACTED}"`)
    .replace(KEY_VALUE_PATTERN, `$1$2${REDACTED}`);
}

/**
 * Sanitizes log data of any shape. Strings are scrubbed, values under
 * sensitive keys are replaced and Errors are flattened to plain objects.
 */
export function sanitizeLogData(data: unknown): unknown {
  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return sanitizeString(data);
  }

  if (data instanceof Error) {
    return {
      name: data.name,
      message: sanitizeString(data.message),
      stack: data.stack ? sanitizeString(data.stack) : undefined,
    };
  }

  if (data instanceof Date) {
    return data;
  }

  if (Array.isArray(data)) {
    return data.map((item) => sanitizeLogData(item));
  }

  if (typeof data === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      sanitized[key] = isSensitiveKey(key) ? REDACTED : sanitizeLogData(value);
    }
    return sanitized;
  }

  return data;
}
