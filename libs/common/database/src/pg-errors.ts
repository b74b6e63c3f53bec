/**
 * Postgres error classification
 * See https://www.postgresql.org/docs/current/errcodes-appendix.html
 */

const UNIQUE_VIOLATION = '23505';

// Connection-level failures worth retrying
const TRANSIENT_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);
const TRANSIENT_SQLSTATE_CLASSES = ['08', '53', '57P'];

export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return pgErrorCode(error) === UNIQUE_VIOLATION;
}

/**
 * Constraint and syntax errors are permanent; only connection trouble is retried.
 */
export function isTransientError(error: unknown): boolean {
  const code = pgErrorCode(error);
  if (code === undefined) {
    return false;
  }
  return (
    TRANSIENT_NODE_CODES.has(code) ||
    TRANSIENT_SQLSTATE_CLASSES.some((prefix) => code.startsWith(prefix))
  );
}
