const UNIQUE_VIOLATION = '23505';

/**
 * True when a PostgreSQL unique constraint rejected the write. drizzle wraps
 * driver errors, so the SQLSTATE may sit on the error or on its cause.
 */
export function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && current.code === UNIQUE_VIOLATION) {
      return true;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
}
