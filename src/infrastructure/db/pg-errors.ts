/** SQLSTATE codes the repositories react to. */
export const LOCK_NOT_AVAILABLE = '55P03';
export const UNIQUE_VIOLATION = '23505';

const SQLSTATE = /^[0-9A-Z]{5}$/;

/**
 * SQLSTATE of a postgres.js error, looking through `cause` wrappers such as
 * PersistenceError. Returns null for anything that is not a database error.
 */
export function pgErrorCode(err: unknown): string | null {
  if (typeof err !== 'object' || err === null) return null;
  if ('code' in err && typeof err.code === 'string' && SQLSTATE.test(err.code)) return err.code;
  if ('cause' in err) return pgErrorCode(err.cause);
  return null;
}
