/**
 * Postgres unique_violation (SQLSTATE 23505), optionally narrowed to one
 * constraint or index name. postgres-js reports the name as `constraint_name`.
 */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (!err || typeof err !== 'object' || !('code' in err) || err.code !== '23505') return false;
  if (!constraint) return true;
  if ('constraint_name' in err && err.constraint_name === constraint) return true;
  return 'message' in err && typeof err.message === 'string' && err.message.includes(constraint);
}
