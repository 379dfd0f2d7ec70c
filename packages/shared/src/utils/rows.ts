import { StorageError } from '../errors';

/**
 * First row of an `INSERT/UPDATE ... RETURNING` that must produce one.
 * An empty result means the statement raced a concurrent writer or the
 * driver misbehaved; neither is a domain condition.
 */
export function firstOrThrow<T>(rows: readonly T[], operation: string): T {
  const [row] = rows;
  if (row === undefined) {
    throw new StorageError(operation);
  }
  return row;
}
