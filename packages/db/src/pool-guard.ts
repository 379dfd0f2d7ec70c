/**
 * Pool guard: DB concurrency limiter, per-operation deadline and storage error boundary.
 *
 * Every transaction opened by `withTenant` / `withTransaction` runs through
 * `guardedQuery`, which:
 * 1. Limits concurrent DB operations to the pool size (turns spikes into queues)
 * 2. Fails queued work after DB_QUEUE_TIMEOUT ms instead of waiting forever
 * 3. Aborts the operation's signal after DB_QUERY_TIMEOUT ms; the transaction
 *    helpers roll back on it, and the slot is held until the work has settled
 * 4. Passes domain errors (AppError) through untouched and wraps every other
 *    failure in StorageError, so callers see one opaque storage failure type
 *
 * @module
 */
import { AppError, StorageError } from '@gymledger/shared';
import { getDbConfig } from './config';

const QUEUE_WARN_THRESHOLD = 5;
const SLOW_QUERY_THRESHOLD_MS = 5_000;

class GuardTimeoutError extends Error {
  constructor(
    public code: 'QUERY_TIMEOUT' | 'QUEUE_TIMEOUT',
    message: string,
  ) {
    super(message);
    this.name = 'GuardTimeoutError';
  }
}

// ── Semaphore with acquire timeout ───────────────────────────────────────────
interface QueueEntry {
  resolve: () => void;
  reject: (err: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
}

class Semaphore {
  private queue: QueueEntry[] = [];
  private current = 0;

  constructor(private max: number) {}

  async acquire(timeoutMs?: number): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>((resolve, reject) => {
      const entry: QueueEntry = { resolve, reject };

      if (timeoutMs != null && timeoutMs > 0) {
        entry.timer = setTimeout(() => {
          const idx = this.queue.indexOf(entry);
          if (idx >= 0) {
            this.queue.splice(idx, 1);
            reject(
              new GuardTimeoutError(
                'QUEUE_TIMEOUT',
                `[pool-guard] Queue timeout: waited ${timeoutMs}ms for DB slot ` +
                  `(${this.current} active, ${this.queue.length} queued)`,
              ),
            );
          }
        }, timeoutMs);
      }

      this.queue.push(entry);
    });
  }

  release(): void {
    this.current--;
    const next = this.queue.shift();
    if (next) {
      this.current++;
      if (next.timer) clearTimeout(next.timer);
      next.resolve();
    }
  }

  get pending() {
    return this.queue.length;
  }
  get active() {
    return this.current;
  }
}

let semaphore: Semaphore | null = null;

function getSemaphore(): Semaphore {
  if (!semaphore) {
    const config = getDbConfig();
    semaphore = new Semaphore(config.DB_CONCURRENCY ?? config.DB_POOL_MAX);
  }
  return semaphore;
}

/** Drop the limiter so the next operation re-reads the configuration. Only call while idle. */
export function resetPoolGuard(): void {
  semaphore = null;
}

function toStorageBoundary(opName: string, err: unknown): AppError {
  return err instanceof AppError ? err : new StorageError(opName, err);
}

// ── Guarded DB execution ─────────────────────────────────────────────────────
/**
 * Run `fn` under the concurrency limit. `signal` aborts once the deadline
 * passes; `fn` must stop before committing when it does. The caller waits for
 * `fn` to settle, so a reported failure never hides a commit and the slot is
 * not reused while the connection is still busy.
 */
export async function guardedQuery<T>(
  opName: string,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const { DB_QUERY_TIMEOUT: queryTimeoutMs, DB_QUEUE_TIMEOUT: queueTimeoutMs } = getDbConfig();
  const slots = getSemaphore();

  if (slots.pending >= QUEUE_WARN_THRESHOLD) {
    console.warn(
      `[pool-guard] DB queue depth: ${slots.pending} waiting, ${slots.active} active (op: ${opName})`,
    );
  }

  try {
    await slots.acquire(queueTimeoutMs);
  } catch (err) {
    console.error(`[pool-guard] could not acquire DB slot (op: ${opName})`);
    throw toStorageBoundary(opName, err);
  }
  const start = Date.now();
  const deadline = new AbortController();
  const timeoutId = setTimeout(() => {
    deadline.abort(
      new GuardTimeoutError('QUERY_TIMEOUT', `[pool-guard] Query timeout: ${opName} exceeded ${queryTimeoutMs}ms`),
    );
  }, queryTimeoutMs);

  try {
    const result = await fn(deadline.signal);

    const duration = Date.now() - start;
    if (duration > SLOW_QUERY_THRESHOLD_MS) {
      console.warn(`[pool-guard] Slow DB op: ${opName} took ${duration}ms`);
    }
    return result;
  } catch (err) {
    if (!(err instanceof AppError)) {
      console.error(`[pool-guard] ${opName} failed after ${Date.now() - start}ms`, err);
    }
    throw toStorageBoundary(opName, err);
  } finally {
    clearTimeout(timeoutId);
    slots.release();
  }
}
