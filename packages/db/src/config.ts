import { z } from 'zod';
import { ValidationError } from '@gymledger/shared';

const dbConfigSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(2),
  /** Concurrent transactions admitted by the pool guard; defaults to DB_POOL_MAX. */
  DB_CONCURRENCY: z.coerce.number().int().min(1).max(100).optional(),
  DB_QUERY_TIMEOUT: z.coerce.number().int().min(100).default(15_000),
  DB_QUEUE_TIMEOUT: z.coerce.number().int().min(0).default(5_000),
  DB_PREPARE_STATEMENTS: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export type DbConfig = z.infer<typeof dbConfigSchema>;

let cached: DbConfig | null = null;

export function loadDbConfig(env: Record<string, string | undefined> = process.env): DbConfig {
  const parsed = dbConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid database configuration',
      parsed.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}

export function getDbConfig(): DbConfig {
  if (!cached) {
    cached = loadDbConfig();
  }
  return cached;
}

export function resetDbConfig(): void {
  cached = null;
}
