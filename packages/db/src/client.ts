import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase, PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema';
import { ValidationError } from '@gymledger/shared';
import { guardedQuery } from './pool-guard';
import { getDbConfig } from './config';

export type Database = PostgresJsDatabase<typeof schema>;

/** Anything that can run queries: the pooled database or an open transaction. */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

interface DbHandle {
  client: postgres.Sql;
  db: Database;
}

let handle: DbHandle | null = null;

function connect(): DbHandle {
  const config = getDbConfig();
  if (!config.DATABASE_URL) {
    throw new ValidationError('Invalid database configuration', [
      { field: 'DATABASE_URL', message: 'Required' },
    ]);
  }
  const client = postgres(config.DATABASE_URL, {
    max: config.DB_POOL_MAX,
    prepare: config.DB_PREPARE_STATEMENTS,
    idle_timeout: 20,
    max_lifetime: 300,
    connect_timeout: 10,
    onnotice: (notice) => {
      console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
    },
  });
  return { client, db: drizzle(client, { schema }) };
}

export function getDb(): Database {
  if (!handle) {
    handle = connect();
  }
  return handle.db;
}

export async function closeDb(): Promise<void> {
  if (!handle) return;
  const { client } = handle;
  handle = null;
  await client.end();
}

/**
 * Statement timeout for the transaction, so Postgres cancels a query the
 * pool guard has given up on.
 */
function statementTimeout() {
  return sql`set_config('statement_timeout', ${String(getDbConfig().DB_QUERY_TIMEOUT)}, true)`;
}

/**
 * Run `callback` in one transaction scoped to a gym. The tenant id is also
 * published as `app.current_tenant_id` for row-level security policies.
 * Work still running at the pool guard's deadline is rolled back, never committed.
 */
export async function withTenant<T>(
  tenantId: string,
  callback: (tx: Executor) => Promise<T>,
): Promise<T> {
  return guardedQuery('withTenant', (signal) =>
    getDb().transaction(async (tx) => {
      await tx.execute(
        sql`SELECT ${statementTimeout()}, set_config('app.current_tenant_id', ${tenantId}, true)`,
      );
      const result = await callback(tx);
      signal.throwIfAborted();
      return result;
    }),
  );
}

/** Transaction without a tenant scope, for onboarding a new gym. */
export async function withTransaction<T>(
  opName: string,
  callback: (tx: Executor) => Promise<T>,
): Promise<T> {
  return guardedQuery(opName, (signal) =>
    getDb().transaction(async (tx) => {
      await tx.execute(sql`SELECT ${statementTimeout()}`);
      const result = await callback(tx);
      signal.throwIfAborted();
      return result;
    }),
  );
}

export { sql, schema };
