export { getDb, closeDb, withTenant, withTransaction, sql, schema } from './client';
export type { Database, Executor } from './client';
export { guardedQuery, resetPoolGuard } from './pool-guard';
export { loadDbConfig, getDbConfig, resetDbConfig } from './config';
export type { DbConfig } from './config';
export { isUniqueViolation } from './errors';
export * from './schema';
