// ── Context ──────────────────────────────────────────────────────
export type { AuthUser, TenantContext, RequestContext } from './auth/context';
export { ensureSameTenant } from './auth/tenant-guard';

// ── Ambient ──────────────────────────────────────────────────────
export { logger, log, setLogLevel, serializeError } from './observability/logger';
export type { LogLevel, LogEntry } from './observability/logger';
export { getConfig, loadConfig, resetConfig } from './config';
export type { AppConfig } from './config';

// ── Audit & events ───────────────────────────────────────────────
export {
  getAuditLogger,
  setAuditLogger,
  DrizzleAuditLogger,
  auditLog,
  auditLogSystem,
  computeChanges,
} from './audit';
export type { AuditEntry, AuditLogger, AuditChanges, AuditQueryFilters } from './audit';
export {
  getOutboxWriter,
  setOutboxWriter,
  DrizzleOutboxWriter,
  buildEvent,
  buildEventFromContext,
  publishWithOutbox,
  publishEventsOnly,
} from './events';
export type { OutboxWriter } from './events';

// ── Tenant Store ─────────────────────────────────────────────────
export * from './tenants';

// ── Identity & Staff Registry ────────────────────────────────────
export * from './staff';
