import type { TenantContext } from '../auth/context';
import { getAuditLogger } from './index';
import type { AuditChanges } from './index';

/**
 * Log an audit entry for a command. Staff contexts are recorded as the
 * acting user; contexts without a user (kiosk check-in) as the system.
 * Call after the business transaction has committed.
 */
export async function auditLog(
  ctx: TenantContext,
  action: string,
  entityType: string,
  entityId: string,
  changes?: AuditChanges,
  metadata?: Record<string, unknown>,
): Promise<void> {
  const logger = getAuditLogger();
  await logger.log({
    tenantId: ctx.tenantId,
    actorUserId: ctx.user?.id,
    actorType: ctx.user ? 'user' : 'system',
    action,
    entityType,
    entityId,
    changes,
    metadata: {
      requestId: ctx.requestId,
      ...metadata,
    },
  });
}

/**
 * Log an audit entry for a system-initiated action (no user context).
 * Used by the membership status sweep.
 */
export async function auditLogSystem(
  tenantId: string,
  action: string,
  entityType: string,
  entityId: string,
  metadata?: Record<string, unknown>,
): Promise<void> {
  const logger = getAuditLogger();
  await logger.log({
    tenantId,
    actorType: 'system',
    action,
    entityType,
    entityId,
    metadata,
  });
}
