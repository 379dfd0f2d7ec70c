import { NotFoundError, TenantIsolationViolationError } from '@gymledger/shared';
import type { TenantContext } from './context';
import { logger } from '../observability/logger';

/**
 * Narrow a row looked up by primary key to the caller's gym.
 *
 * A missing row is `NotFoundError`; a row owned by another gym is
 * `TenantIsolationViolationError`. The warning logged for the latter carries
 * only the caller's own identifiers.
 */
export function ensureSameTenant<T extends { gymId: string }>(
  ctx: TenantContext,
  row: T | undefined,
  entity: string,
  id: string,
): T {
  if (!row) throw new NotFoundError(entity, id);
  if (row.gymId !== ctx.tenantId) {
    logger.warn('Tenant isolation violation', {
      tenantId: ctx.tenantId,
      requestId: ctx.requestId,
      userId: ctx.user?.id,
      entity,
    });
    throw new TenantIsolationViolationError(entity);
  }
  return row;
}
