import { and, eq, isNull } from 'drizzle-orm';
import { users } from '@gymledger/db';
import type { Executor } from '@gymledger/db';
import {
  AuthenticationError,
  AuthorizationError,
  TenantIsolationViolationError,
} from '@gymledger/shared';
import type { StaffRole } from '@gymledger/shared';
import type { RequestContext, TenantContext } from '../auth/context';
import { logger } from '../observability/logger';
import type { StaffUser } from './types';

/**
 * Fail fast on the role the session claims, before any transaction opens.
 * `resolveActingStaff` re-checks against the stored role.
 */
export function requireRole(ctx: TenantContext, role: StaffRole): asserts ctx is RequestContext {
  if (!ctx.user) throw new AuthenticationError();
  if (role === 'OWNER' && ctx.user.role !== 'OWNER') {
    throw new AuthorizationError('Only the gym owner can perform this action');
  }
}

/**
 * Load the staff member acting in `ctx` inside the operation's transaction.
 * The caller's session supplies the id; this only checks that it names a
 * live, active account of the same gym (and holding `requiredRole`).
 */
export async function resolveActingStaff(
  tx: Executor,
  ctx: RequestContext,
  requiredRole?: StaffRole,
): Promise<StaffUser> {
  const [actor] = await tx
    .select()
    .from(users)
    .where(and(eq(users.id, ctx.user.id), isNull(users.deletedAt)))
    .limit(1);

  if (!actor) throw new AuthenticationError('Acting staff account not found');
  if (actor.gymId !== ctx.tenantId) {
    logger.warn('Tenant isolation violation', {
      tenantId: ctx.tenantId,
      requestId: ctx.requestId,
      userId: ctx.user.id,
      entity: 'Staff account',
    });
    throw new TenantIsolationViolationError('Staff account');
  }
  if (actor.status !== 'ACTIVE') {
    throw new AuthorizationError('Staff account is inactive');
  }
  if (requiredRole === 'OWNER' && actor.role !== 'OWNER') {
    throw new AuthorizationError('Only the gym owner can perform this action');
  }
  return actor;
}
