import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { requireRole, resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import type { RequestContext } from '@gymledger/core/auth/context';
import { NotFoundError, firstOrThrow } from '@gymledger/shared';
import { membershipPlans } from '@gymledger/db';
import type { MembershipPlan } from '../types';
import { PLAN_EVENTS } from '../events';
import { lockPlan } from '../helpers/lock-plan';

export async function restorePlan(ctx: RequestContext, planId: string): Promise<MembershipPlan> {
  requireRole(ctx, 'OWNER');

  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx, 'OWNER');

    const existing = await lockPlan(tx, ctx, planId);
    if (!existing.deletedAt) throw new NotFoundError('Deleted membership plan', planId);

    const restored = firstOrThrow(
      await tx
        .update(membershipPlans)
        .set({ deletedAt: null, updatedAt: new Date() })
        .where(and(eq(membershipPlans.id, planId), eq(membershipPlans.gymId, ctx.tenantId)))
        .returning(),
      'restorePlan',
    );

    const event = buildEventFromContext(ctx, PLAN_EVENTS.RESTORED, { planId });
    return { result: restored, events: [event] };
  });

  await auditLog(ctx, 'plan.restored', 'membership_plan', result.id);
  return result;
}
