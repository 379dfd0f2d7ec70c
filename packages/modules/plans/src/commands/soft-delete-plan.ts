import { and, eq, inArray, isNull } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { requireRole, resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import type { RequestContext } from '@gymledger/core/auth/context';
import {
  ACCESS_GRANTING_STATUSES,
  BusinessRuleViolationError,
  NotFoundError,
  firstOrThrow,
} from '@gymledger/shared';
import { membershipPlans, memberships } from '@gymledger/db';
import type { MembershipPlan } from '../types';
import { PLAN_EVENTS } from '../events';
import { lockPlan } from '../helpers/lock-plan';

export async function softDeletePlan(ctx: RequestContext, planId: string): Promise<MembershipPlan> {
  requireRole(ctx, 'OWNER');

  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx, 'OWNER');

    const existing = await lockPlan(tx, ctx, planId);
    if (existing.deletedAt) throw new NotFoundError('Membership plan', planId);

    const live = await tx
      .select({ id: memberships.id, status: memberships.status })
      .from(memberships)
      .where(
        and(
          eq(memberships.gymId, ctx.tenantId),
          eq(memberships.membershipPlanId, planId),
          isNull(memberships.deletedAt),
          inArray(memberships.status, [...ACCESS_GRANTING_STATUSES]),
        ),
      );
    if (live.length > 0) {
      throw new BusinessRuleViolationError(
        'Plan is referenced by live memberships and cannot be deleted',
        live.map((m) => ({ kind: 'membership' as const, id: m.id, status: m.status })),
      );
    }

    const deleted = firstOrThrow(
      await tx
        .update(membershipPlans)
        .set({ deletedAt: new Date(), updatedAt: new Date() })
        .where(and(eq(membershipPlans.id, planId), eq(membershipPlans.gymId, ctx.tenantId)))
        .returning(),
      'softDeletePlan',
    );

    const event = buildEventFromContext(ctx, PLAN_EVENTS.DELETED, { planId });
    return { result: deleted, events: [event] };
  });

  await auditLog(ctx, 'plan.deleted', 'membership_plan', result.id);
  return result;
}
