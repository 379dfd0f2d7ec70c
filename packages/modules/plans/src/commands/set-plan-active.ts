import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { requireRole, resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import type { RequestContext } from '@gymledger/core/auth/context';
import { NotFoundError, firstOrThrow, parseInput } from '@gymledger/shared';
import { membershipPlans } from '@gymledger/db';
import { setPlanActiveSchema } from '../validation';
import type { SetPlanActiveInput } from '../validation';
import type { MembershipPlan } from '../types';
import { PLAN_EVENTS } from '../events';
import { lockPlan } from '../helpers/lock-plan';

/** An inactive plan is hidden from new assignments; its memberships are untouched. */
export async function setPlanActive(ctx: RequestContext, input: SetPlanActiveInput): Promise<MembershipPlan> {
  requireRole(ctx, 'OWNER');
  const data = parseInput(setPlanActiveSchema, input);

  const { plan, changed } = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx, 'OWNER');

    const existing = await lockPlan(tx, ctx, data.planId);
    if (existing.deletedAt) throw new NotFoundError('Membership plan', data.planId);
    if (existing.isActive === data.isActive) {
      return { result: { plan: existing, changed: false }, events: [] };
    }

    const updated = firstOrThrow(
      await tx
        .update(membershipPlans)
        .set({ isActive: data.isActive, updatedAt: new Date() })
        .where(and(eq(membershipPlans.id, existing.id), eq(membershipPlans.gymId, ctx.tenantId)))
        .returning(),
      'setPlanActive',
    );

    const event = buildEventFromContext(
      ctx,
      data.isActive ? PLAN_EVENTS.ACTIVATED : PLAN_EVENTS.DEACTIVATED,
      { planId: updated.id },
    );
    return { result: { plan: updated, changed: true }, events: [event] };
  });

  if (changed) {
    await auditLog(
      ctx,
      plan.isActive ? 'plan.activated' : 'plan.deactivated',
      'membership_plan',
      plan.id,
      { isActive: { old: !plan.isActive, new: plan.isActive } },
    );
  }
  return plan;
}
