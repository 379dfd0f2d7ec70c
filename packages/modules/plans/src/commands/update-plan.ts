import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { computeChanges } from '@gymledger/core/audit/diff';
import type { AuditChanges } from '@gymledger/core';
import { requireRole, resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import type { RequestContext } from '@gymledger/core/auth/context';
import { NotFoundError, firstOrThrow, parseInput, toAmountString } from '@gymledger/shared';
import { membershipPlans } from '@gymledger/db';
import { updatePlanSchema } from '../validation';
import type { UpdatePlanInput } from '../validation';
import type { MembershipPlan } from '../types';
import { PLAN_EVENTS } from '../events';
import { lockPlan } from '../helpers/lock-plan';

/**
 * Edit a plan. Memberships already assigned keep the end date computed from
 * the duration at their assignment.
 */
export async function updatePlan(ctx: RequestContext, input: UpdatePlanInput): Promise<MembershipPlan> {
  requireRole(ctx, 'OWNER');
  const data = parseInput(updatePlanSchema, input);

  const { plan, changes } = await publishWithOutbox<{ plan: MembershipPlan; changes: AuditChanges | undefined }>(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx, 'OWNER');

    const existing = await lockPlan(tx, ctx, data.planId);
    if (existing.deletedAt) throw new NotFoundError('Membership plan', data.planId);

    const patch = {
      name: data.name ?? existing.name,
      durationDays: data.durationDays ?? existing.durationDays,
      price: data.price === undefined ? existing.price : toAmountString(data.price),
      description: data.description === undefined ? existing.description : data.description,
    };
    const changes = computeChanges(
      {
        name: existing.name,
        durationDays: existing.durationDays,
        price: existing.price,
        description: existing.description,
      },
      patch,
    );
    if (!changes) return { result: { plan: existing, changes }, events: [] };

    const updated = firstOrThrow(
      await tx
        .update(membershipPlans)
        .set({ ...patch, updatedAt: new Date() })
        .where(and(eq(membershipPlans.id, existing.id), eq(membershipPlans.gymId, ctx.tenantId)))
        .returning(),
      'updatePlan',
    );

    const event = buildEventFromContext(ctx, PLAN_EVENTS.UPDATED, { planId: updated.id, changes });
    return { result: { plan: updated, changes }, events: [event] };
  });

  if (changes) {
    await auditLog(ctx, 'plan.updated', 'membership_plan', plan.id, changes);
  }
  return plan;
}
