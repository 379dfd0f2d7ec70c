import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { requireRole, resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import type { RequestContext } from '@gymledger/core/auth/context';
import { firstOrThrow, parseInput, toAmountString } from '@gymledger/shared';
import { membershipPlans } from '@gymledger/db';
import { createPlanSchema } from '../validation';
import type { CreatePlanInput } from '../validation';
import type { MembershipPlan } from '../types';
import { PLAN_EVENTS } from '../events';

export async function createPlan(ctx: RequestContext, input: CreatePlanInput): Promise<MembershipPlan> {
  requireRole(ctx, 'OWNER');
  const data = parseInput(createPlanSchema, input);

  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx, 'OWNER');

    const created = firstOrThrow(
      await tx
        .insert(membershipPlans)
        .values({
          gymId: ctx.tenantId,
          name: data.name,
          durationDays: data.durationDays,
          price: toAmountString(data.price),
          description: data.description ?? null,
          isActive: data.isActive,
        })
        .returning(),
      'createPlan',
    );

    const event = buildEventFromContext(ctx, PLAN_EVENTS.CREATED, {
      planId: created.id,
      name: created.name,
      durationDays: created.durationDays,
      price: created.price,
    });

    return { result: created, events: [event] };
  });

  await auditLog(ctx, 'plan.created', 'membership_plan', result.id);
  return result;
}
