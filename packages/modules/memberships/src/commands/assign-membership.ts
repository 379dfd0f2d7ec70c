import { eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { RequestContext } from '@gymledger/core/auth/context';
import {
  BusinessRuleViolationError,
  MemberNotEligibleError,
  firstOrThrow,
  parseInput,
} from '@gymledger/shared';
import { membershipPlans, memberships } from '@gymledger/db';
import { assignMembershipSchema } from '../validation';
import type { AssignMembershipInput } from '../validation';
import type { Membership } from '../types';
import { MEMBERSHIP_EVENTS } from '../events';
import { computeEndDate } from '../helpers/lifecycle';
import { loadMemberRow } from '../helpers/admission-state';

/**
 * Put a member on a plan. The end date is fixed here from the plan's current
 * duration and never recomputed. The member row stays locked until commit so
 * a concurrent soft delete cannot pass its membership check.
 */
export async function assignMembership(
  ctx: RequestContext,
  input: AssignMembershipInput,
): Promise<Membership> {
  const data = parseInput(assignMembershipSchema, input);

  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx);

    const member = ensureSameTenant(
      ctx,
      await loadMemberRow(tx, data.memberId, 'update'),
      'Member',
      data.memberId,
    );

    const [planRow] = await tx
      .select()
      .from(membershipPlans)
      .where(eq(membershipPlans.id, data.planId))
      .limit(1);
    const plan = ensureSameTenant(ctx, planRow, 'Membership plan', data.planId);

    if (member.deletedAt) throw new MemberNotEligibleError(member.id, 'deleted');
    if (member.status === 'INACTIVE' && !data.allowInactiveMember) {
      throw new MemberNotEligibleError(member.id, 'inactive');
    }
    if (plan.deletedAt || !plan.isActive) {
      throw new BusinessRuleViolationError('Plan is not available for new memberships', [
        { kind: 'plan', id: plan.id, status: plan.deletedAt ? 'DELETED' : 'INACTIVE' },
      ]);
    }

    const created = firstOrThrow(
      await tx
        .insert(memberships)
        .values({
          gymId: ctx.tenantId,
          memberId: member.id,
          membershipPlanId: plan.id,
          startDate: data.startDate,
          endDate: computeEndDate(data.startDate, plan.durationDays),
          status: 'ACTIVE',
          autoRenew: data.autoRenew,
        })
        .returning(),
      'assignMembership',
    );

    const event = buildEventFromContext(ctx, MEMBERSHIP_EVENTS.ASSIGNED, {
      membershipId: created.id,
      memberId: member.id,
      planId: plan.id,
      startDate: created.startDate,
      endDate: created.endDate,
      autoRenew: created.autoRenew,
    });

    return { result: created, events: [event] };
  });

  await auditLog(ctx, 'membership.assigned', 'membership', result.id, undefined, {
    memberId: result.memberId,
    planId: result.membershipPlanId,
    overrideInactiveMember: data.allowInactiveMember || undefined,
  });
  return result;
}
