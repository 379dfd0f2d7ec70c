import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import { getConfig } from '@gymledger/core/config';
import type { RequestContext } from '@gymledger/core/auth/context';
import {
  BusinessRuleViolationError,
  ConflictError,
  MemberNotEligibleError,
  NotFoundError,
  firstOrThrow,
  parseInput,
  toCalendarDate,
} from '@gymledger/shared';
import { membershipPlans, memberships } from '@gymledger/db';
import { renewMembershipSchema } from '../validation';
import type { RenewMembershipInput } from '../validation';
import type { RenewalResult } from '../types';
import { MEMBERSHIP_EVENTS } from '../events';
import {
  assertMembershipTransition,
  computeEndDate,
  isTerminalStatus,
  renewalWindowOpens,
} from '../helpers/lifecycle';
import { loadMemberRow, lockMembership } from '../helpers/admission-state';

/**
 * Renew a membership that is due. The successor starts on the predecessor's
 * end date and runs for the plan's current duration; the predecessor returns
 * to ACTIVE with `renewedAt` set so the sweep never flags it again.
 */
export async function renewMembership(ctx: RequestContext, input: RenewMembershipInput): Promise<RenewalResult> {
  const data = parseInput(renewMembershipSchema, input);
  const asOfDate = toCalendarDate(data.asOf);
  const windowDays = getConfig().RENEWAL_WINDOW_DAYS;

  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx);

    const current = ensureSameTenant(
      ctx,
      await lockMembership(tx, data.membershipId),
      'Membership',
      data.membershipId,
    );
    if (current.deletedAt) throw new NotFoundError('Membership', data.membershipId);
    if (current.renewedAt) throw new ConflictError('Membership has already been renewed');
    if (isTerminalStatus(current.status)) {
      assertMembershipTransition(current.status, 'ACTIVE');
    }
    if (current.status === 'ACTIVE' && asOfDate < renewalWindowOpens(current.endDate, windowDays)) {
      throw new BusinessRuleViolationError('Membership is not yet within its renewal window', [
        { kind: 'membership', id: current.id, status: current.status },
      ]);
    }

    const member = await loadMemberRow(tx, current.memberId, 'update');
    if (!member || member.deletedAt) {
      throw new MemberNotEligibleError(current.memberId, 'deleted');
    }

    const [plan] = await tx
      .select()
      .from(membershipPlans)
      .where(and(eq(membershipPlans.id, current.membershipPlanId), eq(membershipPlans.gymId, ctx.tenantId)))
      .limit(1);
    if (!plan || plan.deletedAt || !plan.isActive) {
      throw new BusinessRuleViolationError('Plan is not available for renewal', [
        { kind: 'plan', id: current.membershipPlanId, status: !plan || plan.deletedAt ? 'DELETED' : 'INACTIVE' },
      ]);
    }

    const previous = firstOrThrow(
      await tx
        .update(memberships)
        .set({ status: 'ACTIVE', renewedAt: new Date(), updatedAt: new Date() })
        .where(
          and(
            eq(memberships.id, current.id),
            eq(memberships.gymId, ctx.tenantId),
            eq(memberships.status, current.status),
          ),
        )
        .returning(),
      'renewMembership',
    );

    const startDate = current.endDate;
    const renewal = firstOrThrow(
      await tx
        .insert(memberships)
        .values({
          gymId: ctx.tenantId,
          memberId: current.memberId,
          membershipPlanId: plan.id,
          startDate,
          endDate: computeEndDate(startDate, plan.durationDays),
          status: 'ACTIVE',
          autoRenew: current.autoRenew,
          renewedFromId: current.id,
        })
        .returning(),
      'renewMembership',
    );

    const event = buildEventFromContext(ctx, MEMBERSHIP_EVENTS.RENEWED, {
      membershipId: renewal.id,
      renewedFromId: previous.id,
      memberId: renewal.memberId,
      startDate: renewal.startDate,
      endDate: renewal.endDate,
    });
    return { result: { previous, renewal }, events: [event] };
  });

  await auditLog(ctx, 'membership.renewed', 'membership', result.renewal.id, undefined, {
    renewedFromId: result.previous.id,
  });
  return result;
}
