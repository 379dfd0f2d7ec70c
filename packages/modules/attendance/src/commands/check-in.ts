import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import { logger } from '@gymledger/core/observability/logger';
import type { TenantContext } from '@gymledger/core/auth/context';
import { firstOrThrow, parseInput, toCalendarDate } from '@gymledger/shared';
import { checkIns } from '@gymledger/db';
import { evaluateAdmission } from '@gymledger/module-memberships/helpers/gym-access';
import {
  loadGrantingMemberships,
  loadMemberRow,
} from '@gymledger/module-memberships/helpers/admission-state';
import { checkInSchema } from '../validation';
import type { CheckInInput } from '../validation';
import type { CheckInResult } from '../types';
import { ATTENDANCE_EVENTS } from '../events';

/**
 * Admit a member at `asOf`, or say why not. Kiosks call this without a staff
 * user. The member and their memberships are held FOR SHARE, so a status
 * sweep or soft delete waits for the decision and the insert to commit.
 */
export async function checkIn(ctx: TenantContext, input: CheckInInput): Promise<CheckInResult> {
  const data = parseInput(checkInSchema, input);
  const asOfDate = toCalendarDate(data.asOf);

  const result = await publishWithOutbox<CheckInResult>(ctx, async (tx) => {
    const member = ensureSameTenant(
      ctx,
      await loadMemberRow(tx, data.memberId, 'share'),
      'Member',
      data.memberId,
    );
    const granting = await loadGrantingMemberships(tx, ctx.tenantId, member.id, 'share');
    const decision = evaluateAdmission(member, granting, asOfDate);

    if (!decision.admitted) {
      const event = buildEventFromContext(ctx, ATTENDANCE_EVENTS.REJECTED, {
        memberId: member.id,
        reason: decision.reason,
        admittedBy: data.admittedBy,
        asOf: data.asOf.toISOString(),
      });
      return { result: { admitted: false, reason: decision.reason }, events: [event] };
    }

    const created = firstOrThrow(
      await tx
        .insert(checkIns)
        .values({
          gymId: ctx.tenantId,
          memberId: member.id,
          checkedInAt: data.asOf,
          admittedBy: data.admittedBy,
        })
        .returning(),
      'checkIn',
    );

    const event = buildEventFromContext(ctx, ATTENDANCE_EVENTS.ADMITTED, {
      checkInId: created.id,
      memberId: member.id,
      membershipId: decision.membershipId,
      admittedBy: created.admittedBy,
      checkedInAt: created.checkedInAt.toISOString(),
    });
    return { result: { admitted: true, checkIn: created }, events: [event] };
  });

  if (!result.admitted) {
    logger.info('Check-in rejected', {
      tenantId: ctx.tenantId,
      requestId: ctx.requestId,
      userId: ctx.user?.id,
      memberId: data.memberId,
      reason: result.reason,
    });
    await auditLog(ctx, 'check_in.rejected', 'member', data.memberId, undefined, {
      reason: result.reason,
      admittedBy: data.admittedBy,
    });
    return result;
  }

  await auditLog(ctx, 'check_in.admitted', 'check_in', result.checkIn.id, undefined, {
    memberId: data.memberId,
    admittedBy: data.admittedBy,
  });
  return result;
}
