import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { RequestContext } from '@gymledger/core/auth/context';
import { NotFoundError, firstOrThrow, parseInput } from '@gymledger/shared';
import { checkIns } from '@gymledger/db';
import { voidCheckInSchema } from '../validation';
import type { VoidCheckInInput } from '../validation';
import type { CheckIn } from '../types';
import { ATTENDANCE_EVENTS } from '../events';

/** Tombstone a check-in recorded in error. Check-ins are otherwise never edited. */
export async function voidCheckIn(ctx: RequestContext, input: VoidCheckInInput): Promise<CheckIn> {
  const data = parseInput(voidCheckInSchema, input);

  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx);

    const [row] = await tx
      .select()
      .from(checkIns)
      .where(eq(checkIns.id, data.checkInId))
      .limit(1)
      .for('update');
    const existing = ensureSameTenant(ctx, row, 'Check-in', data.checkInId);
    if (existing.deletedAt) throw new NotFoundError('Check-in', data.checkInId);

    const voided = firstOrThrow(
      await tx
        .update(checkIns)
        .set({ deletedAt: new Date(), voidReason: data.reason, updatedAt: new Date() })
        .where(and(eq(checkIns.id, existing.id), eq(checkIns.gymId, ctx.tenantId)))
        .returning(),
      'voidCheckIn',
    );

    const event = buildEventFromContext(ctx, ATTENDANCE_EVENTS.VOIDED, {
      checkInId: voided.id,
      memberId: voided.memberId,
      reason: data.reason,
    });
    return { result: voided, events: [event] };
  });

  await auditLog(ctx, 'check_in.voided', 'check_in', result.id, undefined, { reason: data.reason });
  return result;
}
