import { and, eq, inArray, isNull } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { RequestContext } from '@gymledger/core/auth/context';
import { BusinessRuleViolationError, NotFoundError, firstOrThrow } from '@gymledger/shared';
import { members, memberships, payments } from '@gymledger/db';
import type { Member } from '../types';
import { MEMBER_EVENTS } from '../events';
import {
  BLOCKING_MEMBERSHIP_STATUSES,
  BLOCKING_PAYMENT_STATUSES,
  collectDeletionBlockers,
} from '../helpers/deletion-guard';

/**
 * Tombstone a member. The member row stays locked from the blocker check to
 * the write, so a concurrent assignment cannot slip in between. Memberships,
 * check-ins and payments are left as they are.
 */
export async function softDeleteMember(ctx: RequestContext, memberId: string): Promise<Member> {
  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx);

    const [row] = await tx
      .select()
      .from(members)
      .where(eq(members.id, memberId))
      .limit(1)
      .for('update');
    const member = ensureSameTenant(ctx, row, 'Member', memberId);
    if (member.deletedAt) throw new NotFoundError('Member', memberId);

    const openMemberships = await tx
      .select({ id: memberships.id, status: memberships.status })
      .from(memberships)
      .where(
        and(
          eq(memberships.gymId, ctx.tenantId),
          eq(memberships.memberId, memberId),
          isNull(memberships.deletedAt),
          inArray(memberships.status, [...BLOCKING_MEMBERSHIP_STATUSES]),
        ),
      );
    const pendingPayments = await tx
      .select({ id: payments.id, status: payments.status })
      .from(payments)
      .where(
        and(
          eq(payments.gymId, ctx.tenantId),
          eq(payments.memberId, memberId),
          isNull(payments.deletedAt),
          inArray(payments.status, [...BLOCKING_PAYMENT_STATUSES]),
        ),
      );

    const blockers = collectDeletionBlockers(openMemberships, pendingPayments);
    if (blockers.length > 0) {
      throw new BusinessRuleViolationError(
        'Member has an active membership or a pending payment and cannot be deleted',
        blockers,
      );
    }

    const deleted = firstOrThrow(
      await tx
        .update(members)
        .set({ deletedAt: new Date(), updatedAt: new Date() })
        .where(and(eq(members.id, memberId), eq(members.gymId, ctx.tenantId)))
        .returning(),
      'softDeleteMember',
    );

    const event = buildEventFromContext(ctx, MEMBER_EVENTS.DELETED, {
      memberId,
      memberCode: deleted.memberCode,
    });
    return { result: deleted, events: [event] };
  });

  await auditLog(ctx, 'member.deleted', 'member', result.id);
  return result;
}
