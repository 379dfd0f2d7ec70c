import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { RequestContext } from '@gymledger/core/auth/context';
import { NotFoundError, firstOrThrow, parseInput } from '@gymledger/shared';
import { memberships } from '@gymledger/db';
import { cancelMembershipSchema } from '../validation';
import type { CancelMembershipInput } from '../validation';
import type { Membership } from '../types';
import { MEMBERSHIP_EVENTS } from '../events';
import { assertMembershipTransition } from '../helpers/lifecycle';
import { lockMembership } from '../helpers/admission-state';

export async function cancelMembership(ctx: RequestContext, input: CancelMembershipInput): Promise<Membership> {
  const data = parseInput(cancelMembershipSchema, input);

  const { cancelled, from } = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx);

    const current = ensureSameTenant(
      ctx,
      await lockMembership(tx, data.membershipId),
      'Membership',
      data.membershipId,
    );
    if (current.deletedAt) throw new NotFoundError('Membership', data.membershipId);
    assertMembershipTransition(current.status, 'CANCELLED');

    const cancelled = firstOrThrow(
      await tx
        .update(memberships)
        .set({
          status: 'CANCELLED',
          cancelledAt: new Date(),
          cancelReason: data.reason ?? null,
          updatedAt: new Date(),
        })
        .where(
          and(
            eq(memberships.id, current.id),
            eq(memberships.gymId, ctx.tenantId),
            eq(memberships.status, current.status),
          ),
        )
        .returning(),
      'cancelMembership',
    );

    const event = buildEventFromContext(ctx, MEMBERSHIP_EVENTS.CANCELLED, {
      membershipId: cancelled.id,
      memberId: cancelled.memberId,
      from: current.status,
      reason: cancelled.cancelReason,
    });
    return { result: { cancelled, from: current.status }, events: [event] };
  });

  await auditLog(ctx, 'membership.cancelled', 'membership', cancelled.id, {
    status: { old: from, new: 'CANCELLED' },
  });
  return cancelled;
}
