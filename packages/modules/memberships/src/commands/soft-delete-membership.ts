import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { RequestContext } from '@gymledger/core/auth/context';
import { BusinessRuleViolationError, NotFoundError, firstOrThrow } from '@gymledger/shared';
import { memberships } from '@gymledger/db';
import type { Membership } from '../types';
import { MEMBERSHIP_EVENTS } from '../events';
import { isTerminalStatus } from '../helpers/lifecycle';
import { lockMembership } from '../helpers/admission-state';

/** Tombstone a finished membership. Rows that still grant access must be cancelled first. */
export async function softDeleteMembership(ctx: RequestContext, membershipId: string): Promise<Membership> {
  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx);

    const current = ensureSameTenant(ctx, await lockMembership(tx, membershipId), 'Membership', membershipId);
    if (current.deletedAt) throw new NotFoundError('Membership', membershipId);
    if (!isTerminalStatus(current.status)) {
      throw new BusinessRuleViolationError('Only expired or cancelled memberships can be deleted', [
        { kind: 'membership', id: current.id, status: current.status },
      ]);
    }

    const deleted = firstOrThrow(
      await tx
        .update(memberships)
        .set({ deletedAt: new Date(), updatedAt: new Date() })
        .where(and(eq(memberships.id, membershipId), eq(memberships.gymId, ctx.tenantId)))
        .returning(),
      'softDeleteMembership',
    );

    const event = buildEventFromContext(ctx, MEMBERSHIP_EVENTS.DELETED, {
      membershipId,
      memberId: deleted.memberId,
    });
    return { result: deleted, events: [event] };
  });

  await auditLog(ctx, 'membership.deleted', 'membership', result.id);
  return result;
}
