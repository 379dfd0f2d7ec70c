import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { RequestContext } from '@gymledger/core/auth/context';
import { NotFoundError, firstOrThrow } from '@gymledger/shared';
import { memberships } from '@gymledger/db';
import type { Membership } from '../types';
import { MEMBERSHIP_EVENTS } from '../events';
import { lockMembership } from '../helpers/admission-state';

export async function restoreMembership(ctx: RequestContext, membershipId: string): Promise<Membership> {
  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx);

    const current = ensureSameTenant(ctx, await lockMembership(tx, membershipId), 'Membership', membershipId);
    if (!current.deletedAt) throw new NotFoundError('Deleted membership', membershipId);

    const restored = firstOrThrow(
      await tx
        .update(memberships)
        .set({ deletedAt: null, updatedAt: new Date() })
        .where(and(eq(memberships.id, membershipId), eq(memberships.gymId, ctx.tenantId)))
        .returning(),
      'restoreMembership',
    );

    const event = buildEventFromContext(ctx, MEMBERSHIP_EVENTS.RESTORED, {
      membershipId,
      memberId: restored.memberId,
    });
    return { result: restored, events: [event] };
  });

  await auditLog(ctx, 'membership.restored', 'membership', result.id);
  return result;
}
