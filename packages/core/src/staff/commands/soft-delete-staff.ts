import { and, eq, isNull } from 'drizzle-orm';
import { users } from '@gymledger/db';
import { ConflictError, firstOrThrow } from '@gymledger/shared';
import type { RequestContext } from '../../auth/context';
import { ensureSameTenant } from '../../auth/tenant-guard';
import { publishWithOutbox } from '../../events/publish-with-outbox';
import { buildEventFromContext } from '../../events/build-event';
import { auditLog } from '../../audit/helpers';
import { requireRole, resolveActingStaff } from '../acting-staff';
import { toStaffProfile } from '../types';
import type { StaffProfile } from '../types';

/**
 * Off-board a staff account. Members they created keep pointing at the
 * tombstoned row; nothing cascades.
 */
export async function softDeleteStaff(ctx: RequestContext, userId: string): Promise<StaffProfile> {
  requireRole(ctx, 'OWNER');
  if (userId === ctx.user.id) {
    throw new ConflictError('You cannot delete your own account');
  }

  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx, 'OWNER');

    const [row] = await tx
      .select()
      .from(users)
      .where(and(eq(users.id, userId), isNull(users.deletedAt)))
      .limit(1);
    const target = ensureSameTenant(ctx, row, 'Staff account', userId);

    const deleted = firstOrThrow(
      await tx
        .update(users)
        .set({ deletedAt: new Date(), updatedAt: new Date() })
        .where(and(eq(users.id, target.id), eq(users.gymId, ctx.tenantId), isNull(users.deletedAt)))
        .returning(),
      'softDeleteStaff',
    );

    const event = buildEventFromContext(ctx, 'identity.staff.deleted.v1', { userId: deleted.id });
    return { result: toStaffProfile(deleted), events: [event] };
  });

  await auditLog(ctx, 'staff.deleted', 'user', result.id);
  return result;
}
