import { and, eq, isNull } from 'drizzle-orm';
import { users } from '@gymledger/db';
import { ConflictError, firstOrThrow, parseInput } from '@gymledger/shared';
import type { RequestContext } from '../../auth/context';
import { ensureSameTenant } from '../../auth/tenant-guard';
import { publishWithOutbox } from '../../events/publish-with-outbox';
import { buildEventFromContext } from '../../events/build-event';
import { auditLog } from '../../audit/helpers';
import { requireRole, resolveActingStaff } from '../acting-staff';
import { toStaffProfile } from '../types';
import type { StaffProfile } from '../types';
import { setStaffStatusSchema } from '../validation';
import type { SetStaffStatusInput } from '../validation';

export async function setStaffStatus(ctx: RequestContext, input: SetStaffStatusInput): Promise<StaffProfile> {
  requireRole(ctx, 'OWNER');
  const data = parseInput(setStaffStatusSchema, input);
  if (data.userId === ctx.user.id && data.status === 'INACTIVE') {
    throw new ConflictError('You cannot deactivate your own account');
  }

  const { profile, previousStatus } = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx, 'OWNER');

    const [row] = await tx
      .select()
      .from(users)
      .where(and(eq(users.id, data.userId), isNull(users.deletedAt)))
      .limit(1);
    const target = ensureSameTenant(ctx, row, 'Staff account', data.userId);

    if (target.status === data.status) {
      return { result: { profile: toStaffProfile(target), previousStatus: target.status }, events: [] };
    }

    const updated = firstOrThrow(
      await tx
        .update(users)
        .set({ status: data.status, updatedAt: new Date() })
        .where(and(eq(users.id, target.id), eq(users.gymId, ctx.tenantId)))
        .returning(),
      'setStaffStatus',
    );

    const event = buildEventFromContext(ctx, 'identity.staff.status_changed.v1', {
      userId: updated.id,
      from: target.status,
      to: updated.status,
    });

    return { result: { profile: toStaffProfile(updated), previousStatus: target.status }, events: [event] };
  });

  if (previousStatus !== profile.status) {
    await auditLog(ctx, 'staff.status_changed', 'user', profile.id, {
      status: { old: previousStatus, new: profile.status },
    });
  }
  return profile;
}
