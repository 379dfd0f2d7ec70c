import { and, eq, isNotNull, isNull, ne } from 'drizzle-orm';
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

export async function restoreStaff(ctx: RequestContext, userId: string): Promise<StaffProfile> {
  requireRole(ctx, 'OWNER');

  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx, 'OWNER');

    const [row] = await tx
      .select()
      .from(users)
      .where(and(eq(users.id, userId), isNotNull(users.deletedAt)))
      .limit(1);
    const target = ensureSameTenant(ctx, row, 'Deleted staff account', userId);

    const [emailTaken] = await tx
      .select({ id: users.id })
      .from(users)
      .where(and(eq(users.email, target.email), isNull(users.deletedAt), ne(users.id, target.id)))
      .limit(1);
    if (emailTaken) {
      throw new ConflictError('Another live account now uses this email');
    }

    const restored = firstOrThrow(
      await tx
        .update(users)
        .set({ deletedAt: null, updatedAt: new Date() })
        .where(and(eq(users.id, target.id), eq(users.gymId, ctx.tenantId)))
        .returning(),
      'restoreStaff',
    );

    const event = buildEventFromContext(ctx, 'identity.staff.restored.v1', { userId: restored.id });
    return { result: toStaffProfile(restored), events: [event] };
  });

  await auditLog(ctx, 'staff.restored', 'user', result.id);
  return result;
}
