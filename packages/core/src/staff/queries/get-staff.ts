import { and, eq, isNull } from 'drizzle-orm';
import { withTenant, users } from '@gymledger/db';
import { NotFoundError } from '@gymledger/shared';
import { toStaffProfile } from '../types';
import type { StaffProfile } from '../types';

export async function getStaff(
  tenantId: string,
  userId: string,
  options: { includeDeleted?: boolean } = {},
): Promise<StaffProfile> {
  return withTenant(tenantId, async (tx) => {
    const [user] = await tx
      .select()
      .from(users)
      .where(
        and(
          eq(users.id, userId),
          eq(users.gymId, tenantId),
          options.includeDeleted ? undefined : isNull(users.deletedAt),
        ),
      )
      .limit(1);
    if (!user) throw new NotFoundError('Staff account', userId);
    return toStaffProfile(user);
  });
}
