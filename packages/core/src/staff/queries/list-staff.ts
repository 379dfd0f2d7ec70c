import { and, asc, eq, isNull } from 'drizzle-orm';
import { withTenant, users } from '@gymledger/db';
import { parseInput } from '@gymledger/shared';
import { toStaffProfile } from '../types';
import type { StaffProfile } from '../types';
import { listStaffSchema } from '../validation';
import type { ListStaffInput } from '../validation';

export async function listStaff(tenantId: string, input: ListStaffInput = {}): Promise<StaffProfile[]> {
  const filters = parseInput(listStaffSchema, input);
  return withTenant(tenantId, async (tx) => {
    const rows = await tx
      .select()
      .from(users)
      .where(
        and(
          eq(users.gymId, tenantId),
          filters.includeDeleted ? undefined : isNull(users.deletedAt),
          filters.role ? eq(users.role, filters.role) : undefined,
        ),
      )
      .orderBy(asc(users.name), asc(users.id));
    return rows.map(toStaffProfile);
  });
}
