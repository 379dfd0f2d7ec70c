import { and, desc, eq, isNull } from 'drizzle-orm';
import { withTenant, memberships } from '@gymledger/db';
import type { Membership } from '../types';

/** Newest first. Tombstoned memberships are hidden unless asked for. */
export async function listMemberMemberships(
  tenantId: string,
  memberId: string,
  options: { includeDeleted?: boolean } = {},
): Promise<Membership[]> {
  return withTenant(tenantId, async (tx) =>
    tx
      .select()
      .from(memberships)
      .where(
        and(
          eq(memberships.gymId, tenantId),
          eq(memberships.memberId, memberId),
          options.includeDeleted ? undefined : isNull(memberships.deletedAt),
        ),
      )
      .orderBy(desc(memberships.startDate), desc(memberships.id)),
  );
}
