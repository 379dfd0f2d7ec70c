import { and, eq, isNull } from 'drizzle-orm';
import { withTenant, memberships } from '@gymledger/db';
import { NotFoundError } from '@gymledger/shared';
import type { Membership } from '../types';

export async function getMembership(
  tenantId: string,
  membershipId: string,
  options: { includeDeleted?: boolean } = {},
): Promise<Membership> {
  return withTenant(tenantId, async (tx) => {
    const [row] = await tx
      .select()
      .from(memberships)
      .where(
        and(
          eq(memberships.id, membershipId),
          eq(memberships.gymId, tenantId),
          options.includeDeleted ? undefined : isNull(memberships.deletedAt),
        ),
      )
      .limit(1);
    if (!row) throw new NotFoundError('Membership', membershipId);
    return row;
  });
}
