import { and, eq, inArray, isNull } from 'drizzle-orm';
import { members, memberships } from '@gymledger/db';
import type { Executor } from '@gymledger/db';
import { ACCESS_GRANTING_STATUSES } from '@gymledger/shared';

export type RowLock = 'update' | 'share';

/**
 * Load a member by id without a tenant filter so callers can tell a foreign
 * row from a missing one. Tombstoned rows are included.
 */
export async function loadMemberRow(tx: Executor, memberId: string, lock?: RowLock) {
  const query = tx.select().from(members).where(eq(members.id, memberId)).limit(1);
  const [row] = lock ? await query.for(lock) : await query;
  return row;
}

/** Live memberships of a member that may still grant access. */
export async function loadGrantingMemberships(
  tx: Executor,
  gymId: string,
  memberId: string,
  lock?: RowLock,
) {
  const query = tx
    .select()
    .from(memberships)
    .where(
      and(
        eq(memberships.gymId, gymId),
        eq(memberships.memberId, memberId),
        isNull(memberships.deletedAt),
        inArray(memberships.status, [...ACCESS_GRANTING_STATUSES]),
      ),
    );
  return lock ? await query.for(lock) : await query;
}

export async function lockMembership(tx: Executor, membershipId: string) {
  const [row] = await tx
    .select()
    .from(memberships)
    .where(eq(memberships.id, membershipId))
    .limit(1)
    .for('update');
  return row;
}
