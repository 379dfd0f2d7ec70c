import { and, eq, isNull } from 'drizzle-orm';
import { withTenant, members } from '@gymledger/db';
import { NotFoundError } from '@gymledger/shared';
import type { Member } from '../types';

export async function getMember(
  tenantId: string,
  memberId: string,
  options: { includeDeleted?: boolean } = {},
): Promise<Member> {
  return withTenant(tenantId, async (tx) => {
    const [member] = await tx
      .select()
      .from(members)
      .where(
        and(
          eq(members.id, memberId),
          eq(members.gymId, tenantId),
          options.includeDeleted ? undefined : isNull(members.deletedAt),
        ),
      )
      .limit(1);
    if (!member) throw new NotFoundError('Member', memberId);
    return member;
  });
}
