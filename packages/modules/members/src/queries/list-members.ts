import { and, desc, eq, ilike, isNull, lt, or } from 'drizzle-orm';
import { withTenant, members } from '@gymledger/db';
import { containsPattern, parseInput } from '@gymledger/shared';
import type { CursorPage } from '@gymledger/shared';
import { listMembersSchema } from '../validation';
import type { ListMembersInput } from '../validation';
import type { Member } from '../types';

export type ListMembersResult = CursorPage<Member>;

export async function listMembers(
  tenantId: string,
  input: ListMembersInput = {},
): Promise<ListMembersResult> {
  const filters = parseInput(listMembersSchema, input);

  return withTenant(tenantId, async (tx) => {
    const pattern = filters.search ? containsPattern(filters.search) : undefined;

    const rows = await tx
      .select()
      .from(members)
      .where(
        and(
          eq(members.gymId, tenantId),
          filters.includeDeleted ? undefined : isNull(members.deletedAt),
          filters.status ? eq(members.status, filters.status) : undefined,
          filters.cursor ? lt(members.id, filters.cursor) : undefined,
          pattern
            ? or(
                ilike(members.fullName, pattern),
                ilike(members.phone, pattern),
                ilike(members.email, pattern),
                ilike(members.memberCode, pattern),
              )
            : undefined,
        ),
      )
      .orderBy(desc(members.id))
      .limit(filters.limit + 1);

    const hasMore = rows.length > filters.limit;
    const items = hasMore ? rows.slice(0, filters.limit) : rows;
    const last = items[items.length - 1];

    return {
      items,
      cursor: hasMore && last ? last.id : null,
      hasMore,
    };
  });
}
