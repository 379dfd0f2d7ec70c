import { and, desc, eq, gte, isNull, lt } from 'drizzle-orm';
import { withTenant, checkIns } from '@gymledger/db';
import { parseInput } from '@gymledger/shared';
import { listCheckInsSchema } from '../validation';
import type { ListCheckInsInput } from '../validation';
import type { CheckIn } from '../types';

/** Most recent first; `from` is inclusive and `to` exclusive. */
export async function listCheckIns(tenantId: string, input: ListCheckInsInput = {}): Promise<CheckIn[]> {
  const filters = parseInput(listCheckInsSchema, input);

  return withTenant(tenantId, async (tx) =>
    tx
      .select()
      .from(checkIns)
      .where(
        and(
          eq(checkIns.gymId, tenantId),
          filters.memberId ? eq(checkIns.memberId, filters.memberId) : undefined,
          filters.from ? gte(checkIns.checkedInAt, filters.from) : undefined,
          filters.to ? lt(checkIns.checkedInAt, filters.to) : undefined,
          filters.includeDeleted ? undefined : isNull(checkIns.deletedAt),
        ),
      )
      .orderBy(desc(checkIns.checkedInAt), desc(checkIns.id))
      .limit(filters.limit),
  );
}
