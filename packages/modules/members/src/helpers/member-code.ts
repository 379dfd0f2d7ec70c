import { and, eq, isNull, sql } from 'drizzle-orm';
import { memberCodeCounters, members } from '@gymledger/db';
import type { Executor } from '@gymledger/db';
import { firstOrThrow } from '@gymledger/shared';

/** "MBR" + 7 -> "MBR-0007". Numbers past 9999 keep all their digits. */
export function formatMemberCode(prefix: string, sequence: number): string {
  return `${prefix}-${String(sequence).padStart(4, '0')}`;
}

/**
 * Second phase of member creation: derive the code from a per-gym counter
 * and write it once. A member that already has a code keeps it, and the
 * counter only moves forward, so no code is ever handed out twice.
 */
export async function assignMemberCode(
  tx: Executor,
  gymId: string,
  memberId: string,
  prefix: string,
): Promise<string> {
  const [current] = await tx
    .select({ memberCode: members.memberCode })
    .from(members)
    .where(eq(members.id, memberId))
    .limit(1)
    .for('update');
  if (current?.memberCode) return current.memberCode;

  const counter = firstOrThrow(
    await tx
      .insert(memberCodeCounters)
      .values({ gymId, lastNumber: 1 })
      .onConflictDoUpdate({
        target: memberCodeCounters.gymId,
        set: { lastNumber: sql`${memberCodeCounters.lastNumber} + 1` },
      })
      .returning({ lastNumber: memberCodeCounters.lastNumber }),
    'reserveMemberCode',
  );

  const code = formatMemberCode(prefix, counter.lastNumber);
  const updated = firstOrThrow(
    await tx
      .update(members)
      .set({ memberCode: code })
      .where(and(eq(members.id, memberId), isNull(members.memberCode)))
      .returning({ memberCode: members.memberCode }),
    'assignMemberCode',
  );
  return updated.memberCode ?? code;
}
