import { and, desc, eq, isNull, ne } from 'drizzle-orm';
import { members } from '@gymledger/db';
import type { Executor } from '@gymledger/db';
import type { PhoneHolder } from './identity';

export async function findPhoneHolders(
  tx: Executor,
  gymId: string,
  phone: string,
  excludeMemberId?: string,
): Promise<PhoneHolder[]> {
  return tx
    .select({ id: members.id, deletedAt: members.deletedAt })
    .from(members)
    .where(
      and(
        eq(members.gymId, gymId),
        eq(members.phone, phone),
        excludeMemberId ? ne(members.id, excludeMemberId) : undefined,
      ),
    )
    .orderBy(desc(members.deletedAt));
}

/** Id of the live member of `gymId` using `email`, if any. */
export async function findLiveEmailHolder(
  tx: Executor,
  gymId: string,
  email: string,
  excludeMemberId?: string,
): Promise<string | null> {
  const [holder] = await tx
    .select({ id: members.id })
    .from(members)
    .where(
      and(
        eq(members.gymId, gymId),
        eq(members.email, email),
        isNull(members.deletedAt),
        excludeMemberId ? ne(members.id, excludeMemberId) : undefined,
      ),
    )
    .limit(1);
  return holder?.id ?? null;
}
