import { and, eq } from 'drizzle-orm';
import { withTenant, members } from '@gymledger/db';
import { parseInput } from '@gymledger/shared';
import { findOrOfferRestoreSchema } from '../validation';
import type { RestoreOffer } from '../types';
import { classifyPhoneMatches } from '../helpers/identity';
import { findPhoneHolders } from '../helpers/identity-lookups';

/**
 * Look up a phone number before registering someone. A deleted member holding
 * it is offered for restore so the person keeps their history and code.
 */
export async function findOrOfferRestore(tenantId: string, phone: string): Promise<RestoreOffer> {
  const data = parseInput(findOrOfferRestoreSchema, { phone });

  return withTenant(tenantId, async (tx) => {
    const match = classifyPhoneMatches(await findPhoneHolders(tx, tenantId, data.phone));
    if (match.kind !== 'restorable') return match;

    const [member] = await tx
      .select()
      .from(members)
      .where(and(eq(members.id, match.memberId), eq(members.gymId, tenantId)))
      .limit(1);
    return member ? { kind: 'restorable', member } : { kind: 'none' };
  });
}
