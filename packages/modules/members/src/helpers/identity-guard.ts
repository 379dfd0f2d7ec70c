import { isUniqueViolation, MEMBER_EMAIL_LIVE_INDEX, MEMBER_PHONE_LIVE_INDEX } from '@gymledger/db';
import type { Executor } from '@gymledger/db';
import { DuplicateIdentityError } from '@gymledger/shared';
import { findLiveEmailHolder, findPhoneHolders } from './identity-lookups';

export interface MemberIdentity {
  phone: string;
  email: string | null;
}

/**
 * Run a write that may take a live phone or email inside a savepoint. The
 * pre-checks cannot see a concurrent insert; when the partial unique index
 * catches one, the savepoint is rolled back and the holder is looked up so
 * the caller gets a DuplicateIdentityError naming it.
 */
export async function writeGuardingIdentity<T>(
  tx: Executor,
  gymId: string,
  identity: MemberIdentity,
  write: (sp: Executor) => Promise<T>,
  excludeMemberId?: string,
): Promise<T> {
  try {
    return await tx.transaction(write);
  } catch (err) {
    if (isUniqueViolation(err, MEMBER_PHONE_LIVE_INDEX)) {
      const holders = await findPhoneHolders(tx, gymId, identity.phone, excludeMemberId);
      const live = holders.find((h) => h.deletedAt === null);
      if (live) throw new DuplicateIdentityError('phone', live.id, null);
    }
    if (identity.email && isUniqueViolation(err, MEMBER_EMAIL_LIVE_INDEX)) {
      const holder = await findLiveEmailHolder(tx, gymId, identity.email, excludeMemberId);
      if (holder) throw new DuplicateIdentityError('email', holder, null);
    }
    throw err;
  }
}
