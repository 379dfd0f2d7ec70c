import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { RequestContext } from '@gymledger/core/auth/context';
import { DuplicateIdentityError, NotFoundError, firstOrThrow } from '@gymledger/shared';
import { members } from '@gymledger/db';
import type { Member } from '../types';
import { MEMBER_EVENTS } from '../events';
import { classifyPhoneMatches } from '../helpers/identity';
import { findLiveEmailHolder, findPhoneHolders } from '../helpers/identity-lookups';
import { writeGuardingIdentity } from '../helpers/identity-guard';

/**
 * Clear a member's tombstone. The member code is left untouched and no
 * membership is reactivated; callers re-check access and assign a new plan
 * if needed.
 */
export async function restoreMember(ctx: RequestContext, memberId: string): Promise<Member> {
  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx);

    const [row] = await tx
      .select()
      .from(members)
      .where(eq(members.id, memberId))
      .limit(1)
      .for('update');
    const member = ensureSameTenant(ctx, row, 'Member', memberId);
    if (!member.deletedAt) throw new NotFoundError('Deleted member', memberId);

    const match = classifyPhoneMatches(
      await findPhoneHolders(tx, ctx.tenantId, member.phone, member.id),
    );
    if (match.kind === 'live_conflict') {
      throw new DuplicateIdentityError('phone', match.memberId, null);
    }
    if (member.email) {
      const emailHolder = await findLiveEmailHolder(tx, ctx.tenantId, member.email, member.id);
      if (emailHolder) throw new DuplicateIdentityError('email', emailHolder, null);
    }

    const restored = await writeGuardingIdentity(
      tx,
      ctx.tenantId,
      member,
      async (sp) =>
        firstOrThrow(
          await sp
            .update(members)
            .set({ deletedAt: null, updatedAt: new Date() })
            .where(and(eq(members.id, memberId), eq(members.gymId, ctx.tenantId)))
            .returning(),
          'restoreMember',
        ),
      member.id,
    );

    const event = buildEventFromContext(ctx, MEMBER_EVENTS.RESTORED, {
      memberId,
      memberCode: restored.memberCode,
    });
    return { result: restored, events: [event] };
  });

  await auditLog(ctx, 'member.restored', 'member', result.id);
  return result;
}
