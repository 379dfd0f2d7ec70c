import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { getConfig } from '@gymledger/core/config';
import type { RequestContext } from '@gymledger/core/auth/context';
import { DuplicateIdentityError, firstOrThrow, parseInput } from '@gymledger/shared';
import { members } from '@gymledger/db';
import { createMemberSchema } from '../validation';
import type { CreateMemberInput } from '../validation';
import type { Member } from '../types';
import { MEMBER_EVENTS } from '../events';
import { assignMemberCode } from '../helpers/member-code';
import { classifyPhoneMatches } from '../helpers/identity';
import { findLiveEmailHolder, findPhoneHolders } from '../helpers/identity-lookups';
import { writeGuardingIdentity } from '../helpers/identity-guard';

export async function createMember(ctx: RequestContext, input: CreateMemberInput): Promise<Member> {
  const data = parseInput(createMemberSchema, input);
  const prefix = getConfig().MEMBER_CODE_PREFIX;

  const result = await publishWithOutbox(ctx, async (tx) => {
    const actor = await resolveActingStaff(tx, ctx);

    const match = classifyPhoneMatches(await findPhoneHolders(tx, ctx.tenantId, data.phone));
    if (match.kind === 'live_conflict') {
      throw new DuplicateIdentityError('phone', match.memberId, null);
    }
    if (match.kind === 'restorable' && !data.ignoreRestorable) {
      throw new DuplicateIdentityError('phone', null, match.memberId);
    }

    if (data.email) {
      const emailHolder = await findLiveEmailHolder(tx, ctx.tenantId, data.email);
      if (emailHolder) throw new DuplicateIdentityError('email', emailHolder, null);
    }

    // Phase one: the row gets its identity.
    const created = await writeGuardingIdentity(
      tx,
      ctx.tenantId,
      { phone: data.phone, email: data.email ?? null },
      async (sp) =>
        firstOrThrow(
          await sp
            .insert(members)
            .values({
              gymId: ctx.tenantId,
              fullName: data.fullName,
              phone: data.phone,
              email: data.email ?? null,
              gender: data.gender,
              dateOfBirth: data.dateOfBirth ?? null,
              status: data.status,
              createdBy: actor.id,
            })
            .returning(),
          'createMember',
        ),
    );

    // Phase two: the code derived from it, written exactly once.
    const memberCode = await assignMemberCode(tx, ctx.tenantId, created.id, prefix);
    const member: Member = { ...created, memberCode };

    const event = buildEventFromContext(ctx, MEMBER_EVENTS.CREATED, {
      memberId: member.id,
      memberCode,
      status: member.status,
      createdBy: actor.id,
    });

    return { result: member, events: [event] };
  });

  await auditLog(ctx, 'member.created', 'member', result.id);
  return result;
}
