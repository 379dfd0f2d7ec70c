import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { computeChanges } from '@gymledger/core/audit/diff';
import type { AuditChanges } from '@gymledger/core';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { RequestContext } from '@gymledger/core/auth/context';
import { DuplicateIdentityError, NotFoundError, firstOrThrow, parseInput } from '@gymledger/shared';
import { members } from '@gymledger/db';
import { updateMemberSchema } from '../validation';
import type { UpdateMemberInput } from '../validation';
import type { Member } from '../types';
import { MEMBER_EVENTS } from '../events';
import { findLiveEmailHolder, findPhoneHolders } from '../helpers/identity-lookups';
import { writeGuardingIdentity } from '../helpers/identity-guard';

export async function updateMember(ctx: RequestContext, input: UpdateMemberInput): Promise<Member> {
  const data = parseInput(updateMemberSchema, input);

  const { member, changes } = await publishWithOutbox<{ member: Member; changes: AuditChanges | undefined }>(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx);

    const [row] = await tx
      .select()
      .from(members)
      .where(eq(members.id, data.memberId))
      .limit(1)
      .for('update');
    const existing = ensureSameTenant(ctx, row, 'Member', data.memberId);
    if (existing.deletedAt) throw new NotFoundError('Member', data.memberId);

    // The member code is not part of the editable set.
    const patch = {
      fullName: data.fullName ?? existing.fullName,
      phone: data.phone ?? existing.phone,
      email: data.email === undefined ? existing.email : data.email,
      gender: data.gender ?? existing.gender,
      dateOfBirth: data.dateOfBirth === undefined ? existing.dateOfBirth : data.dateOfBirth,
      status: data.status ?? existing.status,
    };

    if (patch.phone !== existing.phone) {
      const holders = await findPhoneHolders(tx, ctx.tenantId, patch.phone, existing.id);
      const live = holders.find((h) => h.deletedAt === null);
      if (live) throw new DuplicateIdentityError('phone', live.id, null);
    }
    if (patch.email && patch.email !== existing.email) {
      const emailHolder = await findLiveEmailHolder(tx, ctx.tenantId, patch.email, existing.id);
      if (emailHolder) throw new DuplicateIdentityError('email', emailHolder, null);
    }

    const changes = computeChanges(
      {
        fullName: existing.fullName,
        phone: existing.phone,
        email: existing.email,
        gender: existing.gender,
        dateOfBirth: existing.dateOfBirth,
        status: existing.status,
      },
      patch,
    );
    if (!changes) {
      return { result: { member: existing, changes }, events: [] };
    }

    const updated = await writeGuardingIdentity(
      tx,
      ctx.tenantId,
      patch,
      async (sp) =>
        firstOrThrow(
          await sp
            .update(members)
            .set({ ...patch, updatedAt: new Date() })
            .where(and(eq(members.id, existing.id), eq(members.gymId, ctx.tenantId)))
            .returning(),
          'updateMember',
        ),
      existing.id,
    );

    const event = buildEventFromContext(ctx, MEMBER_EVENTS.UPDATED, {
      memberId: updated.id,
      changes,
    });
    return { result: { member: updated, changes }, events: [event] };
  });

  if (changes) {
    await auditLog(ctx, 'member.updated', 'member', member.id, changes);
  }
  return member;
}
