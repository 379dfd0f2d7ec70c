import { eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { RequestContext } from '@gymledger/core/auth/context';
import { NotFoundError, ValidationError, firstOrThrow, parseInput, toAmountString } from '@gymledger/shared';
import { members, memberships, payments } from '@gymledger/db';
import { recordPaymentSchema } from '../validation';
import type { RecordPaymentInput } from '../validation';
import type { Payment } from '../types';
import { LEDGER_EVENTS } from '../events';

/**
 * Record a charge against a live member. The amount is fixed here; later
 * corrections are new payments, never edits.
 */
export async function recordPayment(ctx: RequestContext, input: RecordPaymentInput): Promise<Payment> {
  const data = parseInput(recordPaymentSchema, input);

  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx);

    const [memberRow] = await tx
      .select()
      .from(members)
      .where(eq(members.id, data.memberId))
      .limit(1)
      .for('share');
    const member = ensureSameTenant(ctx, memberRow, 'Member', data.memberId);
    if (member.deletedAt) throw new NotFoundError('Member', data.memberId);

    if (data.membershipId) {
      const [membershipRow] = await tx
        .select()
        .from(memberships)
        .where(eq(memberships.id, data.membershipId))
        .limit(1);
      const membership = ensureSameTenant(ctx, membershipRow, 'Membership', data.membershipId);
      if (membership.memberId !== member.id) {
        throw new ValidationError('Membership belongs to another member', [
          { field: 'membershipId', message: 'Must reference a membership of the paying member' },
        ]);
      }
    }

    const created = firstOrThrow(
      await tx
        .insert(payments)
        .values({
          gymId: ctx.tenantId,
          memberId: member.id,
          membershipId: data.membershipId ?? null,
          amount: toAmountString(data.amount),
          paymentFor: data.paymentFor,
          method: data.method,
          status: data.status,
          notes: data.notes ?? null,
        })
        .returning(),
      'recordPayment',
    );

    const event = buildEventFromContext(ctx, LEDGER_EVENTS.PAYMENT_RECORDED, {
      paymentId: created.id,
      memberId: created.memberId,
      membershipId: created.membershipId,
      amount: created.amount,
      paymentFor: created.paymentFor,
      method: created.method,
      status: created.status,
    });
    return { result: created, events: [event] };
  });

  await auditLog(ctx, 'payment.recorded', 'payment', result.id, undefined, {
    memberId: result.memberId,
    amount: result.amount,
    status: result.status,
  });
  return result;
}
