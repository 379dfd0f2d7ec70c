import { and, eq } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLog } from '@gymledger/core/audit/helpers';
import { resolveActingStaff } from '@gymledger/core/staff/acting-staff';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { RequestContext } from '@gymledger/core/auth/context';
import { NotFoundError, firstOrThrow, parseInput } from '@gymledger/shared';
import type { PaymentStatus } from '@gymledger/shared';
import { payments } from '@gymledger/db';
import { transitionPaymentStatusSchema } from '../validation';
import type { TransitionPaymentStatusInput } from '../validation';
import type { Payment } from '../types';
import { LEDGER_EVENTS } from '../events';
import { assertPaymentTransition } from '../helpers/payment-transitions';

/** Move a payment along PENDING -> PAID | CANCELLED, PAID -> REFUNDED. Only `status` changes. */
export async function transitionPaymentStatus(
  ctx: RequestContext,
  input: TransitionPaymentStatusInput,
): Promise<Payment> {
  const data = parseInput(transitionPaymentStatusSchema, input);

  const { payment, from } = await publishWithOutbox<{ payment: Payment; from: PaymentStatus }>(
    ctx,
    async (tx) => {
      await resolveActingStaff(tx, ctx);

      const [row] = await tx
        .select()
        .from(payments)
        .where(eq(payments.id, data.paymentId))
        .limit(1)
        .for('update');
      const current = ensureSameTenant(ctx, row, 'Payment', data.paymentId);
      if (current.deletedAt) throw new NotFoundError('Payment', data.paymentId);
      assertPaymentTransition(current.status, data.status);

      const updated = firstOrThrow(
        await tx
          .update(payments)
          .set({ status: data.status, updatedAt: new Date() })
          .where(
            and(
              eq(payments.id, current.id),
              eq(payments.gymId, ctx.tenantId),
              eq(payments.status, current.status),
            ),
          )
          .returning(),
        'transitionPaymentStatus',
      );

      const event = buildEventFromContext(ctx, LEDGER_EVENTS.PAYMENT_STATUS_CHANGED, {
        paymentId: updated.id,
        memberId: updated.memberId,
        from: current.status,
        to: updated.status,
        amount: updated.amount,
      });
      return { result: { payment: updated, from: current.status }, events: [event] };
    },
  );

  await auditLog(ctx, 'payment.status_changed', 'payment', payment.id, {
    status: { old: from, new: payment.status },
  });
  return payment;
}
