import { and, eq } from 'drizzle-orm';
import { withTenant, payments } from '@gymledger/db';
import { NotFoundError } from '@gymledger/shared';
import type { Payment } from '../types';

export async function getPayment(tenantId: string, paymentId: string): Promise<Payment> {
  return withTenant(tenantId, async (tx) => {
    const [payment] = await tx
      .select()
      .from(payments)
      .where(and(eq(payments.id, paymentId), eq(payments.gymId, tenantId)))
      .limit(1);
    if (!payment) throw new NotFoundError('Payment', paymentId);
    return payment;
  });
}
