import { and, eq, gte, inArray, isNull, lt } from 'drizzle-orm';
import { withTenant, payments } from '@gymledger/db';
import { addDays, parseInput } from '@gymledger/shared';
import { revenueSummarySchema } from '../validation';
import type { RevenueSummaryInput } from '../validation';
import type { RevenueSummary } from '../types';
import { summarizeRevenue } from '../helpers/revenue';

/**
 * Revenue between two calendar dates (both inclusive, UTC). Reporting reads
 * across member tombstones: money collected from a deleted member still counts.
 */
export async function getRevenueSummary(tenantId: string, input: RevenueSummaryInput): Promise<RevenueSummary> {
  const range = parseInput(revenueSummarySchema, input);
  const start = new Date(`${range.from}T00:00:00.000Z`);
  const end = new Date(`${addDays(range.to, 1)}T00:00:00.000Z`);

  return withTenant(tenantId, async (tx) => {
    const rows = await tx
      .select({
        amount: payments.amount,
        paymentFor: payments.paymentFor,
        method: payments.method,
        status: payments.status,
      })
      .from(payments)
      .where(
        and(
          eq(payments.gymId, tenantId),
          isNull(payments.deletedAt),
          inArray(payments.status, ['PAID', 'REFUNDED']),
          gte(payments.createdAt, start),
          lt(payments.createdAt, end),
        ),
      );
    return summarizeRevenue(rows, range.from, range.to);
  });
}
