import { and, desc, eq, gte, isNull, lt } from 'drizzle-orm';
import { withTenant, members, payments } from '@gymledger/db';
import { parseInput } from '@gymledger/shared';
import type { CursorPage } from '@gymledger/shared';
import { listPaymentsSchema } from '../validation';
import type { ListPaymentsInput } from '../validation';
import type { PaymentListItem } from '../types';

export type ListPaymentsResult = CursorPage<PaymentListItem>;

/**
 * Payments of a gym, newest first. Unlike the other registries this includes
 * payments of tombstoned members by default and flags them.
 */
export async function listPayments(
  tenantId: string,
  input: ListPaymentsInput = {},
): Promise<ListPaymentsResult> {
  const filters = parseInput(listPaymentsSchema, input);

  return withTenant(tenantId, async (tx) => {
    const rows = await tx
      .select({
        payment: payments,
        memberCode: members.memberCode,
        memberName: members.fullName,
        memberDeletedAt: members.deletedAt,
      })
      .from(payments)
      .innerJoin(members, and(eq(members.id, payments.memberId), eq(members.gymId, payments.gymId)))
      .where(
        and(
          eq(payments.gymId, tenantId),
          isNull(payments.deletedAt),
          filters.memberId ? eq(payments.memberId, filters.memberId) : undefined,
          filters.status ? eq(payments.status, filters.status) : undefined,
          filters.paymentFor ? eq(payments.paymentFor, filters.paymentFor) : undefined,
          filters.method ? eq(payments.method, filters.method) : undefined,
          filters.from ? gte(payments.createdAt, filters.from) : undefined,
          filters.to ? lt(payments.createdAt, filters.to) : undefined,
          filters.excludeDeletedMembers ? isNull(members.deletedAt) : undefined,
          filters.cursor ? lt(payments.id, filters.cursor) : undefined,
        ),
      )
      .orderBy(desc(payments.id))
      .limit(filters.limit + 1);

    const hasMore = rows.length > filters.limit;
    const page = hasMore ? rows.slice(0, filters.limit) : rows;
    const items = page.map((r) => ({
      ...r.payment,
      memberCode: r.memberCode,
      memberName: r.memberName,
      memberDeleted: r.memberDeletedAt !== null,
    }));
    const last = items[items.length - 1];

    return { items, cursor: hasMore && last ? last.id : null, hasMore };
  });
}
