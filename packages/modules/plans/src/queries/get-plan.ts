import { and, eq, isNull } from 'drizzle-orm';
import { withTenant, membershipPlans } from '@gymledger/db';
import { NotFoundError } from '@gymledger/shared';
import type { MembershipPlan } from '../types';

export async function getPlan(
  tenantId: string,
  planId: string,
  options: { includeDeleted?: boolean } = {},
): Promise<MembershipPlan> {
  return withTenant(tenantId, async (tx) => {
    const [plan] = await tx
      .select()
      .from(membershipPlans)
      .where(
        and(
          eq(membershipPlans.id, planId),
          eq(membershipPlans.gymId, tenantId),
          options.includeDeleted ? undefined : isNull(membershipPlans.deletedAt),
        ),
      )
      .limit(1);
    if (!plan) throw new NotFoundError('Membership plan', planId);
    return plan;
  });
}
