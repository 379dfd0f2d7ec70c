import { and, asc, eq, isNull } from 'drizzle-orm';
import { withTenant, membershipPlans } from '@gymledger/db';
import { parseInput } from '@gymledger/shared';
import { listPlansSchema } from '../validation';
import type { ListPlansInput } from '../validation';
import type { MembershipPlan } from '../types';

export async function listPlans(tenantId: string, input: ListPlansInput = {}): Promise<MembershipPlan[]> {
  const filters = parseInput(listPlansSchema, input);
  return withTenant(tenantId, async (tx) =>
    tx
      .select()
      .from(membershipPlans)
      .where(
        and(
          eq(membershipPlans.gymId, tenantId),
          filters.includeInactive ? undefined : eq(membershipPlans.isActive, true),
          filters.includeDeleted ? undefined : isNull(membershipPlans.deletedAt),
        ),
      )
      .orderBy(asc(membershipPlans.durationDays), asc(membershipPlans.name)),
  );
}
