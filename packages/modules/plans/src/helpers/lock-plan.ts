import { eq } from 'drizzle-orm';
import { membershipPlans } from '@gymledger/db';
import type { Executor } from '@gymledger/db';
import { ensureSameTenant } from '@gymledger/core/auth/tenant-guard';
import type { TenantContext } from '@gymledger/core/auth/context';
import type { MembershipPlan } from '../types';

/** Load a plan of the caller's gym FOR UPDATE, tombstoned or not. */
export async function lockPlan(tx: Executor, ctx: TenantContext, planId: string): Promise<MembershipPlan> {
  const [row] = await tx
    .select()
    .from(membershipPlans)
    .where(eq(membershipPlans.id, planId))
    .limit(1)
    .for('update');
  return ensureSameTenant(ctx, row, 'Membership plan', planId);
}
