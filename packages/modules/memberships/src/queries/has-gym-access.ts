import { withTenant } from '@gymledger/db';
import type { Executor } from '@gymledger/db';
import { evaluateGymAccess } from '../helpers/gym-access';
import { loadGrantingMemberships, loadMemberRow } from '../helpers/admission-state';

/**
 * Whether the member may use the gym on the calendar date of `asOf`. A member
 * unknown to this gym has no access. Pass `tx` to evaluate inside a running
 * transaction.
 */
export async function hasGymAccess(
  tenantId: string,
  memberId: string,
  asOf: Date,
  tx?: Executor,
): Promise<boolean> {
  const evaluate = async (exec: Executor) => {
    const member = await loadMemberRow(exec, memberId);
    if (!member || member.gymId !== tenantId) return false;
    const granting = await loadGrantingMemberships(exec, tenantId, memberId);
    return evaluateGymAccess(member, granting, asOf);
  };
  return tx ? evaluate(tx) : withTenant(tenantId, evaluate);
}
