import type { BusinessRuleBlocker, MembershipStatus, PaymentStatus } from '@gymledger/shared';

const BLOCKING_MEMBERSHIP_STATUSES: readonly MembershipStatus[] = ['ACTIVE', 'PENDING_RENEWAL'];
const BLOCKING_PAYMENT_STATUSES: readonly PaymentStatus[] = ['PENDING'];

/** Everything that must be settled before a member can be tombstoned. */
export function collectDeletionBlockers(
  memberships: ReadonlyArray<{ id: string; status: MembershipStatus }>,
  payments: ReadonlyArray<{ id: string; status: PaymentStatus }>,
): BusinessRuleBlocker[] {
  return [
    ...memberships
      .filter((m) => BLOCKING_MEMBERSHIP_STATUSES.includes(m.status))
      .map((m) => ({ kind: 'membership' as const, id: m.id, status: m.status })),
    ...payments
      .filter((p) => BLOCKING_PAYMENT_STATUSES.includes(p.status))
      .map((p) => ({ kind: 'payment' as const, id: p.id, status: p.status })),
  ];
}

export { BLOCKING_MEMBERSHIP_STATUSES, BLOCKING_PAYMENT_STATUSES };
