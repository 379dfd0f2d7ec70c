import type { membershipPlans } from '@gymledger/db';

export type MembershipPlan = typeof membershipPlans.$inferSelect;
