import type { memberships } from '@gymledger/db';

export type Membership = typeof memberships.$inferSelect;

export interface StatusSweepResult {
  transitioned: number;
  toPendingRenewal: number;
  toExpired: number;
}

export interface RenewalResult {
  previous: Membership;
  renewal: Membership;
}
