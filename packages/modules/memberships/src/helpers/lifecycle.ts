import { InvalidStatusTransitionError, TERMINAL_MEMBERSHIP_STATUSES, addDays, isOneOf } from '@gymledger/shared';
import type { MembershipStatus } from '@gymledger/shared';

/**
 *   ACTIVE ──(inside renewal window, auto-renew)──> PENDING_RENEWAL
 *   PENDING_RENEWAL ──(renewed)──> ACTIVE
 *   ACTIVE | PENDING_RENEWAL ──(past end date)──> EXPIRED
 *   ACTIVE | PENDING_RENEWAL ──(cancelled)──> CANCELLED
 *
 * EXPIRED and CANCELLED are terminal.
 */
const TRANSITIONS: Record<MembershipStatus, readonly MembershipStatus[]> = {
  ACTIVE: ['PENDING_RENEWAL', 'EXPIRED', 'CANCELLED'],
  PENDING_RENEWAL: ['ACTIVE', 'EXPIRED', 'CANCELLED'],
  EXPIRED: [],
  CANCELLED: [],
};

export function isTerminalStatus(status: MembershipStatus): boolean {
  return isOneOf(TERMINAL_MEMBERSHIP_STATUSES, status);
}

export function canTransitionMembership(from: MembershipStatus, to: MembershipStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertMembershipTransition(from: MembershipStatus, to: MembershipStatus): void {
  if (!canTransitionMembership(from, to)) {
    throw new InvalidStatusTransitionError('membership', from, to);
  }
}

/** Inclusive last day: a 30-day plan from 2026-01-01 ends on 2026-01-31. */
export function computeEndDate(startDate: string, durationDays: number): string {
  return addDays(startDate, durationDays);
}

/** First day on which an auto-renewing membership is due for renewal. */
export function renewalWindowOpens(endDate: string, windowDays: number): string {
  return addDays(endDate, -windowDays + 1);
}

export interface SweepCandidate {
  status: MembershipStatus;
  endDate: string;
  autoRenew: boolean;
  renewedAt: Date | null;
}

/**
 * The status a membership should have on `asOfDate`. Only ever moves
 * forward, so evaluating the same row twice yields the same answer.
 */
export function nextStatus(row: SweepCandidate, asOfDate: string, windowDays: number): MembershipStatus {
  if (isTerminalStatus(row.status)) return row.status;
  if (asOfDate > row.endDate) return 'EXPIRED';
  if (
    row.status === 'ACTIVE' &&
    row.autoRenew &&
    row.renewedAt === null &&
    asOfDate >= renewalWindowOpens(row.endDate, windowDays)
  ) {
    return 'PENDING_RENEWAL';
  }
  return row.status;
}
