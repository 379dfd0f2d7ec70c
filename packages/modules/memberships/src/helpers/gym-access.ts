import { ACCESS_GRANTING_STATUSES, isOneOf, toCalendarDate } from '@gymledger/shared';
import type { CheckInRejectionReason, MemberStatus, MembershipStatus } from '@gymledger/shared';

export interface AccessMember {
  status: MemberStatus;
  deletedAt: Date | null;
}

export interface AccessMembership {
  id: string;
  status: MembershipStatus;
  startDate: string;
  endDate: string;
  deletedAt: Date | null;
}

export type AdmissionDecision =
  | { admitted: true; membershipId: string }
  | { admitted: false; reason: CheckInRejectionReason };

/**
 * Decide whether a member may enter on `asOfDate` (YYYY-MM-DD). A tombstoned
 * member is refused whatever their memberships say.
 */
export function evaluateAdmission(
  member: AccessMember,
  memberships: readonly AccessMembership[],
  asOfDate: string,
): AdmissionDecision {
  if (member.deletedAt) return { admitted: false, reason: 'MEMBER_DELETED' };
  if (member.status !== 'ACTIVE') return { admitted: false, reason: 'MEMBER_INACTIVE' };

  const covering = memberships.find(
    (m) =>
      m.deletedAt === null &&
      isOneOf(ACCESS_GRANTING_STATUSES, m.status) &&
      m.startDate <= asOfDate &&
      asOfDate <= m.endDate,
  );
  return covering
    ? { admitted: true, membershipId: covering.id }
    : { admitted: false, reason: 'NO_ACTIVE_MEMBERSHIP' };
}

export function evaluateGymAccess(
  member: AccessMember,
  memberships: readonly AccessMembership[],
  asOf: Date,
): boolean {
  return evaluateAdmission(member, memberships, toCalendarDate(asOf)).admitted;
}
