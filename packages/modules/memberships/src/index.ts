export const MODULE_KEY = 'memberships' as const;
export const MODULE_NAME = 'Membership Lifecycle Engine';
export const MODULE_VERSION = '0.1.0';

export { assignMembership } from './commands/assign-membership';
export { recomputeStatuses } from './commands/recompute-statuses';
export { renewMembership } from './commands/renew-membership';
export { cancelMembership } from './commands/cancel-membership';
export { softDeleteMembership } from './commands/soft-delete-membership';
export { restoreMembership } from './commands/restore-membership';

export { hasGymAccess } from './queries/has-gym-access';
export { getMembership } from './queries/get-membership';
export { listMemberMemberships } from './queries/list-member-memberships';

export {
  assertMembershipTransition,
  canTransitionMembership,
  computeEndDate,
  isTerminalStatus,
  nextStatus,
  renewalWindowOpens,
} from './helpers/lifecycle';
export type { SweepCandidate } from './helpers/lifecycle';
export { evaluateAdmission, evaluateGymAccess } from './helpers/gym-access';
export type { AccessMember, AccessMembership, AdmissionDecision } from './helpers/gym-access';
export { loadGrantingMemberships, loadMemberRow } from './helpers/admission-state';
export type { RowLock } from './helpers/admission-state';

export { MEMBERSHIP_EVENTS } from './events';
export type { Membership, RenewalResult, StatusSweepResult } from './types';
export {
  assignMembershipSchema,
  cancelMembershipSchema,
  recomputeStatusesOptionsSchema,
  renewMembershipSchema,
} from './validation';
export type {
  AssignMembershipInput,
  CancelMembershipInput,
  RecomputeStatusesOptions,
  RenewMembershipInput,
} from './validation';
