export const MEMBERSHIP_EVENTS = {
  ASSIGNED: 'memberships.membership.assigned.v1',
  STATUS_CHANGED: 'memberships.membership.status_changed.v1',
  RENEWED: 'memberships.membership.renewed.v1',
  CANCELLED: 'memberships.membership.cancelled.v1',
  DELETED: 'memberships.membership.deleted.v1',
  RESTORED: 'memberships.membership.restored.v1',
} as const;
