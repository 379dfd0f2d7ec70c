export const PLAN_EVENTS = {
  CREATED: 'plans.plan.created.v1',
  UPDATED: 'plans.plan.updated.v1',
  ACTIVATED: 'plans.plan.activated.v1',
  DEACTIVATED: 'plans.plan.deactivated.v1',
  DELETED: 'plans.plan.deleted.v1',
  RESTORED: 'plans.plan.restored.v1',
} as const;
