export const MODULE_KEY = 'plans' as const;
export const MODULE_NAME = 'Plan Catalog';
export const MODULE_VERSION = '0.1.0';

export { createPlan } from './commands/create-plan';
export { updatePlan } from './commands/update-plan';
export { setPlanActive } from './commands/set-plan-active';
export { softDeletePlan } from './commands/soft-delete-plan';
export { restorePlan } from './commands/restore-plan';

export { getPlan } from './queries/get-plan';
export { listPlans } from './queries/list-plans';

export { PLAN_EVENTS } from './events';
export type { MembershipPlan } from './types';
export { createPlanSchema, updatePlanSchema, setPlanActiveSchema, listPlansSchema } from './validation';
export type { CreatePlanInput, UpdatePlanInput, SetPlanActiveInput, ListPlansInput } from './validation';
