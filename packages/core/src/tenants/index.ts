export { createTenant } from './commands/create-tenant';
export { onboardGym } from './commands/onboard-gym';
export { getTenant } from './queries/get-tenant';
export { createTenantSchema, onboardGymSchema } from './validation';
export type { CreateTenantInput, OnboardGymInput } from './validation';
export type { Gym } from './types';
