export type { AuthUser, TenantContext, RequestContext } from './context';
export { ensureSameTenant } from './tenant-guard';
