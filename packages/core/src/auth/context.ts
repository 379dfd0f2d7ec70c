import type { StaffRole } from '@gymledger/shared';

export interface AuthUser {
  id: string;
  role: StaffRole;
}

/**
 * Tenant scope of one operation. Passed explicitly into every command; there
 * is no process-wide "current gym". `user` is absent for self-service kiosks
 * and scheduled jobs.
 */
export interface TenantContext {
  tenantId: string;
  requestId: string;
  user?: AuthUser;
}

/** Context of a staff-initiated operation; the session layer supplies `user`. */
export interface RequestContext extends TenantContext {
  user: AuthUser;
}
