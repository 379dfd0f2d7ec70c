export { createStaff } from './commands/create-staff';
export { setStaffStatus } from './commands/set-staff-status';
export { softDeleteStaff } from './commands/soft-delete-staff';
export { restoreStaff } from './commands/restore-staff';
export { getStaff } from './queries/get-staff';
export { listStaff } from './queries/list-staff';
export { resolveActingStaff, requireRole } from './acting-staff';
export { hashSecret, verifySecret } from './password';
export { toStaffProfile } from './types';
export type { StaffUser, StaffProfile } from './types';
export {
  createStaffSchema,
  setStaffStatusSchema,
  listStaffSchema,
} from './validation';
export type { CreateStaffInput, SetStaffStatusInput, ListStaffInput } from './validation';
