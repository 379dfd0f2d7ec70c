import type { users } from '@gymledger/db';

export type StaffUser = typeof users.$inferSelect;

/** Staff row as returned to callers; the credential never leaves the registry. */
export type StaffProfile = Omit<StaffUser, 'passwordHash'>;

export function toStaffProfile(user: StaffUser): StaffProfile {
  return {
    id: user.id,
    gymId: user.gymId,
    name: user.name,
    email: user.email,
    role: user.role,
    phone: user.phone,
    status: user.status,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
    deletedAt: user.deletedAt,
  };
}
