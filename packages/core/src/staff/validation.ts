import { z } from 'zod';
import { ACCOUNT_STATUSES, STAFF_ROLES } from '@gymledger/shared';

export const createStaffSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(8).max(200),
  role: z.enum(STAFF_ROLES).default('STAFF'),
  phone: z.string().trim().min(6).max(30).optional(),
  status: z.enum(ACCOUNT_STATUSES).default('ACTIVE'),
});
export type CreateStaffInput = z.input<typeof createStaffSchema>;

export const setStaffStatusSchema = z.object({
  userId: z.string().min(1),
  status: z.enum(ACCOUNT_STATUSES),
});
export type SetStaffStatusInput = z.input<typeof setStaffStatusSchema>;

export const listStaffSchema = z.object({
  includeDeleted: z.boolean().default(false),
  role: z.enum(STAFF_ROLES).optional(),
});
export type ListStaffInput = z.input<typeof listStaffSchema>;
