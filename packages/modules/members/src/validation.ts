import { z } from 'zod';
import { GENDERS, MEMBER_STATUSES, calendarDateSchema, normalizePhone } from '@gymledger/shared';

const phoneSchema = z
  .string()
  .trim()
  .min(1)
  .transform(normalizePhone)
  .pipe(z.string().regex(/^\+?\d{6,15}$/, 'Expected 6-15 digits with an optional leading +'));

const emailSchema = z.string().trim().toLowerCase().email();

export const createMemberSchema = z.object({
  fullName: z.string().trim().min(1).max(200),
  phone: phoneSchema,
  email: emailSchema.nullish(),
  gender: z.enum(GENDERS),
  dateOfBirth: calendarDateSchema.nullish(),
  status: z.enum(MEMBER_STATUSES).default('ACTIVE'),
  // Create a fresh identity even when a deleted member holds this phone.
  ignoreRestorable: z.boolean().default(false),
});
export type CreateMemberInput = z.input<typeof createMemberSchema>;

export const updateMemberSchema = z.object({
  memberId: z.string().min(1),
  fullName: z.string().trim().min(1).max(200).optional(),
  phone: phoneSchema.optional(),
  email: emailSchema.nullish(),
  gender: z.enum(GENDERS).optional(),
  dateOfBirth: calendarDateSchema.nullish(),
  status: z.enum(MEMBER_STATUSES).optional(),
});
export type UpdateMemberInput = z.input<typeof updateMemberSchema>;

export const listMembersSchema = z.object({
  search: z.string().trim().min(1).optional(),
  status: z.enum(MEMBER_STATUSES).optional(),
  includeDeleted: z.boolean().default(false),
  cursor: z.string().optional(),
  limit: z.number().int().min(1).max(100).default(50),
});
export type ListMembersInput = z.input<typeof listMembersSchema>;

export const findOrOfferRestoreSchema = z.object({ phone: phoneSchema });
