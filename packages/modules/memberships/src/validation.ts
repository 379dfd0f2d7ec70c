import { z } from 'zod';
import { calendarDateSchema } from '@gymledger/shared';

export const assignMembershipSchema = z.object({
  memberId: z.string().min(1),
  planId: z.string().min(1),
  startDate: calendarDateSchema,
  autoRenew: z.boolean().default(false),
  // Staff override for assigning a plan to an INACTIVE member.
  allowInactiveMember: z.boolean().default(false),
});
export type AssignMembershipInput = z.input<typeof assignMembershipSchema>;

export const renewalWindowSchema = z.number().int().min(0).max(90);

export const recomputeStatusesOptionsSchema = z.object({
  renewalWindowDays: renewalWindowSchema.optional(),
});
export type RecomputeStatusesOptions = z.input<typeof recomputeStatusesOptionsSchema>;

export const renewMembershipSchema = z.object({
  membershipId: z.string().min(1),
  asOf: z.date(),
});
export type RenewMembershipInput = z.input<typeof renewMembershipSchema>;

export const cancelMembershipSchema = z.object({
  membershipId: z.string().min(1),
  reason: z.string().trim().max(500).optional(),
});
export type CancelMembershipInput = z.input<typeof cancelMembershipSchema>;
