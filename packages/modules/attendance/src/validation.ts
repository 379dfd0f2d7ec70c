import { z } from 'zod';

export const checkInSchema = z.object({
  memberId: z.string().min(1),
  // Staff name or kiosk identifier, stored as given.
  admittedBy: z.string().trim().min(1).max(120),
  asOf: z.date(),
});
export type CheckInInput = z.input<typeof checkInSchema>;

export const voidCheckInSchema = z.object({
  checkInId: z.string().min(1),
  reason: z.string().trim().min(1).max(500),
});
export type VoidCheckInInput = z.input<typeof voidCheckInSchema>;

export const listCheckInsSchema = z.object({
  memberId: z.string().min(1).optional(),
  from: z.date().optional(),
  to: z.date().optional(),
  includeDeleted: z.boolean().default(false),
  limit: z.number().int().min(1).max(500).default(100),
});
export type ListCheckInsInput = z.input<typeof listCheckInsSchema>;
