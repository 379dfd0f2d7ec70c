import { z } from 'zod';
import { moneyAmountSchema } from '@gymledger/shared';

const priceSchema = moneyAmountSchema('Price');

export const createPlanSchema = z.object({
  name: z.string().trim().min(1).max(120),
  durationDays: z.number().int().positive().max(3650),
  price: priceSchema,
  description: z.string().trim().max(2000).nullish(),
  isActive: z.boolean().default(true),
});
export type CreatePlanInput = z.input<typeof createPlanSchema>;

export const updatePlanSchema = z.object({
  planId: z.string().min(1),
  name: z.string().trim().min(1).max(120).optional(),
  durationDays: z.number().int().positive().max(3650).optional(),
  price: priceSchema.optional(),
  description: z.string().trim().max(2000).nullish(),
});
export type UpdatePlanInput = z.input<typeof updatePlanSchema>;

export const setPlanActiveSchema = z.object({
  planId: z.string().min(1),
  isActive: z.boolean(),
});
export type SetPlanActiveInput = z.input<typeof setPlanActiveSchema>;

export const listPlansSchema = z.object({
  includeInactive: z.boolean().default(false),
  includeDeleted: z.boolean().default(false),
});
export type ListPlansInput = z.input<typeof listPlansSchema>;
