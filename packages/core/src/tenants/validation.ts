import { z } from 'zod';

export const createTenantSchema = z.object({
  name: z.string().trim().min(1).max(200),
  address: z.string().trim().min(1).max(500),
  phone: z.string().trim().min(6).max(30),
});
export type CreateTenantInput = z.input<typeof createTenantSchema>;

export const onboardGymSchema = z.object({
  gym: createTenantSchema,
  owner: z.object({
    name: z.string().trim().min(1).max(200),
    email: z.string().trim().toLowerCase().email(),
    password: z.string().min(8).max(200),
    phone: z.string().trim().min(6).max(30).optional(),
  }),
});
export type OnboardGymInput = z.input<typeof onboardGymSchema>;
