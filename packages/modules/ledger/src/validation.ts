import { z } from 'zod';
import {
  PAYMENT_METHODS,
  PAYMENT_PURPOSES,
  PAYMENT_STATUSES,
  calendarDateSchema,
  moneyAmountSchema,
} from '@gymledger/shared';

const amountSchema = moneyAmountSchema('Amount');

export const recordPaymentSchema = z
  .object({
    memberId: z.string().min(1),
    amount: amountSchema,
    paymentFor: z.enum(PAYMENT_PURPOSES),
    method: z.enum(PAYMENT_METHODS),
    status: z.enum(PAYMENT_STATUSES),
    membershipId: z.string().min(1).optional(),
    notes: z.string().trim().max(1000).optional(),
  })
  .refine((p) => !p.membershipId || p.paymentFor === 'MEMBERSHIP', {
    message: 'Only membership payments can reference a membership',
    path: ['membershipId'],
  });
export type RecordPaymentInput = z.input<typeof recordPaymentSchema>;

export const transitionPaymentStatusSchema = z.object({
  paymentId: z.string().min(1),
  status: z.enum(PAYMENT_STATUSES),
});
export type TransitionPaymentStatusInput = z.input<typeof transitionPaymentStatusSchema>;

export const listPaymentsSchema = z.object({
  memberId: z.string().min(1).optional(),
  status: z.enum(PAYMENT_STATUSES).optional(),
  paymentFor: z.enum(PAYMENT_PURPOSES).optional(),
  method: z.enum(PAYMENT_METHODS).optional(),
  from: z.date().optional(),
  to: z.date().optional(),
  // Financial history keeps tombstoned members' payments unless asked otherwise.
  excludeDeletedMembers: z.boolean().default(false),
  cursor: z.string().optional(),
  limit: z.number().int().min(1).max(200).default(50),
});
export type ListPaymentsInput = z.input<typeof listPaymentsSchema>;

export const revenueSummarySchema = z
  .object({
    from: calendarDateSchema,
    to: calendarDateSchema,
  })
  .refine((r) => r.from <= r.to, { message: '`from` must not be after `to`', path: ['to'] });
export type RevenueSummaryInput = z.input<typeof revenueSummarySchema>;
