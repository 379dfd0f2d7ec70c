export const MODULE_KEY = 'ledger' as const;
export const MODULE_NAME = 'Ledger';
export const MODULE_VERSION = '0.1.0';

export { recordPayment } from './commands/record-payment';
export { transitionPaymentStatus } from './commands/transition-payment-status';

export { listPayments } from './queries/list-payments';
export type { ListPaymentsResult } from './queries/list-payments';
export { getPayment } from './queries/get-payment';
export { getRevenueSummary } from './queries/get-revenue-summary';

export { assertPaymentTransition, canTransitionPayment } from './helpers/payment-transitions';
export { summarizeRevenue } from './helpers/revenue';
export type { RevenueRow } from './helpers/revenue';

export { LEDGER_EVENTS } from './events';
export type { Payment, PaymentListItem, RevenueBucket, RevenueSummary } from './types';
export {
  recordPaymentSchema,
  transitionPaymentStatusSchema,
  listPaymentsSchema,
  revenueSummarySchema,
} from './validation';
export type {
  RecordPaymentInput,
  TransitionPaymentStatusInput,
  ListPaymentsInput,
  RevenueSummaryInput,
} from './validation';
