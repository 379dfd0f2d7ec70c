export const LEDGER_EVENTS = {
  PAYMENT_RECORDED: 'ledger.payment.recorded.v1',
  PAYMENT_STATUS_CHANGED: 'ledger.payment.status_changed.v1',
} as const;
