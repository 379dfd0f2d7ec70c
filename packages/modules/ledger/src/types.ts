import type { payments } from '@gymledger/db';
import type { PaymentMethod, PaymentPurpose } from '@gymledger/shared';

export type Payment = typeof payments.$inferSelect;

/** A payment as listed in the ledger, with its member's state at read time. */
export interface PaymentListItem extends Payment {
  memberCode: string | null;
  memberName: string;
  memberDeleted: boolean;
}

export interface RevenueBucket {
  paid: string;
  refunded: string;
  net: string;
  count: number;
}

export interface RevenueSummary {
  from: string;
  to: string;
  totals: RevenueBucket;
  byPurpose: Record<PaymentPurpose, RevenueBucket>;
  byMethod: Record<PaymentMethod, RevenueBucket>;
}
