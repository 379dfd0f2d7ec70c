import { amountToCents, toAmountString, toDollars } from '@gymledger/shared';
import type { PaymentMethod, PaymentPurpose, PaymentStatus } from '@gymledger/shared';
import type { RevenueBucket, RevenueSummary } from '../types';

export interface RevenueRow {
  amount: string;
  paymentFor: PaymentPurpose;
  method: PaymentMethod;
  status: PaymentStatus;
}

interface CentsBucket {
  paid: number;
  refunded: number;
  count: number;
}

const emptyBucket = (): CentsBucket => ({ paid: 0, refunded: 0, count: 0 });

function toBucket(b: CentsBucket): RevenueBucket {
  return {
    paid: toAmountString(toDollars(b.paid)),
    refunded: toAmountString(toDollars(b.refunded)),
    net: toAmountString(toDollars(b.paid - b.refunded)),
    count: b.count,
  };
}

/**
 * Collected and refunded money over a set of payments, summed in cents.
 * PENDING and CANCELLED payments moved no money and are skipped.
 */
export function summarizeRevenue(rows: readonly RevenueRow[], from: string, to: string): RevenueSummary {
  const totals = emptyBucket();
  const byPurpose: Record<PaymentPurpose, CentsBucket> = {
    MEMBERSHIP: emptyBucket(),
    CLASS: emptyBucket(),
    RETAIL: emptyBucket(),
  };
  const byMethod: Record<PaymentMethod, CentsBucket> = {
    CASH: emptyBucket(),
    DEBIT_CARD: emptyBucket(),
    BANK_TRANSFER: emptyBucket(),
    E_WALLET: emptyBucket(),
  };

  for (const row of rows) {
    if (row.status !== 'PAID' && row.status !== 'REFUNDED') continue;
    const cents = amountToCents(row.amount);
    for (const bucket of [totals, byPurpose[row.paymentFor], byMethod[row.method]]) {
      bucket.count += 1;
      // A refunded payment was collected first.
      bucket.paid += cents;
      if (row.status === 'REFUNDED') bucket.refunded += cents;
    }
  }

  return {
    from,
    to,
    totals: toBucket(totals),
    byPurpose: {
      MEMBERSHIP: toBucket(byPurpose.MEMBERSHIP),
      CLASS: toBucket(byPurpose.CLASS),
      RETAIL: toBucket(byPurpose.RETAIL),
    },
    byMethod: {
      CASH: toBucket(byMethod.CASH),
      DEBIT_CARD: toBucket(byMethod.DEBIT_CARD),
      BANK_TRANSFER: toBucket(byMethod.BANK_TRANSFER),
      E_WALLET: toBucket(byMethod.E_WALLET),
    },
  };
}
