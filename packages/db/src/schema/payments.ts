import { sql } from 'drizzle-orm';
import {
  pgTable,
  text,
  numeric,
  timestamp,
  index,
  foreignKey,
  check,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@gymledger/shared';
import type { PaymentMethod, PaymentPurpose, PaymentStatus } from '@gymledger/shared';
import { gyms } from './core';
import { members } from './members';
import { memberships } from './memberships';

// ── Payments ─────────────────────────────────────────────────────
// Never hard-deleted; amount is immutable after insert.
export const payments = pgTable(
  'payments',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    gymId: text('gym_id')
      .notNull()
      .references(() => gyms.id, { onDelete: 'restrict' }),
    memberId: text('member_id').notNull(),
    membershipId: text('membership_id'),
    amount: numeric('amount', { precision: 12, scale: 2 }).notNull(),
    paymentFor: text('payment_for').$type<PaymentPurpose>().notNull(),
    method: text('method').$type<PaymentMethod>().notNull(),
    status: text('status').$type<PaymentStatus>().notNull(),
    notes: text('notes'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    foreignKey({
      name: 'fk_payments_member_same_gym',
      columns: [table.gymId, table.memberId],
      foreignColumns: [members.gymId, members.id],
    }).onDelete('restrict'),
    foreignKey({
      name: 'fk_payments_membership_same_gym',
      columns: [table.gymId, table.membershipId],
      foreignColumns: [memberships.gymId, memberships.id],
    }).onDelete('restrict'),
    index('idx_payments_gym_created').on(table.gymId, table.createdAt),
    index('idx_payments_member_status').on(table.gymId, table.memberId, table.status),
    check('chk_payment_status', sql`status IN ('PAID','PENDING','REFUNDED','CANCELLED')`),
    check('chk_payment_method', sql`method IN ('CASH','DEBIT_CARD','BANK_TRANSFER','E_WALLET')`),
    check('chk_amount', sql`amount >= 0`),
    check('chk_payment_for', sql`payment_for IN ('MEMBERSHIP','CLASS','RETAIL')`),
  ],
);
