import { sql } from 'drizzle-orm';
import {
  pgTable,
  text,
  date,
  boolean,
  timestamp,
  index,
  foreignKey,
  unique,
  check,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@gymledger/shared';
import type { MembershipStatus } from '@gymledger/shared';
import { gyms } from './core';
import { members } from './members';
import { membershipPlans } from './plans';

// ── Memberships ──────────────────────────────────────────────────
export const memberships = pgTable(
  'memberships',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    gymId: text('gym_id')
      .notNull()
      .references(() => gyms.id, { onDelete: 'restrict' }),
    memberId: text('member_id').notNull(),
    membershipPlanId: text('membership_plan_id').notNull(),
    startDate: date('start_date').notNull(),
    // Fixed at assignment: start_date + plan duration at that moment.
    endDate: date('end_date').notNull(),
    status: text('status').$type<MembershipStatus>().notNull().default('ACTIVE'),
    autoRenew: boolean('auto_renew').notNull().default(false),
    renewedFromId: text('renewed_from_id'),
    renewedAt: timestamp('renewed_at', { withTimezone: true }),
    cancelledAt: timestamp('cancelled_at', { withTimezone: true }),
    cancelReason: text('cancel_reason'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    foreignKey({
      name: 'fk_memberships_member_same_gym',
      columns: [table.gymId, table.memberId],
      foreignColumns: [members.gymId, members.id],
    }).onDelete('restrict'),
    foreignKey({
      name: 'fk_memberships_plan_same_gym',
      columns: [table.gymId, table.membershipPlanId],
      foreignColumns: [membershipPlans.gymId, membershipPlans.id],
    }).onDelete('restrict'),
    unique('uq_memberships_gym_id').on(table.gymId, table.id),
    index('idx_memberships_member').on(table.gymId, table.memberId, table.status),
    index('idx_memberships_sweep').on(table.gymId, table.status, table.endDate),
    check(
      'chk_memberships_status',
      sql`status IN ('ACTIVE','EXPIRED','CANCELLED','PENDING_RENEWAL')`,
    ),
    check('chk_memberships_dates', sql`end_date > start_date`),
  ],
);
