import { sql } from 'drizzle-orm';
import {
  pgTable,
  text,
  integer,
  numeric,
  boolean,
  timestamp,
  index,
  unique,
  check,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@gymledger/shared';
import { gyms } from './core';

// ── Membership Plans ─────────────────────────────────────────────
export const membershipPlans = pgTable(
  'membership_plans',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    gymId: text('gym_id')
      .notNull()
      .references(() => gyms.id, { onDelete: 'restrict' }),
    name: text('name').notNull(),
    durationDays: integer('duration_days').notNull(),
    price: numeric('price', { precision: 12, scale: 2 }).notNull(),
    isActive: boolean('is_active').notNull().default(true),
    description: text('description'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    unique('uq_membership_plans_gym_id').on(table.gymId, table.id),
    index('idx_membership_plans_gym_active').on(table.gymId, table.isActive),
    check('chk_membership_plans_duration', sql`duration_days > 0`),
    check('chk_membership_plans_price', sql`price >= 0`),
  ],
);
