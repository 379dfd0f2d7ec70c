import { sql } from 'drizzle-orm';
import {
  pgTable,
  text,
  date,
  integer,
  timestamp,
  uniqueIndex,
  index,
  unique,
  foreignKey,
  check,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@gymledger/shared';
import type { Gender, MemberStatus } from '@gymledger/shared';
import { gyms, users } from './core';

// ── Members ──────────────────────────────────────────────────────
export const MEMBER_PHONE_LIVE_INDEX = 'uq_members_gym_phone_live';
export const MEMBER_EMAIL_LIVE_INDEX = 'uq_members_gym_email_live';

export const members = pgTable(
  'members',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    gymId: text('gym_id')
      .notNull()
      .references(() => gyms.id, { onDelete: 'restrict' }),
    // Filled once, right after insert, from member_code_counters.
    memberCode: text('member_code'),
    fullName: text('full_name').notNull(),
    phone: text('phone').notNull(),
    email: text('email'),
    gender: text('gender').$type<Gender>().notNull(),
    dateOfBirth: date('date_of_birth'),
    status: text('status').$type<MemberStatus>().notNull().default('ACTIVE'),
    createdBy: text('created_by').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    foreignKey({
      name: 'fk_members_created_by_same_gym',
      columns: [table.gymId, table.createdBy],
      foreignColumns: [users.gymId, users.id],
    }).onDelete('restrict'),
    unique('uq_members_gym_id').on(table.gymId, table.id),
    uniqueIndex('uq_members_gym_code').on(table.gymId, table.memberCode),
    uniqueIndex(MEMBER_PHONE_LIVE_INDEX)
      .on(table.gymId, table.phone)
      .where(sql`deleted_at IS NULL`),
    uniqueIndex(MEMBER_EMAIL_LIVE_INDEX)
      .on(table.gymId, table.email)
      .where(sql`deleted_at IS NULL AND email IS NOT NULL`),
    index('idx_members_status_deleted_created_by').on(
      table.gymId,
      table.status,
      table.deletedAt,
      table.createdBy,
    ),
    check('chk_members_gender', sql`gender IN ('M','F','O')`),
    check('chk_members_status', sql`status IN ('ACTIVE','INACTIVE')`),
  ],
);

// ── Member Code Counters ─────────────────────────────────────────
export const memberCodeCounters = pgTable('member_code_counters', {
  gymId: text('gym_id')
    .primaryKey()
    .references(() => gyms.id, { onDelete: 'restrict' }),
  lastNumber: integer('last_number').notNull().default(0),
});
