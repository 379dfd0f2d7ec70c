import {
  pgTable,
  text,
  timestamp,
  index,
  foreignKey,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@gymledger/shared';
import { gyms } from './core';
import { members } from './members';

// ── Check-ins ────────────────────────────────────────────────────
export const checkIns = pgTable(
  'checkins',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    gymId: text('gym_id')
      .notNull()
      .references(() => gyms.id, { onDelete: 'restrict' }),
    memberId: text('member_id').notNull(),
    checkedInAt: timestamp('checked_in_at', { withTimezone: true }).notNull(),
    // Staff name or kiosk identifier; not a foreign key.
    admittedBy: text('admitted_by').notNull(),
    voidReason: text('void_reason'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    foreignKey({
      name: 'fk_checkins_member_same_gym',
      columns: [table.gymId, table.memberId],
      foreignColumns: [members.gymId, members.id],
    }).onDelete('restrict'),
    index('idx_checkins_gym_time').on(table.gymId, table.checkedInAt),
    index('idx_checkins_member').on(table.gymId, table.memberId, table.checkedInAt),
  ],
);
