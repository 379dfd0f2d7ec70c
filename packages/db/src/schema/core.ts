import { sql } from 'drizzle-orm';
import {
  pgTable,
  text,
  timestamp,
  jsonb,
  uniqueIndex,
  index,
  primaryKey,
  unique,
  check,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@gymledger/shared';
import type { AccountStatus, StaffRole } from '@gymledger/shared';

// ── Gyms (tenant root) ───────────────────────────────────────────
export const gyms = pgTable('gyms', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull(),
  address: text('address').notNull(),
  phone: text('phone').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  deletedAt: timestamp('deleted_at', { withTimezone: true }),
});

// ── Users (owners and staff) ─────────────────────────────────────
export const users = pgTable(
  'users',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    gymId: text('gym_id')
      .notNull()
      .references(() => gyms.id, { onDelete: 'restrict' }),
    name: text('name').notNull(),
    email: text('email').notNull(),
    passwordHash: text('password_hash').notNull(),
    role: text('role').$type<StaffRole>().notNull().default('STAFF'),
    phone: text('phone'),
    status: text('status').$type<AccountStatus>().notNull().default('ACTIVE'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    uniqueIndex('uq_users_email_live').on(table.email).where(sql`deleted_at IS NULL`),
    unique('uq_users_gym_id').on(table.gymId, table.id),
    index('idx_users_gym_role').on(table.gymId, table.role),
    check('chk_users_role', sql`role IN ('OWNER','STAFF')`),
    check('chk_users_status', sql`status IN ('ACTIVE','INACTIVE')`),
  ],
);

// ── Audit Log ────────────────────────────────────────────────────
export const auditLog = pgTable(
  'audit_log',
  {
    id: text('id').notNull().$defaultFn(generateUlid),
    tenantId: text('tenant_id').notNull(),
    actorUserId: text('actor_user_id'),
    actorType: text('actor_type').$type<'user' | 'system'>().notNull().default('user'),
    action: text('action').notNull(),
    entityType: text('entity_type').notNull(),
    entityId: text('entity_id').notNull(),
    changes: jsonb('changes').$type<Record<string, { old: unknown; new: unknown }>>(),
    metadata: jsonb('metadata').$type<Record<string, unknown>>(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.id, table.createdAt] }),
    index('idx_audit_tenant_created').on(table.tenantId, table.createdAt),
    index('idx_audit_entity').on(table.tenantId, table.entityType, table.entityId),
    index('idx_audit_actor').on(table.tenantId, table.actorUserId, table.createdAt),
  ],
);

// ── Event Outbox ─────────────────────────────────────────────────
export const eventOutbox = pgTable(
  'event_outbox',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id').notNull(),
    eventType: text('event_type').notNull(),
    eventId: text('event_id').notNull().unique(),
    idempotencyKey: text('idempotency_key').notNull(),
    payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull().defaultNow(),
    publishedAt: timestamp('published_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_outbox_unpublished').on(table.publishedAt)],
);
