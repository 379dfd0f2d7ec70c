import { and, desc, eq, gte, lt, or } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { getDb, auditLog as auditLogTable } from '@gymledger/db';
import { generateUlid } from '@gymledger/shared';
import { logger, serializeError } from '../observability/logger';
import type { AuditEntry, AuditLogger, AuditQueryFilters } from './index';

const CURSOR_SEPARATOR = '|';

function parseCursor(cursor: string): { createdAt: Date; id: string } | null {
  const [time, id] = cursor.split(CURSOR_SEPARATOR);
  if (!time || !id) return null;
  const createdAt = new Date(time);
  return Number.isNaN(createdAt.getTime()) ? null : { createdAt, id };
}

export class DrizzleAuditLogger implements AuditLogger {
  async log(entry: AuditEntry): Promise<void> {
    try {
      await getDb().insert(auditLogTable).values({
        id: generateUlid(),
        tenantId: entry.tenantId,
        actorUserId: entry.actorUserId ?? null,
        actorType: entry.actorType ?? 'user',
        action: entry.action,
        entityType: entry.entityType,
        entityId: entry.entityId,
        changes: entry.changes ?? null,
        metadata: entry.metadata ?? null,
      });
    } catch (error) {
      // The business transaction has already committed; a lost audit row is reported, not raised.
      logger.error('Failed to write audit log entry', {
        tenantId: entry.tenantId,
        action: entry.action,
        entityType: entry.entityType,
        entityId: entry.entityId,
        error: serializeError(error),
      });
    }
  }

  async query(
    tenantId: string,
    filters: AuditQueryFilters,
  ): Promise<{ entries: (AuditEntry & { id: string; createdAt: string })[]; cursor?: string }> {
    const limit = Math.min(filters.limit ?? 50, 100);

    const conditions: SQL[] = [eq(auditLogTable.tenantId, tenantId)];
    if (filters.entityType) conditions.push(eq(auditLogTable.entityType, filters.entityType));
    if (filters.entityId) conditions.push(eq(auditLogTable.entityId, filters.entityId));
    if (filters.actorUserId) conditions.push(eq(auditLogTable.actorUserId, filters.actorUserId));
    if (filters.action) conditions.push(eq(auditLogTable.action, filters.action));
    if (filters.from) conditions.push(gte(auditLogTable.createdAt, filters.from));
    if (filters.to) conditions.push(lt(auditLogTable.createdAt, filters.to));
    if (filters.cursor) {
      const cursor = parseCursor(filters.cursor);
      if (cursor) {
        const before = or(
          lt(auditLogTable.createdAt, cursor.createdAt),
          and(eq(auditLogTable.createdAt, cursor.createdAt), lt(auditLogTable.id, cursor.id)),
        );
        if (before) conditions.push(before);
      }
    }

    const rows = await getDb()
      .select()
      .from(auditLogTable)
      .where(and(...conditions))
      .orderBy(desc(auditLogTable.createdAt), desc(auditLogTable.id))
      .limit(limit + 1);

    const hasMore = rows.length > limit;
    const entries = rows.slice(0, limit).map((row) => ({
      id: row.id,
      tenantId: row.tenantId,
      actorUserId: row.actorUserId ?? undefined,
      actorType: row.actorType,
      action: row.action,
      entityType: row.entityType,
      entityId: row.entityId,
      changes: row.changes ?? undefined,
      metadata: row.metadata ?? undefined,
      createdAt: row.createdAt.toISOString(),
    }));

    const last = entries[entries.length - 1];
    const cursor = hasMore && last ? `${last.createdAt}${CURSOR_SEPARATOR}${last.id}` : undefined;

    return { entries, cursor };
  }
}
