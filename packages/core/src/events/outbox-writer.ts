import { generateUlid } from '@gymledger/shared';
import type { EventEnvelope } from '@gymledger/shared';
import { eventOutbox } from '@gymledger/db';
import type { Executor } from '@gymledger/db';
import type { OutboxWriter } from './outbox';

export class DrizzleOutboxWriter implements OutboxWriter {
  async writeEvent(tx: Executor, event: EventEnvelope): Promise<void> {
    await tx.insert(eventOutbox).values({
      id: generateUlid(),
      tenantId: event.tenantId,
      eventType: event.eventType,
      eventId: event.eventId,
      idempotencyKey: event.idempotencyKey,
      payload: event,
      occurredAt: new Date(event.occurredAt),
      publishedAt: null,
    });
  }
}
