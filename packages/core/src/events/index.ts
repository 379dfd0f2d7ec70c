import type { OutboxWriter } from './outbox';
import { DrizzleOutboxWriter } from './outbox-writer';

let outboxWriter: OutboxWriter | null = null;

export function getOutboxWriter(): OutboxWriter {
  if (!outboxWriter) {
    outboxWriter = new DrizzleOutboxWriter();
  }
  return outboxWriter;
}

export function setOutboxWriter(writer: OutboxWriter): void {
  outboxWriter = writer;
}

export type { OutboxWriter } from './outbox';
export { DrizzleOutboxWriter } from './outbox-writer';
export { buildEvent, buildEventFromContext } from './build-event';
export { publishWithOutbox, publishEventsOnly } from './publish-with-outbox';
