import type { EventEnvelope } from '@gymledger/shared';
import type { Executor } from '@gymledger/db';

/** Writes events into the outbox inside the caller's transaction. */
export interface OutboxWriter {
  writeEvent(tx: Executor, event: EventEnvelope): Promise<void>;
}
