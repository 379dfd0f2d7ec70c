import type { EventEnvelope } from '@gymledger/shared';
import { withTenant } from '@gymledger/db';
import type { Executor } from '@gymledger/db';
import type { TenantContext } from '../auth/context';
import { getOutboxWriter } from './index';

/**
 * Write events to the outbox within an existing transaction.
 * Unlike `publishWithOutbox`, this does NOT open a transaction or set the
 * tenant scope; the caller is responsible for both. Used by onboarding,
 * where the tenant row is created inside the transaction itself.
 */
export async function publishEventsOnly(
  tx: Executor,
  events: EventEnvelope[],
): Promise<void> {
  const outboxWriter = getOutboxWriter();
  for (const event of events) {
    await outboxWriter.writeEvent(tx, event);
  }
}

/**
 * Run a command in one tenant-scoped transaction and persist the events it
 * returns in the same transaction. Either the writes and their events all
 * commit, or nothing does.
 */
export async function publishWithOutbox<T>(
  ctx: TenantContext,
  operation: (tx: Executor) => Promise<{
    result: T;
    events: EventEnvelope[];
  }>,
): Promise<T> {
  const outboxWriter = getOutboxWriter();

  return withTenant(ctx.tenantId, async (tx) => {
    const { result, events } = await operation(tx);

    for (const event of events) {
      await outboxWriter.writeEvent(tx, event);
    }

    return result;
  });
}
