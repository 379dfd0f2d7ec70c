import { generateUlid, isEventType } from '@gymledger/shared';
import type { EventEnvelope } from '@gymledger/shared';
import type { TenantContext } from '../auth/context';

interface BuildEventInput {
  eventType: string;
  tenantId: string;
  actorUserId?: string;
  correlationId?: string;
  data: Record<string, unknown>;
  idempotencyKey?: string;
}

/**
 * Envelope for one domain event. The type is checked here so a misspelled
 * constant fails in the command instead of reaching the outbox.
 */
export function buildEvent(input: BuildEventInput): EventEnvelope {
  if (!isEventType(input.eventType)) {
    throw new Error(`Malformed event type: ${input.eventType}`);
  }
  const eventId = generateUlid();
  return {
    eventId,
    eventType: input.eventType,
    occurredAt: new Date().toISOString(),
    tenantId: input.tenantId,
    actorUserId: input.actorUserId,
    correlationId: input.correlationId,
    idempotencyKey: input.idempotencyKey ?? `${input.tenantId}:${input.eventType}:${eventId}`,
    data: input.data,
  };
}

/** Kiosk and sweep contexts carry no user, so their events have no actor. */
export function buildEventFromContext(
  ctx: TenantContext,
  eventType: string,
  data: Record<string, unknown>,
  idempotencyKey?: string,
): EventEnvelope {
  return buildEvent({
    eventType,
    tenantId: ctx.tenantId,
    actorUserId: ctx.user?.id,
    correlationId: ctx.requestId,
    data,
    idempotencyKey,
  });
}
