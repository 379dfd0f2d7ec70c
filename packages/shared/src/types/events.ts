import { z } from 'zod';

/** First segment of every event type: the package that owns the entity. */
export const EVENT_DOMAINS = [
  'tenant',
  'identity',
  'members',
  'plans',
  'memberships',
  'attendance',
  'ledger',
] as const;
export type EventDomain = (typeof EVENT_DOMAINS)[number];

// <domain>.<entity>.<action>.v<n>, e.g. ledger.payment.status_changed.v1
const EVENT_TYPE = new RegExp(`^(${EVENT_DOMAINS.join('|')})\\.[a-z_]+\\.[a-z_]+\\.v\\d+$`);

export function isEventType(value: string): boolean {
  return EVENT_TYPE.test(value);
}

export const EventEnvelopeSchema = z.object({
  eventId: z.string().min(1),
  eventType: z.string().refine(isEventType, 'Unknown event domain or malformed event type'),
  occurredAt: z.string().datetime(),
  tenantId: z.string().min(1),
  actorUserId: z.string().optional(),
  idempotencyKey: z.string().min(1),
  correlationId: z.string().optional(),
  data: z.record(z.unknown()),
});

export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;
