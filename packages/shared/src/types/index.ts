export { EVENT_DOMAINS, EventEnvelopeSchema, isEventType } from './events';
export type { EventDomain, EventEnvelope } from './events';
export type { CursorPage } from './pagination';
