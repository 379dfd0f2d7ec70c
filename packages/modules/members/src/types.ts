import type { members } from '@gymledger/db';

export type Member = typeof members.$inferSelect;

export type RestoreOffer =
  | { kind: 'none' }
  | { kind: 'live_conflict'; memberId: string }
  | { kind: 'restorable'; member: Member };
