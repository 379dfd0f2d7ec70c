import type { checkIns } from '@gymledger/db';
import type { CheckInRejectionReason } from '@gymledger/shared';

export type CheckIn = typeof checkIns.$inferSelect;

export type CheckInResult =
  | { admitted: true; checkIn: CheckIn }
  | { admitted: false; reason: CheckInRejectionReason };
