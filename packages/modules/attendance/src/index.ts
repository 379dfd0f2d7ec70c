export const MODULE_KEY = 'attendance' as const;
export const MODULE_NAME = 'Attendance Gate';
export const MODULE_VERSION = '0.1.0';

export { checkIn } from './commands/check-in';
export { voidCheckIn } from './commands/void-check-in';
export { listCheckIns } from './queries/list-check-ins';

export { ATTENDANCE_EVENTS } from './events';
export type { CheckIn, CheckInResult } from './types';
export { checkInSchema, voidCheckInSchema, listCheckInsSchema } from './validation';
export type { CheckInInput, VoidCheckInInput, ListCheckInsInput } from './validation';
