export const ATTENDANCE_EVENTS = {
  ADMITTED: 'attendance.check_in.admitted.v1',
  REJECTED: 'attendance.check_in.rejected.v1',
  VOIDED: 'attendance.check_in.voided.v1',
} as const;
