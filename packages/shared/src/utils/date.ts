const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

function toBusinessDate(date: Date, timezone: string): string {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  return formatter.format(date);
}

/** Calendar date (YYYY-MM-DD) of an instant, read in UTC. */
export function toCalendarDate(date: Date): string {
  return toBusinessDate(date, 'UTC');
}

export function isCalendarDate(value: string): boolean {
  if (!CALENDAR_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

export function addDays(date: string, days: number): string {
  if (!isCalendarDate(date)) {
    throw new RangeError(`Not a calendar date: ${date}`);
  }
  const parsed = new Date(`${date}T00:00:00.000Z`);
  parsed.setUTCDate(parsed.getUTCDate() + days);
  return parsed.toISOString().slice(0, 10);
}
