/**
 * Calendar helpers
 *
 * Birth dates travel as `YYYY-MM-DD`. Appointment times travel as
 * `YYYY-MM-DD HH:MM` and are stored as naive local timestamps
 * `YYYY-MM-DD HH:MM:SS`, which also sort correctly as strings.
 */

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

function isRealDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Parse `YYYY-MM-DD`. Returns null for malformed or impossible dates (2023-02-30).
 */
export function parseCalendarDate(text: string): string | null {
  const match = DATE_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  if (year < 1 || !isRealDate(year, month, day)) {
    return null;
  }
  return text;
}

export interface AppointmentTime {
  /** Stored form, `YYYY-MM-DD HH:MM:00` */
  timestamp: string;
  /** Same instant in the server's local time zone */
  date: Date;
}

/**
 * Parse `YYYY-MM-DD HH:MM` (minute precision)
 */
export function parseAppointmentTime(text: string): AppointmentTime | null {
  const match = DATE_TIME_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const [year, month, day, hour, minute] = match.slice(1, 6).map(Number);
  if (year < 1 || !isRealDate(year, month, day) || hour > 23 || minute > 59) {
    return null;
  }
  return {
    timestamp: `${match[1]}-${match[2]}-${match[3]} ${match[4]}:${match[5]}:00`,
    date: new Date(year, month - 1, day, hour, minute),
  };
}

/**
 * The calendar day after `YYYY-MM-DD`
 */
export function nextCalendarDay(date: string): string {
  const [year, month, day] = date.split('-').map(Number);
  const next = new Date(Date.UTC(year, month - 1, day + 1));
  return `${pad(next.getUTCFullYear(), 4)}-${pad(next.getUTCMonth() + 1)}-${pad(next.getUTCDate())}`;
}
