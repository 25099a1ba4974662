// Calendar helpers. Date-only values travel as ISO `YYYY-MM-DD` strings in
// the caller's local calendar; instants travel as Date.

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_TIME =
  /^(\d{4}-\d{2}-\d{2})T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})?$/;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * True for a real calendar date in `YYYY-MM-DD` form (rejects 2026-02-30).
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const candidate = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    candidate.getUTCFullYear() === Number(y) &&
    candidate.getUTCMonth() === Number(m) - 1 &&
    candidate.getUTCDate() === Number(d)
  );
}

/**
 * Parses an ISO date-time. A missing offset means local time. Returns null
 * for anything else, including bare dates.
 */
export function parseIsoDateTime(value: string): Date | null {
  const match = ISO_DATE_TIME.exec(value);
  if (!match || !isIsoDate(match[1])) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function startOfMonth(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), 1);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/** Whole days from `from` to `to`, both `YYYY-MM-DD`. */
export function daysBetween(from: string, to: string): number {
  const a = Date.parse(`${from}T00:00:00Z`);
  const b = Date.parse(`${to}T00:00:00Z`);
  return Math.round((b - a) / DAY_MS);
}

export interface DayWindow {
  start: Date;
  end: Date;
}

/** The local calendar day containing `now`, end-exclusive. */
export function dayWindow(now: Date): DayWindow {
  const start = startOfDay(now);
  return { start, end: addDays(start, 1) };
}

export function isWithin(instant: Date, window: DayWindow): boolean {
  return instant >= window.start && instant < window.end;
}
