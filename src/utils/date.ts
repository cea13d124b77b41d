const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** Widest look-back window honoured; larger windows are clamped to it. */
export const MAX_LOOKBACK_DAYS = 36500;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

function pad(n: number, width: number = 2): string {
  return String(n).padStart(width, "0");
}

/** Calendar date (YYYY-MM-DD) in the local time zone. */
export function toDateOnly(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function todayDateOnly(clock: Clock = systemClock): string {
  return toDateOnly(clock.now());
}

export function isDateOnly(value: string): boolean {
  const match = DATE_ONLY.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const parsed = new Date(Number(y), Number(m) - 1, Number(d));
  return (
    parsed.getFullYear() === Number(y) &&
    parsed.getMonth() === Number(m) - 1 &&
    parsed.getDate() === Number(d)
  );
}

export function isTimeOfDay(value: string): boolean {
  return TIME_OF_DAY.test(value);
}

/**
 * Shift a YYYY-MM-DD date by whole days. Noon is used as the anchor so a
 * DST transition can never move the result onto a neighbouring day.
 */
export function addDays(dateOnly: string, days: number): string {
  const match = DATE_ONLY.exec(dateOnly);
  if (!match) {
    throw new RangeError(`Not a YYYY-MM-DD date: ${dateOnly}`);
  }
  const [, y, m, d] = match;
  return toDateOnly(new Date(Number(y), Number(m) - 1, Number(d) + days, 12));
}

export function daysAgo(today: string, days: number): string {
  return addDays(today, -Math.min(days, MAX_LOOKBACK_DAYS));
}
