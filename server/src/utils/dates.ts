/**
 * Calendar Date Helpers
 *
 * All scheduling works on plain calendar dates written "YYYY-MM-DD".
 * Arithmetic goes through UTC epoch days so DST never shifts a date.
 * Because the format is fixed-width, string comparison is date comparison.
 */

export type IsoDate = string;

const MS_PER_DAY = 86_400_000;
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|T)/;

export const WEEKDAYS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"] as const;
export type Weekday = typeof WEEKDAYS[number];

// ============================================
// PARSING
// ============================================

/**
 * Normalize a date or ISO datetime string to its calendar date.
 * Returns undefined for anything that is not a real date.
 */
export function parseIsoDate(value: string): IsoDate | undefined {
  const match = DATE_PREFIX.exec(value.trim());
  if (!match) return undefined;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  return formatParts(year, month, day);
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) === value;
}

function parts(date: IsoDate): [number, number, number] {
  return [Number(date.slice(0, 4)), Number(date.slice(5, 7)), Number(date.slice(8, 10))];
}

function formatParts(year: number, month: number, day: number): IsoDate {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

// ============================================
// ARITHMETIC
// ============================================

/** Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not. */
function utcMidnight(year: number, monthIndex: number, day: number): Date {
  const dt = new Date(0);
  dt.setUTCFullYear(year, monthIndex, day);
  return dt;
}

export function daysInMonth(year: number, month: number): number {
  return utcMidnight(year, month, 0).getUTCDate();
}

export function toEpochDay(date: IsoDate): number {
  const [y, m, d] = parts(date);
  return Math.round(utcMidnight(y, m - 1, d).getTime() / MS_PER_DAY);
}

export function fromEpochDay(day: number): IsoDate {
  const dt = new Date(day * MS_PER_DAY);
  return formatParts(dt.getUTCFullYear(), dt.getUTCMonth() + 1, dt.getUTCDate());
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromEpochDay(toEpochDay(date) + days);
}

/** 0 = Sunday ... 6 = Saturday */
export function dayOfWeek(date: IsoDate): number {
  // Epoch day 0 (1970-01-01) was a Thursday
  return (((toEpochDay(date) + 4) % 7) + 7) % 7;
}

/** Monday of the ISO week containing `date`. */
export function startOfWeek(date: IsoDate): IsoDate {
  const offset = (dayOfWeek(date) + 6) % 7;
  return addDays(date, -offset);
}

/**
 * Move `months` months from `anchor`, keeping its day-of-month and clamping
 * to the last day when the target month is shorter (Jan 31 + 1 → Feb 28/29).
 */
export function addMonthsClamped(anchor: IsoDate, months: number): IsoDate {
  const [y, m, d] = parts(anchor);
  const index = y * 12 + (m - 1) + months;
  const year = Math.floor(index / 12);
  const month = index - year * 12 + 1;
  return formatParts(year, month, Math.min(d, daysInMonth(year, month)));
}

export function minDate(a: IsoDate, b: IsoDate): IsoDate {
  return a <= b ? a : b;
}

// ============================================
// CLOCK
// ============================================

/** Today's date on the local calendar. */
export function todayIso(now: Date = new Date()): IsoDate {
  return formatParts(now.getFullYear(), now.getMonth() + 1, now.getDate());
}

export interface Clock {
  today(): IsoDate;
}

export const systemClock: Clock = {
  today: () => todayIso(),
};

/** A clock stuck on one date. */
export function fixedClock(date: IsoDate): Clock {
  return { today: () => date };
}
