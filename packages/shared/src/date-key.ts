// =============================================================================
// @dailysync/shared — DD-MM-YYYY date keys
// =============================================================================

import { InputError } from "./errors.js";
import type { DateKey } from "./types.js";

const DATE_KEY_PATTERN = /^(\d{2})-(\d{2})-(\d{4})$/;

export interface DateParts {
  day: number;
  month: number;
  year: number;
}

/**
 * Splits a date key into its parts, or returns null when the text is not a
 * real calendar date ("31-02-2025" and "2025-10-13" are both rejected).
 */
export function parseDateKey(value: string): DateParts | null {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return null;

  // Day 0 of the following month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;

  return { day, month, year };
}

export function isDateKey(value: string): boolean {
  return parseDateKey(value) !== null;
}

/** Throws InputError unless `value` is a valid DD-MM-YYYY calendar date. */
export function assertDateKey(value: string): DateKey {
  if (!isDateKey(value)) {
    throw new InputError(
      `Invalid date "${value}": expected a calendar date in DD-MM-YYYY format`,
    );
  }
  return value;
}

/** Sortable YYYYMMDD number, e.g. "13-10-2025" -> 20251013. */
export function dateKeyToDayNumber(value: DateKey): number {
  const parts = parseDateKey(value);
  if (!parts) {
    throw new InputError(`Invalid date "${value}"`);
  }
  return parts.year * 10_000 + parts.month * 100 + parts.day;
}

/** Newest first. */
export function compareDateKeysDesc(a: DateKey, b: DateKey): number {
  return dateKeyToDayNumber(b) - dateKeyToDayNumber(a);
}
