import { InvalidCalendarDateError } from "../errors.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export type CalendarDateParts = {
  year: number;
  month: number; // 1-12
  day: number;
};

export function parseCalendarDate(date: string): CalendarDateParts {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new InvalidCalendarDateError(date);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // Reject rollovers such as 2025-02-30
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    throw new InvalidCalendarDateError(date);
  }

  return { year, month, day };
}

/**
 * Midnight UTC of the calendar day, in epoch milliseconds.
 */
export function utcMidnight(date: string): number {
  const { year, month, day } = parseCalendarDate(date);
  return Date.UTC(year, month - 1, day);
}

/**
 * 1-based ordinal of the day within its year (1..366).
 */
export function dayOfYear(date: string): number {
  const { year } = parseCalendarDate(date);
  return Math.round((utcMidnight(date) - Date.UTC(year, 0, 1)) / MS_PER_DAY) + 1;
}

export function addDays(date: string, days: number): string {
  return formatCalendarDate(new Date(utcMidnight(date) + days * MS_PER_DAY));
}

export function formatCalendarDate(instant: Date): string {
  const y = instant.getUTCFullYear();
  const m = String(instant.getUTCMonth() + 1).padStart(2, "0");
  const d = String(instant.getUTCDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}
