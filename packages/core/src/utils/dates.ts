/**
 * Calendar date helpers for the dd/mm/yy dates used in UK bank exports
 */

import type { CalendarDate } from '../types/index.js';

const UK_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/;

/** Two-digit years below this are 20xx, the rest 19xx */
const TWO_DIGIT_YEAR_PIVOT = 69;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parse "dd/mm/yy" or "dd/mm/yyyy". Returns null for anything that is not a real date.
 */
export function parseUkDate(input: string): CalendarDate | null {
  const match = UK_DATE_PATTERN.exec(input.trim());
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const rawYear = match[3] ?? '';
  let year = Number(rawYear);
  if (rawYear.length === 2) {
    year += year < TWO_DIGIT_YEAR_PIVOT ? 2000 : 1900;
  }

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/**
 * Same day and month, `years` earlier. 29 February becomes 28 February in a non-leap year.
 */
export function subtractYears(date: CalendarDate, years: number): CalendarDate {
  const year = date.year - years;
  const day = Math.min(date.day, daysInMonth(year, date.month));
  return { year, month: date.month, day };
}

export function formatIsoDate(date: CalendarDate): string {
  const mm = String(date.month).padStart(2, '0');
  const dd = String(date.day).padStart(2, '0');
  return `${String(date.year).padStart(4, '0')}-${mm}-${dd}`;
}

export function formatUkDate(date: CalendarDate): string {
  const dd = String(date.day).padStart(2, '0');
  const mm = String(date.month).padStart(2, '0');
  const yy = String(date.year % 100).padStart(2, '0');
  return `${dd}/${mm}/${yy}`;
}

/**
 * Midnight UTC on the given day, for spreadsheet cells
 */
export function toUtcDate(date: CalendarDate): Date {
  return new Date(Date.UTC(date.year, date.month - 1, date.day));
}
