// Calendar dates are ISO `YYYY-MM-DD` strings. Zero-padded ISO dates sort
// lexicographically in chronological order, so plain string comparison is
// used for range checks throughout the domain.

import { ValidationError } from '../errors.js';

export type CalendarDate = string;

export interface DateRange {
  readonly startDate: CalendarDate;
  readonly endDate: CalendarDate;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return false;
  return day <= daysInMonth(year, month);
}

/** Returns the trimmed date, or null when `raw` is not a real calendar day. */
export function parseCalendarDate(raw: unknown): CalendarDate | null {
  if (typeof raw !== 'string') return null;
  const value = raw.trim();
  return isCalendarDate(value) ? value : null;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function monthRange(year: number, month: number): DateRange {
  const mm = String(month).padStart(2, '0');
  return {
    startDate: `${year}-${mm}-01`,
    endDate: `${year}-${mm}-${String(daysInMonth(year, month)).padStart(2, '0')}`,
  };
}

/** Validates a (year, month) pair and returns its first and last day. */
export function requireMonth(year: number, month: number): DateRange {
  if (!Number.isInteger(year) || year < 1900 || year > 9999) {
    throw new ValidationError('year must be a four-digit year', 'year');
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError('month must be between 1 and 12', 'month');
  }
  return monthRange(year, month);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const [year, month, day] = date.split('-').map(Number);
  const shifted = new Date(Date.UTC(year ?? 1970, (month ?? 1) - 1, (day ?? 1) + days));
  return shifted.toISOString().slice(0, 10);
}

/** Local calendar day of a timestamp. */
export function toCalendarDate(ts: Date): CalendarDate {
  const mm = String(ts.getMonth() + 1).padStart(2, '0');
  const dd = String(ts.getDate()).padStart(2, '0');
  return `${ts.getFullYear()}-${mm}-${dd}`;
}

/** Local midnight at the start of `date`. */
export function startOfDay(date: CalendarDate): Date {
  const [year, month, day] = date.split('-').map(Number);
  return new Date(year ?? 1970, (month ?? 1) - 1, day ?? 1);
}

export function isWithin(date: CalendarDate, range: DateRange): boolean {
  return date >= range.startDate && date <= range.endDate;
}

/** `DD/MM/YYYY`, as printed on booking slips. */
export function formatDayMonthYear(date: CalendarDate): string {
  const [year, month, day] = date.split('-');
  return `${day}/${month}/${year}`;
}
