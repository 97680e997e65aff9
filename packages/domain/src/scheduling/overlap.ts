import { parseCalendarDate } from '../calendar/calendar-date.js';
import type { CalendarDate, DateRange } from '../calendar/calendar-date.js';
import { isActiveBookingStatus } from '../entities/booking.js';
import type { Booking } from '../entities/booking.js';
import { ValidationError } from '../errors.js';

/** Inclusive ranges sharing at least one calendar day. */
export function rangesOverlap(a: DateRange, b: DateRange): boolean {
  return a.startDate <= b.endDate && a.endDate >= b.startDate;
}

/**
 * Active (BOOKED / IN_USE) bookings of `vehicleId` that share a day with
 * `range`. Cancelled, returned and pending-return bookings never block.
 */
export function findBlockingBookings(
  bookings: readonly Booking[],
  vehicleId: number,
  range: DateRange,
): Booking[] {
  return bookings.filter(
    (b) => b.vehicleId === vehicleId && isActiveBookingStatus(b.status) && rangesOverlap(b, range),
  );
}

/** Ids of vehicles held by at least one active booking overlapping `range`. */
export function busyVehicleIds(bookings: readonly Booking[], range: DateRange): Set<number> {
  const busy = new Set<number>();
  for (const b of bookings) {
    if (isActiveBookingStatus(b.status) && rangesOverlap(b, range)) busy.add(b.vehicleId);
  }
  return busy;
}

/** Parses both ends and rejects a missing date or an end before the start. */
export function requireDateRange(rawStart: unknown, rawEnd: unknown): DateRange {
  const startDate: CalendarDate | null = parseCalendarDate(rawStart);
  const endDate: CalendarDate | null = parseCalendarDate(rawEnd);
  if (!startDate) throw new ValidationError('startDate must be a date (YYYY-MM-DD)', 'startDate');
  if (!endDate) throw new ValidationError('endDate must be a date (YYYY-MM-DD)', 'endDate');
  if (endDate < startDate) throw new ValidationError('endDate must not be before startDate', 'endDate');
  return { startDate, endDate };
}
