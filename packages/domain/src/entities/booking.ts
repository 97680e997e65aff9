import type { CalendarDate } from '../calendar/calendar-date.js';

export type BookingStatus = 'BOOKED' | 'IN_USE' | 'PENDING_RETURN' | 'RETURNED' | 'CANCELLED';

export const BOOKING_STATUSES: readonly BookingStatus[] = [
  'BOOKED',
  'IN_USE',
  'PENDING_RETURN',
  'RETURNED',
  'CANCELLED',
];

/** Statuses that hold a vehicle for their date range. */
export const ACTIVE_BOOKING_STATUSES: readonly BookingStatus[] = ['BOOKED', 'IN_USE'];

/** Statuses a fuel refill may be attached to: the vehicle has come back. */
export const REFILLABLE_BOOKING_STATUSES: readonly BookingStatus[] = ['PENDING_RETURN', 'RETURNED'];

export interface Booking {
  readonly id: number;
  readonly vehicleId: number;
  readonly requesterId: number;
  readonly startDate: CalendarDate;
  readonly endDate: CalendarDate; // inclusive
  readonly destination: string;
  readonly status: BookingStatus;
  readonly odometerBefore: number | null;
  readonly odometerAfter: number | null;
  readonly returnedById: number | null;
  readonly coTravelerIds: readonly number[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewBooking {
  vehicleId: number;
  requesterId: number;
  startDate: CalendarDate;
  endDate: CalendarDate;
  destination: string;
  coTravelerIds: number[];
}

/** Fields an admin may overwrite directly; status is never part of it. */
export interface AdminBookingPatch {
  vehicleId?: number;
  requesterId?: number;
  startDate?: CalendarDate;
  endDate?: CalendarDate;
  destination?: string;
  returnedById?: number | null;
  coTravelerIds?: number[];
  odometerBefore?: number | null;
  odometerAfter?: number | null;
}

export function isActiveBookingStatus(status: BookingStatus): boolean {
  return ACTIVE_BOOKING_STATUSES.includes(status);
}

/** Requester or one of the co-travelers. */
export function isBookingMember(booking: Pick<Booking, 'requesterId' | 'coTravelerIds'>, employeeId: number): boolean {
  return booking.requesterId === employeeId || booking.coTravelerIds.includes(employeeId);
}
