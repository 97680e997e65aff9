import type { DateRange } from '../../calendar/calendar-date.js';
import type { AdminBookingPatch, Booking, BookingStatus, NewBooking } from '../../entities/booking.js';
import type { BookingTransition } from '../../lifecycle/booking-lifecycle.js';

export type BookingOrder = 'start_asc' | 'end_desc' | 'created_desc';

export interface BookingListFilters {
  vehicleId?: number;
  statuses?: readonly BookingStatus[];
  /** Bookings sharing at least one day with the range. */
  overlapping?: DateRange;
  /** Bookings whose end date falls inside the range. */
  endingWithin?: DateRange;
  /** Bookings last touched inside [from, to). */
  updatedFrom?: Date;
  updatedTo?: Date;
  /** Requester or co-traveler. */
  memberId?: number;
  order?: BookingOrder;
  limit?: number;
}

export interface BookingRepositoryPort {
  findById(bookingId: number): Promise<Booking | null>;
  findByIds(bookingIds: readonly number[]): Promise<Booking[]>;
  list(filters?: BookingListFilters): Promise<Booking[]>;

  /** BOOKED/IN_USE bookings overlapping `range`, optionally for one vehicle. */
  findActiveOverlapping(range: DateRange, vehicleId?: number): Promise<Booking[]>;

  /**
   * Inserts a BOOKED booking. The overlap check and the insert are atomic;
   * a conflicting active booking raises `booking_conflict`.
   */
  create(booking: NewBooking): Promise<Booking>;

  /**
   * Applies a lifecycle step and its vehicle update together, provided the
   * booking is still in `transition.from`. Returns null when it is not.
   */
  applyTransition(transition: BookingTransition): Promise<Booking | null>;

  /** Direct admin overwrite; status is never touched. */
  update(bookingId: number, patch: AdminBookingPatch): Promise<Booking | null>;
}
