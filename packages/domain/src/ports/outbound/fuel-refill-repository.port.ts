import type { DateRange } from '../../calendar/calendar-date.js';
import type { FuelRefill, FuelRefillPatch, NewFuelRefill } from '../../entities/fuel-refill.js';

export interface FuelRefillListFilters {
  vehicleId?: number;
  bookingId?: number;
  bookingIds?: readonly number[];
  /** Refill dates inside the range, inclusive. */
  datedWithin?: DateRange;
}

export interface FuelRefillRepositoryPort {
  findById(refillId: number): Promise<FuelRefill | null>;
  /** Ordered by refill date, then id. */
  list(filters?: FuelRefillListFilters): Promise<FuelRefill[]>;
  countByBooking(bookingId: number): Promise<number>;
  create(refill: NewFuelRefill): Promise<FuelRefill>;
  update(refillId: number, patch: FuelRefillPatch): Promise<FuelRefill | null>;
}
