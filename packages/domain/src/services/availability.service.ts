import { parseCalendarDate, toCalendarDate } from '../calendar/calendar-date.js';
import type { CalendarDate } from '../calendar/calendar-date.js';
import { compareByPlate } from '../entities/vehicle.js';
import type { Vehicle } from '../entities/vehicle.js';
import { ValidationError } from '../errors.js';
import type { BookingRepositoryPort } from '../ports/outbound/booking-repository.port.js';
import type { ClockPort } from '../ports/outbound/clock.port.js';
import type { VehicleRepositoryPort } from '../ports/outbound/vehicle-repository.port.js';
import { busyVehicleIds, requireDateRange } from '../scheduling/overlap.js';

export interface AvailabilityDeps {
  bookings: BookingRepositoryPort;
  vehicles: VehicleRepositoryPort;
  clock: ClockPort;
}

export class AvailabilityService {
  constructor(private readonly deps: AvailabilityDeps) {}

  /**
   * True when an active booking of the vehicle shares a day with
   * [startDate, endDate]. The caller guarantees start <= end.
   */
  async isOverlapping(vehicleId: number, startDate: CalendarDate, endDate: CalendarDate): Promise<boolean> {
    const blocking = await this.deps.bookings.findActiveOverlapping({ startDate, endDate }, vehicleId);
    return blocking.length > 0;
  }

  /** READY vehicles free for the whole range, ordered by plate. */
  async listAvailableVehicles(rawStart: unknown, rawEnd: unknown): Promise<Vehicle[]> {
    const range = requireDateRange(rawStart, rawEnd);
    const [ready, active] = await Promise.all([
      this.deps.vehicles.list({ status: 'READY' }),
      this.deps.bookings.findActiveOverlapping(range),
    ]);
    const busy = busyVehicleIds(active, range);
    return ready.filter((v) => !busy.has(v.id)).sort(compareByPlate);
  }

  /** Vehicles free on a single day; today when no date is given. */
  async listAvailableVehiclesOn(rawDate?: unknown): Promise<Vehicle[]> {
    const date = rawDate === undefined ? toCalendarDate(this.deps.clock.now()) : parseCalendarDate(rawDate);
    if (!date) throw new ValidationError('date must be a date (YYYY-MM-DD)', 'date');
    return this.listAvailableVehicles(date, date);
  }
}
