import { parseCalendarDate, toCalendarDate } from '../calendar/calendar-date.js';
import { REFILLABLE_BOOKING_STATUSES } from '../entities/booking.js';
import type { EmployeeProfile } from '../entities/employee.js';
import type { FuelRefill, FuelRefillPatch } from '../entities/fuel-refill.js';
import { BusinessRuleError, NotFoundError, ValidationError } from '../errors.js';
import { parseOdometerReading } from '../lifecycle/booking-lifecycle.js';
import type { BookingRepositoryPort } from '../ports/outbound/booking-repository.port.js';
import type { ClockPort } from '../ports/outbound/clock.port.js';
import type { FuelRefillRepositoryPort } from '../ports/outbound/fuel-refill-repository.port.js';
import type { VehicleRepositoryPort } from '../ports/outbound/vehicle-repository.port.js';
import { requireActive, requireAdmin, requireMember, requireText } from './access.js';

export interface FuelRefillServiceDeps {
  refills: FuelRefillRepositoryPort;
  bookings: BookingRepositoryPort;
  vehicles: VehicleRepositoryPort;
  clock: ClockPort;
}

export interface RecordRefillCommand {
  /** Optional when a booking is given: the booking's vehicle is used. */
  vehicleId?: number | null;
  bookingId?: number | null;
  /** Defaults to today. */
  refillDate?: unknown;
  fuelPlace: string;
  voucherNumber: string;
  odometerKm: unknown;
  liters: number;
  pricePerLiter: number;
  totalPrice: number;
}

export interface RefillEdit {
  refillDate?: unknown;
  fuelPlace?: string;
  voucherNumber?: string;
  odometerKm?: unknown;
  liters?: number;
  pricePerLiter?: number | null;
  totalPrice?: number;
}

function requireAmount(value: number, field: string, opts: { positive: boolean }): number {
  if (!Number.isFinite(value) || value < 0 || (opts.positive && value === 0)) {
    throw new ValidationError(`${field} must be ${opts.positive ? 'greater than zero' : 'zero or more'}`, field);
  }
  return value;
}

function requireRefillDate(raw: unknown): string {
  const date = parseCalendarDate(raw);
  if (!date) throw new ValidationError('refillDate must be a date (YYYY-MM-DD)', 'refillDate');
  return date;
}

export class FuelRefillService {
  constructor(private readonly deps: FuelRefillServiceDeps) {}

  /**
   * Records a refill, attached to one of the actor's returned bookings
   * (PENDING_RETURN or RETURNED) or standalone, which the monthly audit
   * reports as an orphaned refill.
   */
  async record(actor: EmployeeProfile, cmd: RecordRefillCommand): Promise<FuelRefill> {
    requireActive(actor);

    let vehicleId = cmd.vehicleId ?? null;
    let bookingId: number | null = null;

    if (cmd.bookingId !== undefined && cmd.bookingId !== null) {
      const booking = await this.deps.bookings.findById(cmd.bookingId);
      if (!booking) throw new NotFoundError('booking', cmd.bookingId);
      requireMember(actor, booking);
      if (vehicleId !== null && vehicleId !== booking.vehicleId) {
        throw new ValidationError('vehicleId does not match the booking', 'vehicleId');
      }
      if (!REFILLABLE_BOOKING_STATUSES.includes(booking.status)) {
        throw new BusinessRuleError(
          'refill_not_allowed',
          `booking ${booking.id} is ${booking.status}; refills are recorded after the vehicle is returned`,
          { bookingId: booking.id, status: booking.status },
        );
      }
      vehicleId = booking.vehicleId;
      bookingId = booking.id;
    }

    if (vehicleId === null) throw new ValidationError('vehicleId is required', 'vehicleId');
    const vehicle = await this.deps.vehicles.findById(vehicleId);
    if (!vehicle) throw new NotFoundError('vehicle', vehicleId);

    return this.deps.refills.create({
      vehicleId: vehicle.id,
      bookingId,
      refillDate:
        cmd.refillDate === undefined || cmd.refillDate === ''
          ? toCalendarDate(this.deps.clock.now())
          : requireRefillDate(cmd.refillDate),
      fuelPlace: requireText(cmd.fuelPlace, 'fuelPlace'),
      voucherNumber: requireText(cmd.voucherNumber, 'voucherNumber'),
      odometerKm: parseOdometerReading(cmd.odometerKm, 'odometerKm'),
      liters: requireAmount(cmd.liters, 'liters', { positive: true }),
      pricePerLiter: requireAmount(cmd.pricePerLiter, 'pricePerLiter', { positive: false }),
      totalPrice: requireAmount(cmd.totalPrice, 'totalPrice', { positive: false }),
    });
  }

  async listForBooking(bookingId: number): Promise<FuelRefill[]> {
    return this.deps.refills.list({ bookingId });
  }

  /** Admin correction; the vehicle and booking links are fixed. */
  async adminUpdate(actor: EmployeeProfile, refillId: number, edit: RefillEdit): Promise<FuelRefill> {
    requireAdmin(actor);
    const existing = await this.deps.refills.findById(refillId);
    if (!existing) throw new NotFoundError('fuel refill', refillId);

    const patch: FuelRefillPatch = {};
    if (edit.refillDate !== undefined) patch.refillDate = requireRefillDate(edit.refillDate);
    if (edit.fuelPlace !== undefined) patch.fuelPlace = requireText(edit.fuelPlace, 'fuelPlace');
    if (edit.voucherNumber !== undefined) patch.voucherNumber = requireText(edit.voucherNumber, 'voucherNumber');
    if (edit.odometerKm !== undefined) patch.odometerKm = parseOdometerReading(edit.odometerKm, 'odometerKm');
    if (edit.liters !== undefined) patch.liters = requireAmount(edit.liters, 'liters', { positive: true });
    if (edit.totalPrice !== undefined) patch.totalPrice = requireAmount(edit.totalPrice, 'totalPrice', { positive: false });
    if (edit.pricePerLiter !== undefined) {
      patch.pricePerLiter =
        edit.pricePerLiter === null ? null : requireAmount(edit.pricePerLiter, 'pricePerLiter', { positive: false });
    }

    const updated = await this.deps.refills.update(existing.id, patch);
    if (!updated) throw new NotFoundError('fuel refill', refillId);
    return updated;
  }
}
