import { addDays, parseCalendarDate } from '../calendar/calendar-date.js';
import type { DateRange } from '../calendar/calendar-date.js';
import { isActiveBookingStatus } from '../entities/booking.js';
import type { AdminBookingPatch, Booking } from '../entities/booking.js';
import type { EmployeeProfile } from '../entities/employee.js';
import type { FuelRefill } from '../entities/fuel-refill.js';
import { DEFAULT_VEHICLE_COLOR, displayPlate } from '../entities/vehicle.js';
import type { Vehicle } from '../entities/vehicle.js';
import { BusinessRuleError, InvalidTransitionError, NotFoundError, ValidationError, bookingConflict } from '../errors.js';
import {
  parseOdometerReading,
  planCancel,
  planConfirmReturn,
  planReturn,
  planStartUse,
} from '../lifecycle/booking-lifecycle.js';
import type { BookingTransition } from '../lifecycle/booking-lifecycle.js';
import type {
  BookingLifecyclePort,
  CreateBookingCommand,
  ReturnVehicleCommand,
} from '../ports/inbound/booking-lifecycle.port.js';
import type { BookingRepositoryPort } from '../ports/outbound/booking-repository.port.js';
import type { EmployeeRepositoryPort } from '../ports/outbound/employee-repository.port.js';
import type { FuelRefillRepositoryPort } from '../ports/outbound/fuel-refill-repository.port.js';
import type { VehicleRepositoryPort } from '../ports/outbound/vehicle-repository.port.js';
import { requireDateRange } from '../scheduling/overlap.js';
import { requireActive, requireAdmin, requireMember, requireMemberOrAdmin, requireText } from './access.js';

export interface BookingServiceDeps {
  bookings: BookingRepositoryPort;
  vehicles: VehicleRepositoryPort;
  refills: FuelRefillRepositoryPort;
  employees: EmployeeRepositoryPort;
}

export interface BookingDetail {
  booking: Booking;
  vehicle: Vehicle | null;
  requester: EmployeeProfile | null;
  returnedBy: EmployeeProfile | null;
  coTravelers: EmployeeProfile[];
  refills: FuelRefill[];
}

/** All-day calendar entry; `end` is exclusive. */
export interface CalendarEvent {
  id: number;
  title: string;
  start: string;
  end: string;
  color: string;
  vehicleId: number;
  status: Booking['status'];
  destination: string;
}

/** Raw admin edit; dates and odometers are validated here. */
export interface AdminBookingEdit {
  vehicleId?: number;
  requesterId?: number;
  startDate?: unknown;
  endDate?: unknown;
  destination?: string;
  returnedById?: number | null;
  coTravelerIds?: number[];
  odometerBefore?: unknown;
  odometerAfter?: unknown;
}

export class BookingService implements BookingLifecyclePort {
  constructor(private readonly deps: BookingServiceDeps) {}

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  async create(actor: EmployeeProfile, cmd: CreateBookingCommand): Promise<Booking> {
    requireActive(actor);
    const range = requireDateRange(cmd.startDate, cmd.endDate);
    const destination = requireText(cmd.destination, 'destination');

    const vehicle = await this.deps.vehicles.findById(cmd.vehicleId);
    if (!vehicle) throw new NotFoundError('vehicle', cmd.vehicleId);
    if (vehicle.status !== 'READY') {
      throw new BusinessRuleError('vehicle_not_ready', `vehicle ${displayPlate(vehicle)} is ${vehicle.status}`, {
        vehicleId: vehicle.id,
        status: vehicle.status,
      });
    }

    const coTravelerIds = await this.resolveCoTravelers(actor.id, cmd.coTravelerIds ?? []);

    return this.deps.bookings.create({
      vehicleId: vehicle.id,
      requesterId: actor.id,
      startDate: range.startDate,
      endDate: range.endDate,
      destination,
      coTravelerIds,
    });
  }

  async startUse(actor: EmployeeProfile, bookingId: number, odometerBefore: unknown): Promise<Booking> {
    const booking = await this.memberBooking(actor, bookingId);
    return this.commit(planStartUse(booking, odometerBefore));
  }

  async returnVehicle(actor: EmployeeProfile, bookingId: number, cmd: ReturnVehicleCommand): Promise<Booking> {
    const booking = await this.memberBooking(actor, bookingId);
    return this.commit(planReturn(booking, cmd.odometerAfter, { hasFuel: cmd.hasFuel, returnedById: actor.id }));
  }

  async confirmReturn(actor: EmployeeProfile, bookingId: number): Promise<Booking> {
    const booking = await this.memberBooking(actor, bookingId);
    const refillCount = booking.status === 'PENDING_RETURN' ? await this.deps.refills.countByBooking(booking.id) : 0;
    return this.commit(planConfirmReturn(booking, refillCount));
  }

  async cancel(actor: EmployeeProfile, bookingId: number): Promise<Booking> {
    const booking = await this.memberBooking(actor, bookingId);
    return this.commit(planCancel(booking));
  }

  // ─── Reads ──────────────────────────────────────────────────────────────────

  async getDetail(actor: EmployeeProfile, bookingId: number): Promise<BookingDetail> {
    const booking = await this.requireBooking(bookingId);
    requireMemberOrAdmin(actor, booking);

    const peopleIds = [booking.requesterId, ...booking.coTravelerIds];
    if (booking.returnedById !== null) peopleIds.push(booking.returnedById);

    const [vehicle, people, refills] = await Promise.all([
      this.deps.vehicles.findById(booking.vehicleId),
      this.deps.employees.findByIds(peopleIds),
      this.deps.refills.list({ bookingId: booking.id }),
    ]);
    const byId = new Map(people.map((p) => [p.id, p] as const));

    return {
      booking,
      vehicle,
      requester: byId.get(booking.requesterId) ?? null,
      returnedBy: booking.returnedById === null ? null : byId.get(booking.returnedById) ?? null,
      coTravelers: booking.coTravelerIds.flatMap((id) => byId.get(id) ?? []),
      refills,
    };
  }

  /** Bookings the actor requested or travels on, newest first. */
  async listMine(actor: EmployeeProfile, limit = 100): Promise<Booking[]> {
    requireActive(actor);
    return this.deps.bookings.list({ memberId: actor.id, order: 'created_desc', limit });
  }

  /** Active bookings as calendar events, optionally limited to a window. */
  async calendar(window?: DateRange): Promise<CalendarEvent[]> {
    const [bookings, vehicles] = await Promise.all([
      this.deps.bookings.list({ statuses: ['BOOKED', 'IN_USE'], overlapping: window, order: 'start_asc' }),
      this.deps.vehicles.list(),
    ]);
    const vehiclesById = new Map(vehicles.map((v) => [v.id, v] as const));

    return bookings.map((b) => {
      const vehicle = vehiclesById.get(b.vehicleId);
      return {
        id: b.id,
        title: vehicle ? `${displayPlate(vehicle)} · ${b.destination}` : b.destination,
        start: b.startDate,
        end: addDays(b.endDate, 1),
        color: vehicle?.colorCode || DEFAULT_VEHICLE_COLOR,
        vehicleId: b.vehicleId,
        status: b.status,
        destination: b.destination,
      };
    });
  }

  // ─── Admin ──────────────────────────────────────────────────────────────────

  /**
   * Overwrites booking fields without going through the lifecycle. An
   * active booking moved onto other dates or another vehicle is still
   * checked for overlap against the other active bookings.
   */
  async adminUpdate(actor: EmployeeProfile, bookingId: number, edit: AdminBookingEdit): Promise<Booking> {
    requireAdmin(actor);
    const booking = await this.requireBooking(bookingId);
    const patch: AdminBookingPatch = {};

    if (edit.startDate !== undefined) {
      const startDate = parseCalendarDate(edit.startDate);
      if (!startDate) throw new ValidationError('startDate must be a date (YYYY-MM-DD)', 'startDate');
      patch.startDate = startDate;
    }
    if (edit.endDate !== undefined) {
      const endDate = parseCalendarDate(edit.endDate);
      if (!endDate) throw new ValidationError('endDate must be a date (YYYY-MM-DD)', 'endDate');
      patch.endDate = endDate;
    }
    const range = requireDateRange(patch.startDate ?? booking.startDate, patch.endDate ?? booking.endDate);

    if (edit.destination !== undefined) patch.destination = requireText(edit.destination, 'destination');
    if (edit.odometerBefore !== undefined) {
      patch.odometerBefore = edit.odometerBefore === null ? null : parseOdometerReading(edit.odometerBefore, 'odometerBefore');
    }
    if (edit.odometerAfter !== undefined) {
      patch.odometerAfter = edit.odometerAfter === null ? null : parseOdometerReading(edit.odometerAfter, 'odometerAfter');
    }

    if (edit.vehicleId !== undefined && edit.vehicleId !== booking.vehicleId) {
      const vehicle = await this.deps.vehicles.findById(edit.vehicleId);
      if (!vehicle) throw new NotFoundError('vehicle', edit.vehicleId);
      patch.vehicleId = vehicle.id;
    }
    if (edit.requesterId !== undefined) {
      await this.requireEmployees([edit.requesterId], 'requesterId');
      patch.requesterId = edit.requesterId;
    }
    if (edit.returnedById !== undefined) {
      if (edit.returnedById !== null) await this.requireEmployees([edit.returnedById], 'returnedById');
      patch.returnedById = edit.returnedById;
    }
    if (edit.coTravelerIds !== undefined) {
      patch.coTravelerIds = await this.resolveCoTravelers(patch.requesterId ?? booking.requesterId, edit.coTravelerIds);
    }

    const vehicleId = patch.vehicleId ?? booking.vehicleId;
    const moved =
      vehicleId !== booking.vehicleId || range.startDate !== booking.startDate || range.endDate !== booking.endDate;
    if (moved && isActiveBookingStatus(booking.status)) {
      const others = await this.deps.bookings.findActiveOverlapping(range, vehicleId);
      if (others.some((b) => b.id !== booking.id)) throw bookingConflict(vehicleId, range.startDate, range.endDate);
    }

    const updated = await this.deps.bookings.update(booking.id, patch);
    if (!updated) throw new NotFoundError('booking', booking.id);
    return updated;
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private async requireBooking(bookingId: number): Promise<Booking> {
    const booking = await this.deps.bookings.findById(bookingId);
    if (!booking) throw new NotFoundError('booking', bookingId);
    return booking;
  }

  private async memberBooking(actor: EmployeeProfile, bookingId: number): Promise<Booking> {
    const booking = await this.requireBooking(bookingId);
    requireMember(actor, booking);
    return booking;
  }

  /** Applies a planned step; a booking that moved on meanwhile is reported as such. */
  private async commit(transition: BookingTransition): Promise<Booking> {
    const updated = await this.deps.bookings.applyTransition(transition);
    if (updated) return updated;

    const current = await this.requireBooking(transition.bookingId);
    throw new InvalidTransitionError(current.id, current.status, transition.action);
  }

  /** Distinct, existing and enabled employees other than the requester. */
  private async resolveCoTravelers(requesterId: number, ids: readonly number[]): Promise<number[]> {
    const unique = [...new Set(ids)].filter((id) => id !== requesterId);
    if (unique.length === 0) return [];
    await this.requireEmployees(unique, 'coTravelerIds');
    return unique;
  }

  private async requireEmployees(ids: readonly number[], field: string): Promise<void> {
    const found = await this.deps.employees.findByIds(ids);
    const enabled = new Set(found.filter((e) => e.isActive).map((e) => e.id));
    const missing = ids.filter((id) => !enabled.has(id));
    if (missing.length > 0) {
      throw new ValidationError(`unknown or disabled employee(s): ${missing.join(', ')}`, field);
    }
  }
}
