import { auditVehicleMonthData } from '../audit/monthly-audit.js';
import { requireMonth } from '../calendar/calendar-date.js';
import type { CalendarDate, DateRange } from '../calendar/calendar-date.js';
import { DEFAULT_GAP_THRESHOLD_KM } from '../entities/audit-issue.js';
import type { AuditIssue } from '../entities/audit-issue.js';
import type { Booking } from '../entities/booking.js';
import { compareByPlate } from '../entities/vehicle.js';
import type { Vehicle } from '../entities/vehicle.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { FleetAuditEntry, MonthlyAuditPort } from '../ports/inbound/monthly-audit.port.js';
import type { BookingRepositoryPort } from '../ports/outbound/booking-repository.port.js';
import type { FuelRefillRepositoryPort } from '../ports/outbound/fuel-refill-repository.port.js';
import type { VehicleRepositoryPort } from '../ports/outbound/vehicle-repository.port.js';
import { requireDateRange } from '../scheduling/overlap.js';

export interface MonthlyAuditDeps {
  vehicles: VehicleRepositoryPort;
  bookings: BookingRepositoryPort;
  refills: FuelRefillRepositoryPort;
  /** Used when a caller passes no threshold. */
  defaultGapThresholdKm?: number;
}

/** Read-only: loads a vehicle's month and runs the audit over it. */
export class MonthlyAuditService implements MonthlyAuditPort {
  private readonly defaultGapThresholdKm: number;

  constructor(private readonly deps: MonthlyAuditDeps) {
    this.defaultGapThresholdKm = deps.defaultGapThresholdKm ?? DEFAULT_GAP_THRESHOLD_KM;
  }

  async auditVehicleMonth(
    vehicleId: number,
    monthStart: CalendarDate,
    monthEnd: CalendarDate,
    gapThresholdKm?: number,
  ): Promise<AuditIssue[]> {
    const month = requireDateRange(monthStart, monthEnd);
    const threshold = this.threshold(gapThresholdKm);
    const vehicle = await this.deps.vehicles.findById(vehicleId);
    if (!vehicle) throw new NotFoundError('vehicle', vehicleId);
    return this.auditLoaded(vehicle, month, threshold);
  }

  async auditFleetMonth(year: number, month: number, gapThresholdKm?: number): Promise<FleetAuditEntry[]> {
    const range = requireMonth(year, month);
    const threshold = this.threshold(gapThresholdKm);
    const vehicles = (await this.deps.vehicles.list()).sort(compareByPlate);

    const entries: FleetAuditEntry[] = [];
    for (const vehicle of vehicles) {
      const issues = await this.auditLoaded(vehicle, range, threshold);
      if (issues.length > 0) entries.push({ vehicle, issues });
    }
    return entries;
  }

  private async auditLoaded(vehicle: Vehicle, month: DateRange, gapThresholdKm: number): Promise<AuditIssue[]> {
    const [trips, refills] = await Promise.all([
      this.deps.bookings.list({ vehicleId: vehicle.id, overlapping: month, order: 'start_asc' }),
      this.deps.refills.list({ vehicleId: vehicle.id, datedWithin: month }),
    ]);

    // refills of the month may point at a booking outside it
    const known = new Set(trips.map((t) => t.id));
    const outside = [
      ...new Set(refills.flatMap((r) => (r.bookingId !== null && !known.has(r.bookingId) ? [r.bookingId] : []))),
    ];
    const refillBookings = new Map<number, Booking>();
    if (outside.length > 0) {
      for (const b of await this.deps.bookings.findByIds(outside)) refillBookings.set(b.id, b);
    }

    return auditVehicleMonthData({
      vehicleId: vehicle.id,
      month,
      gapThresholdKm,
      trips,
      refills,
      refillBookings,
    });
  }

  private threshold(raw: number | undefined): number {
    if (raw === undefined) return this.defaultGapThresholdKm;
    if (!Number.isInteger(raw) || raw < 0) {
      throw new ValidationError('gapThresholdKm must be a non-negative integer', 'gapThresholdKm');
    }
    return raw;
  }
}
