import { addDays, requireMonth, startOfDay, toCalendarDate } from '../calendar/calendar-date.js';
import type { CalendarDate } from '../calendar/calendar-date.js';
import type { Booking, BookingStatus } from '../entities/booking.js';
import type { FuelRefill } from '../entities/fuel-refill.js';
import { displayPlate } from '../entities/vehicle.js';
import type { Vehicle } from '../entities/vehicle.js';
import { NotFoundError } from '../errors.js';
import type { BookingRepositoryPort } from '../ports/outbound/booking-repository.port.js';
import type { ClockPort } from '../ports/outbound/clock.port.js';
import type { EmployeeRepositoryPort } from '../ports/outbound/employee-repository.port.js';
import type { FuelRefillRepositoryPort } from '../ports/outbound/fuel-refill-repository.port.js';
import type { VehicleRepositoryPort } from '../ports/outbound/vehicle-repository.port.js';

export interface ReportServiceDeps {
  vehicles: VehicleRepositoryPort;
  bookings: BookingRepositoryPort;
  refills: FuelRefillRepositoryPort;
  employees: EmployeeRepositoryPort;
  clock: ClockPort;
}

export type MonthBookingKind = 'all' | 'book' | 'return';

const KIND_STATUSES: Record<MonthBookingKind, readonly BookingStatus[] | null> = {
  all: null,
  book: ['BOOKED', 'IN_USE'],
  return: ['RETURNED'],
};

export interface MonthBookingList {
  bookings: Booking[];
  counts: { returned: number; inUse: number; all: number };
}

export type UsageIssue = 'MISSING' | 'NEGATIVE';

export interface UsageRow {
  booking: Booking;
  distanceKm: number | null;
  issue: UsageIssue | null;
  refillCount: number;
}

export interface UsageSummary {
  month: { startDate: CalendarDate; endDate: CalendarDate };
  returned: UsageRow[];
  active: Booking[];
  totals: { distanceKm: number; trips: number; flagged: number };
}

export interface FuelReportData {
  vehicle: Vehicle;
  title: string;
  vehicleLine: string;
  refills: FuelRefill[];
  totals: { liters: number; totalPrice: number };
  odometerStart: number | null;
  odometerEnd: number | null;
}

export interface DashboardSummary {
  vehicleCount: number;
  employeeCount: number;
  today: CalendarDate;
  todayBookings: Booking[];
}

function byUpdatedThenId(a: Booking, b: Booking): number {
  const diff = a.updatedAt.getTime() - b.updatedAt.getTime();
  return diff !== 0 ? diff : a.id - b.id;
}

/** Sums money/volume columns without drifting past two decimals. */
function sum2(values: readonly number[]): number {
  return Math.round(values.reduce((acc, v) => acc + v, 0) * 100) / 100;
}

export function usageRow(booking: Booking, refillCount: number): UsageRow {
  if (booking.odometerBefore === null || booking.odometerAfter === null) {
    return { booking, distanceKm: null, issue: 'MISSING', refillCount };
  }
  const distanceKm = booking.odometerAfter - booking.odometerBefore;
  return { booking, distanceKm, issue: distanceKm < 0 ? 'NEGATIVE' : null, refillCount };
}

/** Read models behind the admin month views and the fuel export. */
export class ReportService {
  constructor(private readonly deps: ReportServiceDeps) {}

  /**
   * Bookings ending in the month, newest end date first. Counts ignore the
   * kind filter so the tabs can show all three numbers at once.
   */
  async monthBookings(
    year: number,
    month: number,
    opts: { vehicleId?: number; kind?: MonthBookingKind } = {},
  ): Promise<MonthBookingList> {
    const range = requireMonth(year, month);
    const inMonth = await this.deps.bookings.list({
      vehicleId: opts.vehicleId,
      endingWithin: range,
      order: 'end_desc',
    });

    const statuses = KIND_STATUSES[opts.kind ?? 'all'];
    return {
      bookings: statuses ? inMonth.filter((b) => statuses.includes(b.status)) : inMonth,
      counts: {
        returned: inMonth.filter((b) => b.status === 'RETURNED').length,
        inUse: inMonth.filter((b) => b.status === 'BOOKED' || b.status === 'IN_USE').length,
        all: inMonth.length,
      },
    };
  }

  /**
   * Distance per returned trip of the month plus the bookings still open.
   * A trip counts for the month it was returned in, judged by its last update.
   */
  async usageSummary(year: number, month: number, vehicleId?: number): Promise<UsageSummary> {
    const range = requireMonth(year, month);
    const [returned, active] = await Promise.all([
      this.deps.bookings.list({
        vehicleId,
        statuses: ['RETURNED'],
        updatedFrom: startOfDay(range.startDate),
        updatedTo: startOfDay(addDays(range.endDate, 1)),
        order: 'start_asc',
      }),
      this.deps.bookings.list({
        vehicleId,
        statuses: ['BOOKED', 'IN_USE'],
        overlapping: range,
        order: 'start_asc',
      }),
    ]);

    const refills =
      returned.length > 0 ? await this.deps.refills.list({ bookingIds: returned.map((b) => b.id) }) : [];
    const refillCounts = new Map<number, number>();
    for (const r of refills) {
      if (r.bookingId !== null) refillCounts.set(r.bookingId, (refillCounts.get(r.bookingId) ?? 0) + 1);
    }

    const rows = returned.map((b) => usageRow(b, refillCounts.get(b.id) ?? 0));
    return {
      month: range,
      returned: rows,
      active,
      totals: {
        distanceKm: rows.reduce((acc, r) => acc + (r.issue === null && r.distanceKm !== null ? r.distanceKm : 0), 0),
        trips: rows.length,
        flagged: rows.filter((r) => r.issue !== null).length,
      },
    };
  }

  /** Rows and header data for one vehicle's monthly fuel sheet. */
  async fuelReport(year: number, month: number, vehicleId: number): Promise<FuelReportData> {
    const range = requireMonth(year, month);
    const vehicle = await this.deps.vehicles.findById(vehicleId);
    if (!vehicle) throw new NotFoundError('vehicle', vehicleId);

    const [refills, returned] = await Promise.all([
      this.deps.refills.list({ vehicleId, datedWithin: range }),
      this.deps.bookings.list({
        vehicleId,
        statuses: ['RETURNED'],
        updatedFrom: startOfDay(range.startDate),
        updatedTo: startOfDay(addDays(range.endDate, 1)),
      }),
    ]);

    const ordered = [...returned].sort(byUpdatedThenId);
    const first = ordered.find((b) => b.odometerBefore !== null);
    const last = [...ordered].reverse().find((b) => b.odometerAfter !== null);
    const vehicleType = `${vehicle.brandName} ${vehicle.modelName}`.trim() || '-';

    return {
      vehicle,
      title: `Fuel and lubricant usage report for ${String(month).padStart(2, '0')}/${year}`,
      vehicleLine: `Plate ${displayPlate(vehicle)}    Vehicle type ${vehicleType}`,
      refills,
      totals: {
        liters: sum2(refills.map((r) => r.liters)),
        totalPrice: sum2(refills.map((r) => r.totalPrice)),
      },
      odometerStart: first?.odometerBefore ?? null,
      odometerEnd: last?.odometerAfter ?? null,
    };
  }

  async dashboard(): Promise<DashboardSummary> {
    const today = toCalendarDate(this.deps.clock.now());
    const [vehicleCount, employeeCount, todayBookings] = await Promise.all([
      this.deps.vehicles.count({ includeRetired: false }),
      this.deps.employees.count(),
      this.deps.bookings.findActiveOverlapping({ startDate: today, endDate: today }),
    ]);
    return { vehicleCount, employeeCount, today, todayBookings };
  }
}
