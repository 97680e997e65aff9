import { isWithin } from '../calendar/calendar-date.js';
import type { CalendarDate, DateRange } from '../calendar/calendar-date.js';
import type { AuditIssue } from '../entities/audit-issue.js';
import type { Booking } from '../entities/booking.js';
import type { FuelRefill } from '../entities/fuel-refill.js';
import { rangesOverlap } from '../scheduling/overlap.js';

export interface VehicleMonthInput {
  vehicleId: number;
  month: DateRange;
  gapThresholdKm: number;
  /** Bookings of the vehicle; those not overlapping `month` are ignored. */
  trips: readonly Booking[];
  /** Refills of the vehicle; those dated outside `month` are ignored. */
  refills: readonly FuelRefill[];
  /** Bookings referenced by refills that are not among `trips`. */
  refillBookings?: ReadonlyMap<number, Booking>;
}

function byStartThenId(a: Booking, b: Booking): number {
  if (a.startDate !== b.startDate) return a.startDate < b.startDate ? -1 : 1;
  return a.id - b.id;
}

function byDateThenId(a: FuelRefill, b: FuelRefill): number {
  if (a.refillDate !== b.refillDate) return a.refillDate < b.refillDate ? -1 : 1;
  return a.id - b.id;
}

function tripRange(b: Booking): string {
  return `${b.startDate}..${b.endDate}`;
}

function between(prevEnd: CalendarDate, nextStart: CalendarDate): string {
  return `${prevEnd} -> ${nextStart}`;
}

/**
 * Cross-checks odometer continuity of one vehicle over one month.
 *
 * Findings come out in a fixed order: per-trip checks in trip order, then
 * the gaps between consecutive trips, then refills in date order. Trips are
 * ordered by (startDate, id) and refills by (refillDate, id), so the same
 * data always yields the same list.
 */
export function auditVehicleMonthData(input: VehicleMonthInput): AuditIssue[] {
  const { vehicleId, month, gapThresholdKm } = input;
  const issues: AuditIssue[] = [];

  const trips = input.trips
    .filter((b) => b.vehicleId === vehicleId && rangesOverlap(b, month))
    .sort(byStartThenId);
  const refills = input.refills
    .filter((f) => f.vehicleId === vehicleId && isWithin(f.refillDate, month))
    .sort(byDateThenId);

  // 1) readings of each trip
  for (const trip of trips) {
    if (trip.odometerBefore === null) {
      issues.push({
        type: 'missing_before',
        vehicleId,
        bookingId: trip.id,
        refillId: null,
        dateRange: tripRange(trip),
        message: `Missing odometer reading before use (booking #${trip.id})`,
      });
    }
    if (trip.odometerAfter === null) {
      issues.push({
        type: 'missing_after',
        vehicleId,
        bookingId: trip.id,
        refillId: null,
        dateRange: tripRange(trip),
        message: `Missing odometer reading after use (booking #${trip.id})`,
      });
    }
    if (trip.odometerBefore !== null && trip.odometerAfter !== null && trip.odometerAfter < trip.odometerBefore) {
      issues.push({
        type: 'reversed_odometer',
        vehicleId,
        bookingId: trip.id,
        refillId: null,
        dateRange: tripRange(trip),
        message: `Odometer runs backwards: before=${trip.odometerBefore}, after=${trip.odometerAfter} (booking #${trip.id})`,
        details: { odometerBefore: trip.odometerBefore, odometerAfter: trip.odometerAfter },
      });
    }
  }

  // 2) continuity between consecutive trips
  for (let i = 0; i + 1 < trips.length; i++) {
    const prev = trips[i];
    const next = trips[i + 1];
    if (!prev || !next || prev.odometerAfter === null || next.odometerBefore === null) continue;

    const gapKm = next.odometerBefore - prev.odometerAfter;
    if (gapKm < 0) {
      issues.push({
        type: 'gap_negative',
        vehicleId,
        bookingId: next.id,
        refillId: null,
        dateRange: between(prev.endDate, next.startDate),
        message:
          `Odometer continuity broken: booking #${prev.id} ended at ${prev.odometerAfter} ` +
          `but booking #${next.id} started at ${next.odometerBefore} (gap=${gapKm} km)`,
        details: { gapKm },
      });
    } else if (gapKm > gapThresholdKm) {
      issues.push({
        type: 'gap_between_trips',
        vehicleId,
        bookingId: next.id,
        refillId: null,
        dateRange: between(prev.endDate, next.startDate),
        message:
          `Unexplained distance of ${gapKm} km between booking #${prev.id} and booking #${next.id} ` +
          `(threshold ${gapThresholdKm} km)`,
        details: { gapKm, thresholdKm: gapThresholdKm },
      });
    }
  }

  // 3) refills against the trip they belong to
  const tripsById = new Map(trips.map((b) => [b.id, b] as const));
  for (const refill of refills) {
    if (refill.bookingId === null) {
      issues.push({
        type: 'fuel_without_booking',
        vehicleId,
        bookingId: null,
        refillId: refill.id,
        dateRange: refill.refillDate,
        message: `Refill on ${refill.refillDate} is not linked to any booking (voucher ${refill.voucherNumber || '-'})`,
      });
      continue;
    }

    const trip = tripsById.get(refill.bookingId) ?? input.refillBookings?.get(refill.bookingId);
    if (!trip) continue;

    if (trip.odometerBefore !== null && refill.odometerKm < trip.odometerBefore) {
      issues.push({
        type: 'fuel_odometer_outside_trip',
        vehicleId,
        bookingId: trip.id,
        refillId: refill.id,
        dateRange: refill.refillDate,
        message:
          `Refill odometer (${refill.odometerKm}) is below the starting reading ` +
          `(${trip.odometerBefore}) of booking #${trip.id}`,
        details: { odometerKm: refill.odometerKm, odometerBefore: trip.odometerBefore },
      });
    }
    if (trip.odometerAfter !== null && refill.odometerKm > trip.odometerAfter) {
      issues.push({
        type: 'fuel_odometer_outside_trip',
        vehicleId,
        bookingId: trip.id,
        refillId: refill.id,
        dateRange: refill.refillDate,
        message:
          `Refill odometer (${refill.odometerKm}) is above the ending reading ` +
          `(${trip.odometerAfter}) of booking #${trip.id}`,
        details: { odometerKm: refill.odometerKm, odometerAfter: trip.odometerAfter },
      });
    }
  }

  return issues;
}
