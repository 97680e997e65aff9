/**
 * Monthly audit engine tests
 *
 * The engine is a pure function of one vehicle's trips and refills for one
 * month; these tests feed it hand-built data and assert the exact findings.
 */

import { describe, it, expect } from '@jest/globals';

import { auditVehicleMonthData } from '../index.js';
import type { Booking, FuelRefill, VehicleMonthInput } from '../index.js';
import { makeBooking, makeRefill } from './fixtures.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const DECEMBER = { startDate: '2025-12-01', endDate: '2025-12-31' };

function audit(trips: Booking[], refills: FuelRefill[] = [], extra: Partial<VehicleMonthInput> = {}) {
  return auditVehicleMonthData({ vehicleId: 1, month: DECEMBER, gapThresholdKm: 200, trips, refills, ...extra });
}

function returned(id: number, startDate: string, endDate: string, before: number, after: number): Booking {
  return makeBooking({ id, startDate, endDate, status: 'RETURNED', odometerBefore: before, odometerAfter: after });
}

// ─── Per-trip readings ────────────────────────────────────────────────────────

describe('trip readings', () => {
  it('reports nothing for a clean month', () => {
    const trips = [returned(1, '2025-12-01', '2025-12-02', 20_000, 20_200), returned(2, '2025-12-04', '2025-12-05', 20_210, 20_400)];
    expect(audit(trips)).toEqual([]);
  });

  it('reports only missing_after for a trip that has started but not returned', () => {
    const trip = makeBooking({ id: 3, status: 'IN_USE', odometerBefore: 20_100 });
    expect(audit([trip])).toEqual([
      {
        type: 'missing_after',
        vehicleId: 1,
        bookingId: 3,
        refillId: null,
        dateRange: '2025-12-10..2025-12-12',
        message: 'Missing odometer reading after use (booking #3)',
      },
    ]);
  });

  it('reports both missing readings for a booking never started', () => {
    expect(audit([makeBooking({ id: 4 })]).map((i) => i.type)).toEqual(['missing_before', 'missing_after']);
  });

  it('reports a reversed odometer with its readings', () => {
    const [issue] = audit([returned(5, '2025-12-10', '2025-12-10', 20_500, 20_400)]);
    expect(issue).toMatchObject({
      type: 'reversed_odometer',
      bookingId: 5,
      message: 'Odometer runs backwards: before=20500, after=20400 (booking #5)',
      details: { odometerBefore: 20_500, odometerAfter: 20_400 },
    });
  });

  it('covers trips that only partly fall in the month', () => {
    const spanning = makeBooking({ id: 6, startDate: '2025-11-29', endDate: '2025-12-02', status: 'IN_USE', odometerBefore: 1 });
    const outside = makeBooking({ id: 7, startDate: '2025-11-20', endDate: '2025-11-21' });
    expect(audit([spanning, outside]).map((i) => i.bookingId)).toEqual([6]);
  });
});

// ─── Continuity ───────────────────────────────────────────────────────────────

describe('continuity between trips', () => {
  it('flags a gap above the threshold on the later trip', () => {
    const a = returned(10, '2025-12-03', '2025-12-05', 20_100, 20_450);
    const b = returned(11, '2025-12-07', '2025-12-08', 20_700, 20_800);
    expect(audit([b, a])).toEqual([
      {
        type: 'gap_between_trips',
        vehicleId: 1,
        bookingId: 11,
        refillId: null,
        dateRange: '2025-12-05 -> 2025-12-07',
        message: 'Unexplained distance of 250 km between booking #10 and booking #11 (threshold 200 km)',
        details: { gapKm: 250, thresholdKm: 200 },
      },
    ]);
  });

  it('allows a gap equal to the threshold', () => {
    const a = returned(10, '2025-12-03', '2025-12-05', 20_100, 20_450);
    const b = returned(11, '2025-12-07', '2025-12-08', 20_650, 20_800);
    expect(audit([a, b])).toEqual([]);
  });

  it('flags a negative gap regardless of the threshold', () => {
    const a = returned(10, '2025-12-03', '2025-12-05', 20_100, 20_450);
    const b = returned(11, '2025-12-07', '2025-12-08', 20_400, 20_800);
    const [issue] = audit([a, b], [], { gapThresholdKm: 10_000 });
    expect(issue).toMatchObject({
      type: 'gap_negative',
      bookingId: 11,
      message: 'Odometer continuity broken: booking #10 ended at 20450 but booking #11 started at 20400 (gap=-50 km)',
      details: { gapKm: -50 },
    });
  });

  it('skips the gap check when a reading is missing', () => {
    const a = makeBooking({ id: 10, startDate: '2025-12-03', endDate: '2025-12-05', status: 'IN_USE', odometerBefore: 20_100 });
    const b = returned(11, '2025-12-07', '2025-12-08', 99_000, 99_100);
    expect(audit([a, b]).map((i) => i.type)).toEqual(['missing_after']);
  });

  it('orders trips on the same day by id', () => {
    const first = returned(21, '2025-12-10', '2025-12-10', 20_000, 20_050);
    const second = returned(22, '2025-12-10', '2025-12-10', 20_500, 20_600);
    const [issue] = audit([second, first]);
    expect(issue?.message).toBe('Unexplained distance of 450 km between booking #21 and booking #22 (threshold 200 km)');
  });
});

// ─── Refills ──────────────────────────────────────────────────────────────────

describe('refills', () => {
  it('flags a refill below the starting reading of its trip', () => {
    const trip = returned(30, '2025-12-10', '2025-12-12', 20_200, 20_500);
    const refill = makeRefill({ id: 40, bookingId: 30, odometerKm: 20_100, refillDate: '2025-12-11' });
    expect(audit([trip], [refill])).toEqual([
      {
        type: 'fuel_odometer_outside_trip',
        vehicleId: 1,
        bookingId: 30,
        refillId: 40,
        dateRange: '2025-12-11',
        message: 'Refill odometer (20100) is below the starting reading (20200) of booking #30',
        details: { odometerKm: 20_100, odometerBefore: 20_200 },
      },
    ]);
  });

  it('flags a refill above the ending reading of its trip', () => {
    const trip = returned(30, '2025-12-10', '2025-12-12', 20_200, 20_500);
    const [issue] = audit([trip], [makeRefill({ id: 41, bookingId: 30, odometerKm: 20_600 })]);
    expect(issue?.message).toBe('Refill odometer (20600) is above the ending reading (20500) of booking #30');
  });

  it('accepts refills on the trip bounds', () => {
    const trip = returned(30, '2025-12-10', '2025-12-12', 20_200, 20_500);
    const refills = [makeRefill({ id: 1, bookingId: 30, odometerKm: 20_200 }), makeRefill({ id: 2, bookingId: 30, odometerKm: 20_500 })];
    expect(audit([trip], refills)).toEqual([]);
  });

  it('flags a refill without a booking', () => {
    const refill = makeRefill({ id: 42, bookingId: null, refillDate: '2025-12-20', voucherNumber: '680017' });
    expect(audit([], [refill])).toEqual([
      {
        type: 'fuel_without_booking',
        vehicleId: 1,
        bookingId: null,
        refillId: 42,
        dateRange: '2025-12-20',
        message: 'Refill on 2025-12-20 is not linked to any booking (voucher 680017)',
      },
    ]);
  });

  it('checks refills against bookings outside the month when given', () => {
    const november = returned(50, '2025-11-28', '2025-11-30', 19_000, 19_300);
    const refill = makeRefill({ id: 43, bookingId: 50, odometerKm: 19_400, refillDate: '2025-12-01' });
    expect(audit([], [refill])).toEqual([]);
    const [issue] = audit([], [refill], { refillBookings: new Map([[50, november]]) });
    expect(issue).toMatchObject({ type: 'fuel_odometer_outside_trip', bookingId: 50, refillId: 43 });
  });

  it('ignores refills dated outside the month', () => {
    expect(audit([], [makeRefill({ bookingId: null, refillDate: '2026-01-01' })])).toEqual([]);
  });
});

// ─── Ordering ─────────────────────────────────────────────────────────────────

describe('output order', () => {
  it('lists trip findings, then gaps, then refills, and is stable across input order', () => {
    const a = returned(1, '2025-12-01', '2025-12-02', 20_000, 20_100);
    const b = returned(2, '2025-12-05', '2025-12-06', 20_900, 20_800);
    const c = makeBooking({ id: 3, startDate: '2025-12-20', endDate: '2025-12-21' });
    const orphan = makeRefill({ id: 9, bookingId: null, refillDate: '2025-12-03' });

    const forward = audit([a, b, c], [orphan]);
    const backward = audit([c, b, a], [orphan]);
    expect(forward.map((i) => i.type)).toEqual([
      'reversed_odometer',
      'missing_before',
      'missing_after',
      'gap_between_trips',
      'fuel_without_booking',
    ]);
    expect(backward).toEqual(forward);
  });
});
