/**
 * PostgreSQL repository tests
 *
 * Runs the repositories against FakeDatabase, which records each statement
 * and replays queued rows. Checks the SQL shape, parameter order and the
 * row mappers; nothing here needs a running server.
 */

import { describe, it, expect } from '@jest/globals';

import { BusinessRuleError, NotFoundError } from '@carpool/domain';
import type { BookingTransition } from '@carpool/domain';
import {
  PgActivityLogRepository,
  PgBookingRepository,
  PgEmployeeRepository,
  PgFuelRefillRepository,
  PgVehicleRepository,
  RowShapeError,
  mapBookingRow,
  mapFuelRefillRow,
  mapVehicleRow,
} from '../index.js';
import type { Row } from '../index.js';
import { FakeDatabase } from './fake-db.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const TS = new Date('2025-12-01T01:00:00.000Z');

function vehicleRow(overrides: Row = {}): Row {
  return {
    id: 1,
    plate_prefix: 'KV',
    plate_number: '6800',
    province: 'Khon Kaen',
    current_odometer_km: 20000,
    brand_name: 'Toyota',
    model_name: 'Hilux Revo',
    color_code: '#377dff',
    status: 'READY',
    seat_count: 5,
    gear_type: 'AUTO',
    usage_type: 'POOL',
    created_at: TS,
    updated_at: TS,
    ...overrides,
  };
}

function bookingRow(overrides: Row = {}): Row {
  return {
    id: 12,
    vehicle_id: 1,
    requester_id: 2,
    start_date: '2025-12-10',
    end_date: '2025-12-12',
    destination: 'Regional office',
    status: 'BOOKED',
    odometer_before: null,
    odometer_after: null,
    returned_by_id: null,
    co_traveler_ids: [],
    created_at: TS,
    updated_at: TS,
    ...overrides,
  };
}

function refillRow(overrides: Row = {}): Row {
  return {
    id: 3,
    vehicle_id: 1,
    booking_id: 12,
    refill_date: '2025-12-11',
    fuel_place: 'Highway 2 station',
    odometer_km: 20100,
    liters: '30.50',
    total_price: '1220.00',
    price_per_liter: null,
    voucher_number: '680001',
    created_at: TS,
    ...overrides,
  };
}

function startUse(bookingId: number): BookingTransition {
  return {
    bookingId,
    action: 'start_use',
    from: 'BOOKED',
    changes: { status: 'IN_USE', odometerBefore: 20100 },
    vehicleUpdate: { vehicleId: 1, odometerAtLeastKm: 20100 },
  };
}

// ─── Row mappers ──────────────────────────────────────────────────────────────

describe('row mappers', () => {
  it('reads numeric strings and keeps DATE columns as calendar strings', () => {
    const refill = mapFuelRefillRow(refillRow());
    expect(refill.liters).toBe(30.5);
    expect(refill.totalPrice).toBe(1220);
    expect(refill.pricePerLiter).toBeNull();
    expect(refill.refillDate).toBe('2025-12-11');
  });

  it('maps co-traveller ids given as digit strings', () => {
    const booking = mapBookingRow(bookingRow({ co_traveler_ids: ['3', '4'] }));
    expect(booking.coTravelerIds).toEqual([3, 4]);
  });

  it('parses timestamps handed back as strings', () => {
    const vehicle = mapVehicleRow(vehicleRow({ updated_at: '2025-12-02T03:00:00.000Z' }));
    expect(vehicle.updatedAt.toISOString()).toBe('2025-12-02T03:00:00.000Z');
  });

  it('rejects a status outside the known set', () => {
    expect(() => mapBookingRow(bookingRow({ status: 'LOST' }))).toThrow(RowShapeError);
    expect(() => mapBookingRow(bookingRow({ status: 'LOST' }))).toThrow(
      'column status: expected BOOKED|IN_USE|PENDING_RETURN|RETURNED|CANCELLED, got string',
    );
  });

  it('rejects a missing numeric column', () => {
    expect(() => mapVehicleRow(vehicleRow({ seat_count: null }))).toThrow('column seat_count: expected number, got null');
  });
});

// ─── Vehicles ─────────────────────────────────────────────────────────────────

describe('PgVehicleRepository', () => {
  it('filters by status and hides retired vehicles', async () => {
    const db = new FakeDatabase().respond([vehicleRow()]);
    const vehicles = await new PgVehicleRepository(db).list({ status: 'READY', includeRetired: false });

    expect(vehicles.map((v) => v.id)).toEqual([1]);
    expect(db.calls).toEqual([
      {
        text:
          "SELECT * FROM carpool.vehicles WHERE status = $1 AND status <> 'RETIRED' " +
          "ORDER BY (status = 'RETIRED'), plate_prefix, plate_number, id",
        values: ['READY'],
      },
    ]);
  });

  it('counts with the same filters', async () => {
    const db = new FakeDatabase().respond([{ total: 4 }]);
    await expect(new PgVehicleRepository(db).count({ includeRetired: false })).resolves.toBe(4);
    expect(db.calls[0]?.text).toBe("SELECT COUNT(*)::int AS total FROM carpool.vehicles WHERE status <> 'RETIRED'");
  });

  it('updates only the given columns', async () => {
    const db = new FakeDatabase().respond([vehicleRow({ id: 4, status: 'RETIRED', seat_count: 7 })]);
    const updated = await new PgVehicleRepository(db).update(4, { status: 'RETIRED', seatCount: 7 });

    expect(updated?.status).toBe('RETIRED');
    expect(db.calls).toEqual([
      {
        text: 'UPDATE carpool.vehicles SET status = $1, seat_count = $2, updated_at = NOW() WHERE id = $3 RETURNING *',
        values: ['RETIRED', 7, 4],
      },
    ]);
  });

  it('reads the row back when the patch is empty', async () => {
    const db = new FakeDatabase().respond([vehicleRow({ id: 4 })]);
    await new PgVehicleRepository(db).update(4, {});
    expect(db.calls).toEqual([{ text: 'SELECT * FROM carpool.vehicles WHERE id = $1', values: [4] }]);
  });
});

// ─── Bookings ─────────────────────────────────────────────────────────────────

describe('PgBookingRepository.create', () => {
  const newBooking = {
    vehicleId: 1,
    requesterId: 2,
    startDate: '2025-12-10',
    endDate: '2025-12-12',
    destination: 'Regional office',
    coTravelerIds: [3, 4],
  };

  it('locks the vehicle, checks for a clash, inserts and reloads in one transaction', async () => {
    const db = new FakeDatabase().respond(
      [{ id: 1 }],
      [],
      [{ id: 12 }],
      [],
      [],
      [bookingRow({ co_traveler_ids: [3, 4] })],
    );
    const created = await new PgBookingRepository(db).create(newBooking);

    expect(created.id).toBe(12);
    expect(created.coTravelerIds).toEqual([3, 4]);

    const texts = db.texts();
    expect(texts).toHaveLength(8);
    expect(texts[0]).toBe('BEGIN');
    expect(db.calls[1]).toEqual({
      text: 'SELECT id FROM carpool.vehicles WHERE id = $1 FOR UPDATE',
      values: [1],
    });
    expect(texts[2]).toContain("status IN ('BOOKED', 'IN_USE') AND start_date <= $3::date AND end_date >= $2::date");
    expect(db.calls[2]?.values).toEqual([1, '2025-12-10', '2025-12-12']);
    expect(db.calls[3]?.values).toEqual([1, 2, '2025-12-10', '2025-12-12', 'Regional office']);
    expect(db.calls[4]).toEqual({
      text: 'DELETE FROM carpool.booking_co_travelers WHERE booking_id = $1',
      values: [12],
    });
    expect(db.calls[5]?.values).toEqual([12, [3, 4]]);
    expect(texts[6]).toMatch(/WHERE b\.id = \$1$/);
    expect(texts[7]).toBe('COMMIT');
  });

  it('skips the co-traveller insert when there are none', async () => {
    const db = new FakeDatabase().respond([{ id: 1 }], [], [{ id: 12 }], [], [bookingRow()]);
    await new PgBookingRepository(db).create({ ...newBooking, coTravelerIds: [] });

    expect(db.texts().filter((t) => t.startsWith('INSERT'))).toHaveLength(1);
  });

  it('rolls back with a conflict when the range is taken', async () => {
    const db = new FakeDatabase().respond([{ id: 1 }], [{ id: 9 }]);
    const err = await new PgBookingRepository(db).create(newBooking).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BusinessRuleError);
    expect(err).toMatchObject({ code: 'booking_conflict', status: 409 });
    expect(db.texts().at(-1)).toBe('ROLLBACK');
    expect(db.texts().some((t) => t.startsWith('INSERT'))).toBe(false);
  });

  it('rejects an unknown vehicle before looking for clashes', async () => {
    const db = new FakeDatabase();
    await expect(new PgBookingRepository(db).create(newBooking)).rejects.toBeInstanceOf(NotFoundError);
    expect(db.texts()).toEqual(['BEGIN', 'SELECT id FROM carpool.vehicles WHERE id = $1 FOR UPDATE', 'ROLLBACK']);
  });
});

describe('PgBookingRepository.applyTransition', () => {
  it('returns null and leaves the vehicle alone when the status moved on', async () => {
    const db = new FakeDatabase();
    await expect(new PgBookingRepository(db).applyTransition(startUse(12))).resolves.toBeNull();

    expect(db.calls).toHaveLength(3);
    expect(db.calls[1]?.text).toContain('WHERE id = $5 AND status = $6 RETURNING id');
    expect(db.calls[1]?.values).toEqual(['IN_USE', 20100, null, null, 12, 'BOOKED']);
    expect(db.texts()[2]).toBe('COMMIT');
  });

  it('advances the vehicle odometer in the same transaction', async () => {
    const db = new FakeDatabase().respond(
      [{ id: 12 }],
      [],
      [bookingRow({ status: 'IN_USE', odometer_before: 20100 })],
    );
    const updated = await new PgBookingRepository(db).applyTransition(startUse(12));

    expect(updated?.status).toBe('IN_USE');
    expect(updated?.odometerBefore).toBe(20100);
    expect(db.calls[2]?.text).toContain('UPDATE carpool.vehicles SET current_odometer_km = GREATEST(');
    expect(db.calls[2]?.values).toEqual([1, 20100, null]);
    expect(db.calls[3]?.values).toEqual([12]);
  });
});

describe('PgBookingRepository.list', () => {
  it('numbers placeholders in filter order', async () => {
    const db = new FakeDatabase();
    await new PgBookingRepository(db).list({
      vehicleId: 1,
      statuses: ['BOOKED', 'IN_USE'],
      overlapping: { startDate: '2025-12-01', endDate: '2025-12-31' },
      order: 'end_desc',
      limit: 10,
    });

    const [call] = db.calls;
    expect(call?.text).toContain(
      'WHERE b.vehicle_id = $1 AND b.status = ANY($2::text[]) AND b.start_date <= $3::date ' +
        'AND b.end_date >= $4::date ORDER BY b.end_date DESC, b.id DESC LIMIT $5',
    );
    expect(call?.values).toEqual([1, ['BOOKED', 'IN_USE'], '2025-12-31', '2025-12-01', 10]);
  });

  it('matches a member as requester or co-traveller with one parameter', async () => {
    const db = new FakeDatabase();
    await new PgBookingRepository(db).list({ memberId: 3 });

    expect(db.calls[0]?.text).toContain('WHERE (b.requester_id = $1 OR EXISTS');
    expect(db.calls[0]?.text).toContain('ct.employee_id = $1)) ORDER BY b.start_date, b.id');
    expect(db.calls[0]?.values).toEqual([3]);
  });

  it('does not query for an empty id list', async () => {
    const db = new FakeDatabase();
    await expect(new PgBookingRepository(db).findByIds([])).resolves.toEqual([]);
    expect(db.calls).toHaveLength(0);
  });
});

// ─── Refills, employees, activity ─────────────────────────────────────────────

describe('PgFuelRefillRepository', () => {
  it('lists refills for a vehicle within a date range', async () => {
    const db = new FakeDatabase().respond([refillRow()]);
    const refills = await new PgFuelRefillRepository(db).list({
      vehicleId: 1,
      datedWithin: { startDate: '2025-12-01', endDate: '2025-12-31' },
    });

    expect(refills.map((r) => r.voucherNumber)).toEqual(['680001']);
    expect(db.calls).toEqual([
      {
        text:
          'SELECT * FROM carpool.fuel_refills WHERE vehicle_id = $1 AND refill_date BETWEEN $2::date AND $3::date ' +
          'ORDER BY refill_date, id',
        values: [1, '2025-12-01', '2025-12-31'],
      },
    ]);
  });
});

describe('PgEmployeeRepository', () => {
  it('lists disabled accounts unless asked not to', async () => {
    const db = new FakeDatabase();
    const repo = new PgEmployeeRepository(db);
    await repo.list();
    await repo.list({ includeDisabled: false });

    expect(db.calls[0]?.text).toBe("SELECT * FROM carpool.employees ORDER BY (work_status <> 'ACTIVE'), employee_code");
    expect(db.calls[1]?.text).toBe(
      "SELECT * FROM carpool.employees WHERE is_active = TRUE ORDER BY (work_status <> 'ACTIVE'), employee_code",
    );
  });

  it('counts enabled accounts by default', async () => {
    const db = new FakeDatabase().respond([{ total: '6' }]);
    await expect(new PgEmployeeRepository(db).count()).resolves.toBe(6);
    expect(db.calls[0]?.text).toBe('SELECT COUNT(*)::int AS total FROM carpool.employees WHERE is_active = TRUE');
  });
});

describe('PgActivityLogRepository', () => {
  const entryRow: Row = {
    id: 1,
    actor_id: 1,
    action: 'vehicle.retire',
    entity_type: 'vehicle',
    entity_id: 4,
    payload: { status: 'RETIRED' },
    ts: TS,
  };

  it('stores the payload as JSON text', async () => {
    const db = new FakeDatabase().respond([entryRow]);
    const entry = await new PgActivityLogRepository(db).append({
      actorId: 1,
      action: 'vehicle.retire',
      entityType: 'vehicle',
      entityId: 4,
      payload: { status: 'RETIRED' },
    });

    expect(entry.payload).toEqual({ status: 'RETIRED' });
    expect(db.calls[0]?.values).toEqual([1, 'vehicle.retire', 'vehicle', 4, '{"status":"RETIRED"}']);
  });

  it('pages newest first with default limit and offset', async () => {
    const db = new FakeDatabase();
    await new PgActivityLogRepository(db).list({ entityType: 'booking' });

    expect(db.calls[0]).toEqual({
      text: 'SELECT * FROM carpool.activity_logs WHERE entity_type = $1 ORDER BY ts DESC, id DESC LIMIT $2 OFFSET $3',
      values: ['booking', 50, 0],
    });
  });
});
