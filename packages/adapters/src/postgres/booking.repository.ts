import { ACTIVE_BOOKING_STATUSES, BOOKING_STATUSES, NotFoundError, bookingConflict } from '@carpool/domain';
import type {
  AdminBookingPatch,
  Booking,
  BookingListFilters,
  BookingOrder,
  BookingRepositoryPort,
  BookingTransition,
  DateRange,
  NewBooking,
} from '@carpool/domain';
import { pgDatabase } from './pool.js';
import type { Database, Queryable, Row } from './pool.js';
import { assignments, num, numArray, numOrNull, oneOf, str, timestamp } from './row.js';

const BOOKING_SELECT = `
  SELECT b.*,
         ARRAY(SELECT ct.employee_id FROM carpool.booking_co_travelers ct
               WHERE ct.booking_id = b.id ORDER BY ct.employee_id) AS co_traveler_ids
  FROM carpool.bookings b`;

const ORDER_BY: Record<BookingOrder, string> = {
  start_asc: 'b.start_date, b.id',
  end_desc: 'b.end_date DESC, b.id DESC',
  created_desc: 'b.created_at DESC, b.id DESC',
};

function listQuery(filters: BookingListFilters): { sql: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  const next = (value: unknown): string => {
    params.push(value);
    return `$${params.length}`;
  };

  if (filters.vehicleId !== undefined) conditions.push(`b.vehicle_id = ${next(filters.vehicleId)}`);
  if (filters.statuses) conditions.push(`b.status = ANY(${next([...filters.statuses])}::text[])`);
  if (filters.overlapping) {
    conditions.push(`b.start_date <= ${next(filters.overlapping.endDate)}::date`);
    conditions.push(`b.end_date >= ${next(filters.overlapping.startDate)}::date`);
  }
  if (filters.endingWithin) {
    conditions.push(
      `b.end_date BETWEEN ${next(filters.endingWithin.startDate)}::date AND ${next(filters.endingWithin.endDate)}::date`,
    );
  }
  if (filters.updatedFrom) conditions.push(`b.updated_at >= ${next(filters.updatedFrom)}`);
  if (filters.updatedTo) conditions.push(`b.updated_at < ${next(filters.updatedTo)}`);
  if (filters.memberId !== undefined) {
    const member = next(filters.memberId);
    conditions.push(
      `(b.requester_id = ${member} OR EXISTS (SELECT 1 FROM carpool.booking_co_travelers ct
         WHERE ct.booking_id = b.id AND ct.employee_id = ${member}))`,
    );
  }

  const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
  const limit = filters.limit !== undefined ? ` LIMIT ${next(filters.limit)}` : '';
  return {
    sql: `${BOOKING_SELECT} ${where} ORDER BY ${ORDER_BY[filters.order ?? 'start_asc']}${limit}`,
    params,
  };
}

async function loadBooking(db: Queryable, bookingId: number): Promise<Booking | null> {
  const { rows } = await db.query(`${BOOKING_SELECT} WHERE b.id = $1`, [bookingId]);
  return rows[0] ? mapBookingRow(rows[0]) : null;
}

async function replaceCoTravelers(db: Queryable, bookingId: number, employeeIds: readonly number[]): Promise<void> {
  await db.query(`DELETE FROM carpool.booking_co_travelers WHERE booking_id = $1`, [bookingId]);
  if (employeeIds.length === 0) return;
  await db.query(
    `INSERT INTO carpool.booking_co_travelers (booking_id, employee_id)
     SELECT $1, unnest($2::int[])`,
    [bookingId, [...employeeIds]],
  );
}

export class PgBookingRepository implements BookingRepositoryPort {
  constructor(private readonly db: Database = pgDatabase) {}

  async findById(bookingId: number): Promise<Booking | null> {
    return loadBooking(this.db, bookingId);
  }

  async findByIds(bookingIds: readonly number[]): Promise<Booking[]> {
    if (bookingIds.length === 0) return [];
    const { rows } = await this.db.query(`${BOOKING_SELECT} WHERE b.id = ANY($1::int[]) ORDER BY b.id`, [
      [...bookingIds],
    ]);
    return rows.map(mapBookingRow);
  }

  async list(filters: BookingListFilters = {}): Promise<Booking[]> {
    const { sql, params } = listQuery(filters);
    const { rows } = await this.db.query(sql, params);
    return rows.map(mapBookingRow);
  }

  async findActiveOverlapping(range: DateRange, vehicleId?: number): Promise<Booking[]> {
    return this.list({ vehicleId, statuses: ACTIVE_BOOKING_STATUSES, overlapping: range });
  }

  /**
   * Locks the vehicle row first, so two requests for the same vehicle run the
   * overlap check one after the other.
   */
  async create(booking: NewBooking): Promise<Booking> {
    return this.db.transaction(async (tx) => {
      const locked = await tx.query(`SELECT id FROM carpool.vehicles WHERE id = $1 FOR UPDATE`, [booking.vehicleId]);
      if (locked.rows.length === 0) throw new NotFoundError('vehicle', booking.vehicleId);

      const clash = await tx.query(
        `SELECT id FROM carpool.bookings
         WHERE vehicle_id = $1
           AND status IN ('BOOKED', 'IN_USE')
           AND start_date <= $3::date
           AND end_date >= $2::date
         LIMIT 1`,
        [booking.vehicleId, booking.startDate, booking.endDate],
      );
      if (clash.rows.length > 0) throw bookingConflict(booking.vehicleId, booking.startDate, booking.endDate);

      const inserted = await tx.query(
        `INSERT INTO carpool.bookings (vehicle_id, requester_id, start_date, end_date, destination, status)
         VALUES ($1, $2, $3, $4, $5, 'BOOKED')
         RETURNING id`,
        [booking.vehicleId, booking.requesterId, booking.startDate, booking.endDate, booking.destination],
      );
      const row = inserted.rows[0];
      if (!row) throw new Error('booking insert returned no row');
      const bookingId = num(row, 'id');

      await replaceCoTravelers(tx, bookingId, booking.coTravelerIds);
      const created = await loadBooking(tx, bookingId);
      if (!created) throw new Error(`booking ${bookingId} vanished after insert`);
      return created;
    });
  }

  async applyTransition(transition: BookingTransition): Promise<Booking | null> {
    const { changes, vehicleUpdate } = transition;
    return this.db.transaction(async (tx) => {
      const updated = await tx.query(
        `UPDATE carpool.bookings
         SET status = $1,
             odometer_before = COALESCE($2::int, odometer_before),
             odometer_after = COALESCE($3::int, odometer_after),
             returned_by_id = COALESCE($4::int, returned_by_id),
             updated_at = NOW()
         WHERE id = $5 AND status = $6
         RETURNING id`,
        [
          changes.status,
          changes.odometerBefore ?? null,
          changes.odometerAfter ?? null,
          changes.returnedById ?? null,
          transition.bookingId,
          transition.from,
        ],
      );
      if (updated.rows.length === 0) return null;

      if (vehicleUpdate) {
        await tx.query(
          `UPDATE carpool.vehicles
           SET current_odometer_km = GREATEST(current_odometer_km, COALESCE($2::int, current_odometer_km)),
               status = COALESCE($3, status),
               updated_at = NOW()
           WHERE id = $1`,
          [vehicleUpdate.vehicleId, vehicleUpdate.odometerAtLeastKm, vehicleUpdate.status ?? null],
        );
      }
      return loadBooking(tx, transition.bookingId);
    });
  }

  async update(bookingId: number, patch: AdminBookingPatch): Promise<Booking | null> {
    return this.db.transaction(async (tx) => {
      const { sets, params } = assignments([
        ['vehicle_id', patch.vehicleId],
        ['requester_id', patch.requesterId],
        ['start_date', patch.startDate],
        ['end_date', patch.endDate],
        ['destination', patch.destination],
        ['returned_by_id', patch.returnedById],
        ['odometer_before', patch.odometerBefore],
        ['odometer_after', patch.odometerAfter],
      ]);
      const updated = await tx.query(
        `UPDATE carpool.bookings SET ${[...sets, 'updated_at = NOW()'].join(', ')}
         WHERE id = $${params.length + 1} RETURNING id`,
        [...params, bookingId],
      );
      if (updated.rows.length === 0) return null;

      if (patch.coTravelerIds) await replaceCoTravelers(tx, bookingId, patch.coTravelerIds);
      return loadBooking(tx, bookingId);
    });
  }
}

export function mapBookingRow(row: Row): Booking {
  return {
    id: num(row, 'id'),
    vehicleId: num(row, 'vehicle_id'),
    requesterId: num(row, 'requester_id'),
    startDate: str(row, 'start_date'),
    endDate: str(row, 'end_date'),
    destination: str(row, 'destination'),
    status: oneOf(row, 'status', BOOKING_STATUSES),
    odometerBefore: numOrNull(row, 'odometer_before'),
    odometerAfter: numOrNull(row, 'odometer_after'),
    returnedById: numOrNull(row, 'returned_by_id'),
    coTravelerIds: numArray(row, 'co_traveler_ids'),
    createdAt: timestamp(row, 'created_at'),
    updatedAt: timestamp(row, 'updated_at'),
  };
}
