import type {
  FuelRefill,
  FuelRefillListFilters,
  FuelRefillPatch,
  FuelRefillRepositoryPort,
  NewFuelRefill,
} from '@carpool/domain';
import { pgDatabase } from './pool.js';
import type { Queryable, Row } from './pool.js';
import { assignments, num, numOrNull, str, timestamp } from './row.js';

export class PgFuelRefillRepository implements FuelRefillRepositoryPort {
  constructor(private readonly db: Queryable = pgDatabase) {}

  async findById(refillId: number): Promise<FuelRefill | null> {
    const { rows } = await this.db.query(`SELECT * FROM carpool.fuel_refills WHERE id = $1`, [refillId]);
    return rows[0] ? mapFuelRefillRow(rows[0]) : null;
  }

  async list(filters: FuelRefillListFilters = {}): Promise<FuelRefill[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.vehicleId !== undefined) {
      conditions.push(`vehicle_id = $${idx++}`);
      params.push(filters.vehicleId);
    }
    if (filters.bookingId !== undefined) {
      conditions.push(`booking_id = $${idx++}`);
      params.push(filters.bookingId);
    }
    if (filters.bookingIds) {
      conditions.push(`booking_id = ANY($${idx++}::int[])`);
      params.push([...filters.bookingIds]);
    }
    if (filters.datedWithin) {
      conditions.push(`refill_date BETWEEN $${idx++}::date AND $${idx++}::date`);
      params.push(filters.datedWithin.startDate, filters.datedWithin.endDate);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const { rows } = await this.db.query(
      `SELECT * FROM carpool.fuel_refills ${where} ORDER BY refill_date, id`,
      params,
    );
    return rows.map(mapFuelRefillRow);
  }

  async countByBooking(bookingId: number): Promise<number> {
    const { rows } = await this.db.query(
      `SELECT COUNT(*)::int AS total FROM carpool.fuel_refills WHERE booking_id = $1`,
      [bookingId],
    );
    return rows[0] ? num(rows[0], 'total') : 0;
  }

  async create(refill: NewFuelRefill): Promise<FuelRefill> {
    const { rows } = await this.db.query(
      `INSERT INTO carpool.fuel_refills
         (vehicle_id, booking_id, refill_date, fuel_place, odometer_km, liters,
          total_price, price_per_liter, voucher_number)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING *`,
      [
        refill.vehicleId,
        refill.bookingId,
        refill.refillDate,
        refill.fuelPlace,
        refill.odometerKm,
        refill.liters,
        refill.totalPrice,
        refill.pricePerLiter,
        refill.voucherNumber,
      ],
    );
    const row = rows[0];
    if (!row) throw new Error('fuel refill insert returned no row');
    return mapFuelRefillRow(row);
  }

  async update(refillId: number, patch: FuelRefillPatch): Promise<FuelRefill | null> {
    const { sets, params } = assignments([
      ['refill_date', patch.refillDate],
      ['fuel_place', patch.fuelPlace],
      ['odometer_km', patch.odometerKm],
      ['liters', patch.liters],
      ['total_price', patch.totalPrice],
      ['price_per_liter', patch.pricePerLiter],
      ['voucher_number', patch.voucherNumber],
    ]);
    if (sets.length === 0) return this.findById(refillId);

    const { rows } = await this.db.query(
      `UPDATE carpool.fuel_refills SET ${sets.join(', ')} WHERE id = $${params.length + 1} RETURNING *`,
      [...params, refillId],
    );
    return rows[0] ? mapFuelRefillRow(rows[0]) : null;
  }
}

export function mapFuelRefillRow(row: Row): FuelRefill {
  return {
    id: num(row, 'id'),
    vehicleId: num(row, 'vehicle_id'),
    bookingId: numOrNull(row, 'booking_id'),
    refillDate: str(row, 'refill_date'),
    fuelPlace: str(row, 'fuel_place'),
    odometerKm: num(row, 'odometer_km'),
    liters: num(row, 'liters'),
    totalPrice: num(row, 'total_price'),
    pricePerLiter: numOrNull(row, 'price_per_liter'),
    voucherNumber: str(row, 'voucher_number'),
    createdAt: timestamp(row, 'created_at'),
  };
}
