import {
  DEFAULT_VEHICLE_COLOR,
  GEAR_TYPES,
  VEHICLE_STATUSES,
  VEHICLE_USAGE_TYPES,
} from '@carpool/domain';
import type {
  NewVehicle,
  Vehicle,
  VehicleListFilters,
  VehiclePatch,
  VehicleRepositoryPort,
} from '@carpool/domain';
import { pgDatabase } from './pool.js';
import type { Queryable, Row } from './pool.js';
import { assignments, num, oneOf, str, timestamp } from './row.js';

function listWhere(filters: VehicleListFilters): { where: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  let idx = 1;

  if (filters.status) {
    conditions.push(`status = $${idx++}`);
    params.push(filters.status);
  }
  if (filters.includeRetired === false) {
    conditions.push(`status <> 'RETIRED'`);
  }

  return { where: conditions.length ? `WHERE ${conditions.join(' AND ')}` : '', params };
}

export class PgVehicleRepository implements VehicleRepositoryPort {
  constructor(private readonly db: Queryable = pgDatabase) {}

  async findById(vehicleId: number): Promise<Vehicle | null> {
    const { rows } = await this.db.query(`SELECT * FROM carpool.vehicles WHERE id = $1`, [vehicleId]);
    return rows[0] ? mapVehicleRow(rows[0]) : null;
  }

  async list(filters: VehicleListFilters = {}): Promise<Vehicle[]> {
    const { where, params } = listWhere(filters);
    const { rows } = await this.db.query(
      `SELECT * FROM carpool.vehicles ${where}
       ORDER BY (status = 'RETIRED'), plate_prefix, plate_number, id`,
      params,
    );
    return rows.map(mapVehicleRow);
  }

  async count(filters: VehicleListFilters = {}): Promise<number> {
    const { where, params } = listWhere(filters);
    const { rows } = await this.db.query(`SELECT COUNT(*)::int AS total FROM carpool.vehicles ${where}`, params);
    return rows[0] ? num(rows[0], 'total') : 0;
  }

  async create(vehicle: NewVehicle): Promise<Vehicle> {
    const { rows } = await this.db.query(
      `INSERT INTO carpool.vehicles
         (plate_prefix, plate_number, province, current_odometer_km, brand_name, model_name,
          color_code, status, seat_count, gear_type, usage_type)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       RETURNING *`,
      [
        vehicle.platePrefix,
        vehicle.plateNumber,
        vehicle.province,
        vehicle.currentOdometerKm ?? 0,
        vehicle.brandName,
        vehicle.modelName,
        vehicle.colorCode ?? DEFAULT_VEHICLE_COLOR,
        vehicle.status ?? 'READY',
        vehicle.seatCount ?? 5,
        vehicle.gearType ?? 'AUTO',
        vehicle.usageType ?? 'POOL',
      ],
    );
    const row = rows[0];
    if (!row) throw new Error('vehicle insert returned no row');
    return mapVehicleRow(row);
  }

  async update(vehicleId: number, patch: VehiclePatch): Promise<Vehicle | null> {
    const { sets, params } = assignments([
      ['plate_prefix', patch.platePrefix],
      ['plate_number', patch.plateNumber],
      ['province', patch.province],
      ['current_odometer_km', patch.currentOdometerKm],
      ['brand_name', patch.brandName],
      ['model_name', patch.modelName],
      ['color_code', patch.colorCode],
      ['status', patch.status],
      ['seat_count', patch.seatCount],
      ['gear_type', patch.gearType],
      ['usage_type', patch.usageType],
    ]);
    if (sets.length === 0) return this.findById(vehicleId);

    const { rows } = await this.db.query(
      `UPDATE carpool.vehicles SET ${sets.join(', ')}, updated_at = NOW()
       WHERE id = $${params.length + 1} RETURNING *`,
      [...params, vehicleId],
    );
    return rows[0] ? mapVehicleRow(rows[0]) : null;
  }
}

export function mapVehicleRow(row: Row): Vehicle {
  return {
    id: num(row, 'id'),
    platePrefix: str(row, 'plate_prefix'),
    plateNumber: str(row, 'plate_number'),
    province: str(row, 'province'),
    currentOdometerKm: num(row, 'current_odometer_km'),
    brandName: str(row, 'brand_name'),
    modelName: str(row, 'model_name'),
    colorCode: str(row, 'color_code'),
    status: oneOf(row, 'status', VEHICLE_STATUSES),
    seatCount: num(row, 'seat_count'),
    gearType: oneOf(row, 'gear_type', GEAR_TYPES),
    usageType: oneOf(row, 'usage_type', VEHICLE_USAGE_TYPES),
    createdAt: timestamp(row, 'created_at'),
    updatedAt: timestamp(row, 'updated_at'),
  };
}
