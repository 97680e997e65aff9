import type { EmployeeProfile } from '../entities/employee.js';
import { DEFAULT_VEHICLE_COLOR } from '../entities/vehicle.js';
import type { NewVehicle, Vehicle, VehiclePatch } from '../entities/vehicle.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { parseOdometerReading } from '../lifecycle/booking-lifecycle.js';
import type { VehicleRepositoryPort } from '../ports/outbound/vehicle-repository.port.js';
import { requireAdmin, requireText } from './access.js';

export interface VehicleInput {
  platePrefix: string;
  plateNumber: string;
  province: string;
  brandName: string;
  modelName: string;
  currentOdometerKm?: unknown;
  colorCode?: string;
  status?: Vehicle['status'];
  seatCount?: number;
  gearType?: Vehicle['gearType'];
  usageType?: Vehicle['usageType'];
}

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

function requireColor(raw: string): string {
  const value = raw.trim();
  if (!HEX_COLOR.test(value)) throw new ValidationError('colorCode must look like #RRGGBB', 'colorCode');
  return value;
}

function requireSeats(value: number): number {
  if (!Number.isInteger(value) || value < 1) throw new ValidationError('seatCount must be a positive integer', 'seatCount');
  return value;
}

export class VehicleService {
  constructor(private readonly vehicles: VehicleRepositoryPort) {}

  async list(): Promise<Vehicle[]> {
    return this.vehicles.list();
  }

  async get(vehicleId: number): Promise<Vehicle> {
    const vehicle = await this.vehicles.findById(vehicleId);
    if (!vehicle) throw new NotFoundError('vehicle', vehicleId);
    return vehicle;
  }

  async create(actor: EmployeeProfile, input: VehicleInput): Promise<Vehicle> {
    requireAdmin(actor);
    const vehicle: NewVehicle = {
      platePrefix: requireText(input.platePrefix, 'platePrefix'),
      plateNumber: requireText(input.plateNumber, 'plateNumber'),
      province: requireText(input.province, 'province'),
      brandName: requireText(input.brandName, 'brandName'),
      modelName: requireText(input.modelName, 'modelName'),
      currentOdometerKm:
        input.currentOdometerKm === undefined ? 0 : parseOdometerReading(input.currentOdometerKm, 'currentOdometerKm'),
      colorCode: input.colorCode === undefined ? DEFAULT_VEHICLE_COLOR : requireColor(input.colorCode),
      status: input.status ?? 'READY',
      seatCount: input.seatCount === undefined ? 5 : requireSeats(input.seatCount),
      gearType: input.gearType ?? 'AUTO',
      usageType: input.usageType ?? 'POOL',
    };
    return this.vehicles.create(vehicle);
  }

  /**
   * Admin edit. The resting odometer may be corrected here in either
   * direction; only lifecycle transitions are bound to advance it.
   */
  async update(actor: EmployeeProfile, vehicleId: number, input: Partial<VehicleInput>): Promise<Vehicle> {
    requireAdmin(actor);
    await this.get(vehicleId);

    const patch: VehiclePatch = {};
    if (input.platePrefix !== undefined) patch.platePrefix = requireText(input.platePrefix, 'platePrefix');
    if (input.plateNumber !== undefined) patch.plateNumber = requireText(input.plateNumber, 'plateNumber');
    if (input.province !== undefined) patch.province = requireText(input.province, 'province');
    if (input.brandName !== undefined) patch.brandName = requireText(input.brandName, 'brandName');
    if (input.modelName !== undefined) patch.modelName = requireText(input.modelName, 'modelName');
    if (input.currentOdometerKm !== undefined) {
      patch.currentOdometerKm = parseOdometerReading(input.currentOdometerKm, 'currentOdometerKm');
    }
    if (input.colorCode !== undefined) patch.colorCode = requireColor(input.colorCode);
    if (input.status !== undefined) patch.status = input.status;
    if (input.seatCount !== undefined) patch.seatCount = requireSeats(input.seatCount);
    if (input.gearType !== undefined) patch.gearType = input.gearType;
    if (input.usageType !== undefined) patch.usageType = input.usageType;

    const updated = await this.vehicles.update(vehicleId, patch);
    if (!updated) throw new NotFoundError('vehicle', vehicleId);
    return updated;
  }

  /** Vehicles are never removed: "delete" retires them. */
  async retire(actor: EmployeeProfile, vehicleId: number): Promise<Vehicle> {
    return this.update(actor, vehicleId, { status: 'RETIRED' });
  }
}
