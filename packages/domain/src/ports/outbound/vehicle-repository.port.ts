import type { NewVehicle, Vehicle, VehiclePatch, VehicleStatus } from '../../entities/vehicle.js';

export interface VehicleListFilters {
  status?: VehicleStatus;
  /** Retired vehicles are listed last; pass false to leave them out. */
  includeRetired?: boolean;
}

export interface VehicleRepositoryPort {
  findById(vehicleId: number): Promise<Vehicle | null>;
  /** Ordered by plate prefix, then plate number. */
  list(filters?: VehicleListFilters): Promise<Vehicle[]>;
  create(vehicle: NewVehicle): Promise<Vehicle>;
  update(vehicleId: number, patch: VehiclePatch): Promise<Vehicle | null>;
  count(filters?: VehicleListFilters): Promise<number>;
}
