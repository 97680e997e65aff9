// Vehicle roster

export type VehicleStatus = 'READY' | 'MAINTENANCE' | 'OUT_OF_SERVICE' | 'RETIRED';

export type VehicleUsageType = 'POOL' | 'OFFICE' | 'INSPECT' | 'OTHER';

export type GearType = 'AUTO' | 'MANUAL';

export const VEHICLE_STATUSES: readonly VehicleStatus[] = [
  'READY',
  'MAINTENANCE',
  'OUT_OF_SERVICE',
  'RETIRED',
];

export const VEHICLE_USAGE_TYPES: readonly VehicleUsageType[] = ['POOL', 'OFFICE', 'INSPECT', 'OTHER'];

export const GEAR_TYPES: readonly GearType[] = ['AUTO', 'MANUAL'];

export const DEFAULT_VEHICLE_COLOR = '#377dff';

export interface Vehicle {
  readonly id: number;
  readonly platePrefix: string;   // e.g. "NK"
  readonly plateNumber: string;   // e.g. "3814"
  readonly province: string;
  /** Odometer at rest; only ever advanced by lifecycle transitions. */
  readonly currentOdometerKm: number;
  readonly brandName: string;
  readonly modelName: string;
  readonly colorCode: string;     // calendar colour
  readonly status: VehicleStatus;
  readonly seatCount: number;
  readonly gearType: GearType;
  readonly usageType: VehicleUsageType;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewVehicle {
  platePrefix: string;
  plateNumber: string;
  province: string;
  currentOdometerKm?: number;
  brandName: string;
  modelName: string;
  colorCode?: string;
  status?: VehicleStatus;
  seatCount?: number;
  gearType?: GearType;
  usageType?: VehicleUsageType;
}

export type VehiclePatch = Partial<NewVehicle>;

export function displayPlate(vehicle: Pick<Vehicle, 'platePrefix' | 'plateNumber' | 'province'>): string {
  return `${vehicle.platePrefix} ${vehicle.plateNumber} ${vehicle.province}`.trim();
}

export function compareByPlate(
  a: Pick<Vehicle, 'platePrefix' | 'plateNumber' | 'id'>,
  b: Pick<Vehicle, 'platePrefix' | 'plateNumber' | 'id'>,
): number {
  if (a.platePrefix !== b.platePrefix) return a.platePrefix < b.platePrefix ? -1 : 1;
  if (a.plateNumber !== b.plateNumber) return a.plateNumber < b.plateNumber ? -1 : 1;
  return a.id - b.id;
}
