import type { Booking, EmployeeProfile, FuelRefill, Vehicle } from '../index.js';

// Builders shared by the domain tests. Every field has a plain default.

const T0 = new Date(2025, 11, 1, 8, 0, 0);

export function makeVehicle(overrides: Partial<Vehicle> = {}): Vehicle {
  return {
    id: 1,
    platePrefix: 'KV',
    plateNumber: '6800',
    province: 'Khon Kaen',
    currentOdometerKm: 20_000,
    brandName: 'Toyota',
    modelName: 'Hilux Revo',
    colorCode: '#377dff',
    status: 'READY',
    seatCount: 5,
    gearType: 'AUTO',
    usageType: 'POOL',
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeBooking(overrides: Partial<Booking> = {}): Booking {
  return {
    id: 1,
    vehicleId: 1,
    requesterId: 2,
    startDate: '2025-12-10',
    endDate: '2025-12-12',
    destination: 'Regional office',
    status: 'BOOKED',
    odometerBefore: null,
    odometerAfter: null,
    returnedById: null,
    coTravelerIds: [],
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeRefill(overrides: Partial<FuelRefill> = {}): FuelRefill {
  return {
    id: 1,
    vehicleId: 1,
    bookingId: 1,
    refillDate: '2025-12-11',
    fuelPlace: 'PTT',
    odometerKm: 20_100,
    liters: 30,
    totalPrice: 1200,
    pricePerLiter: 40,
    voucherNumber: '680001',
    createdAt: T0,
    ...overrides,
  };
}

export function makeEmployee(overrides: Partial<EmployeeProfile> = {}): EmployeeProfile {
  return {
    id: 2,
    employeeCode: 'emp001',
    firstName: 'Dana',
    lastName: 'Keller',
    division: null,
    department: null,
    position: null,
    role: 'EMP',
    workStatus: 'ACTIVE',
    isActive: true,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}
