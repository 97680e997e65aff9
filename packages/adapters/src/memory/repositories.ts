import {
  ACTIVE_BOOKING_STATUSES,
  DEFAULT_VEHICLE_COLOR,
  NotFoundError,
  bookingConflict,
  compareByPlate,
  findBlockingBookings,
  isBookingMember,
  isWithin,
  rangesOverlap,
} from '@carpool/domain';
import type {
  ActivityLogEntry,
  ActivityLogFilters,
  ActivityLogInput,
  ActivityLogPort,
  AdminBookingPatch,
  Booking,
  BookingListFilters,
  BookingOrder,
  BookingRepositoryPort,
  BookingTransition,
  DateRange,
  EmployeePatch,
  EmployeeProfile,
  EmployeeRepositoryPort,
  FuelRefill,
  FuelRefillListFilters,
  FuelRefillPatch,
  FuelRefillRepositoryPort,
  NewBooking,
  NewEmployee,
  NewFuelRefill,
  NewVehicle,
  Vehicle,
  VehicleListFilters,
  VehiclePatch,
  VehicleRepositoryPort,
} from '@carpool/domain';
import type { MemoryStore } from './store.js';

/** Patch value when given (null included), current value otherwise. */
function pick<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

// ─── Vehicles ─────────────────────────────────────────────────────────────────

function vehicleMatches(v: Vehicle, filters: VehicleListFilters): boolean {
  if (filters.status && v.status !== filters.status) return false;
  if (filters.includeRetired === false && v.status === 'RETIRED') return false;
  return true;
}

export class MemoryVehicleRepository implements VehicleRepositoryPort {
  constructor(private readonly store: MemoryStore) {}

  async findById(vehicleId: number): Promise<Vehicle | null> {
    return this.store.vehicles.get(vehicleId) ?? null;
  }

  async list(filters: VehicleListFilters = {}): Promise<Vehicle[]> {
    return [...this.store.vehicles.values()]
      .filter((v) => vehicleMatches(v, filters))
      .sort((a, b) => Number(a.status === 'RETIRED') - Number(b.status === 'RETIRED') || compareByPlate(a, b));
  }

  async count(filters: VehicleListFilters = {}): Promise<number> {
    return [...this.store.vehicles.values()].filter((v) => vehicleMatches(v, filters)).length;
  }

  async create(vehicle: NewVehicle): Promise<Vehicle> {
    const now = this.store.clock.now();
    const created: Vehicle = {
      id: this.store.nextId('vehicle'),
      platePrefix: vehicle.platePrefix,
      plateNumber: vehicle.plateNumber,
      province: vehicle.province,
      currentOdometerKm: vehicle.currentOdometerKm ?? 0,
      brandName: vehicle.brandName,
      modelName: vehicle.modelName,
      colorCode: vehicle.colorCode ?? DEFAULT_VEHICLE_COLOR,
      status: vehicle.status ?? 'READY',
      seatCount: vehicle.seatCount ?? 5,
      gearType: vehicle.gearType ?? 'AUTO',
      usageType: vehicle.usageType ?? 'POOL',
      createdAt: now,
      updatedAt: now,
    };
    this.store.vehicles.set(created.id, created);
    return created;
  }

  async update(vehicleId: number, patch: VehiclePatch): Promise<Vehicle | null> {
    const current = this.store.vehicles.get(vehicleId);
    if (!current) return null;
    const updated: Vehicle = {
      ...current,
      platePrefix: pick(patch.platePrefix, current.platePrefix),
      plateNumber: pick(patch.plateNumber, current.plateNumber),
      province: pick(patch.province, current.province),
      currentOdometerKm: pick(patch.currentOdometerKm, current.currentOdometerKm),
      brandName: pick(patch.brandName, current.brandName),
      modelName: pick(patch.modelName, current.modelName),
      colorCode: pick(patch.colorCode, current.colorCode),
      status: pick(patch.status, current.status),
      seatCount: pick(patch.seatCount, current.seatCount),
      gearType: pick(patch.gearType, current.gearType),
      usageType: pick(patch.usageType, current.usageType),
      updatedAt: this.store.clock.now(),
    };
    this.store.vehicles.set(vehicleId, updated);
    return updated;
  }
}

// ─── Bookings ─────────────────────────────────────────────────────────────────

const BOOKING_ORDER: Record<BookingOrder, (a: Booking, b: Booking) => number> = {
  start_asc: (a, b) => (a.startDate === b.startDate ? a.id - b.id : a.startDate < b.startDate ? -1 : 1),
  end_desc: (a, b) => (a.endDate === b.endDate ? b.id - a.id : a.endDate < b.endDate ? 1 : -1),
  created_desc: (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id,
};

function bookingMatches(b: Booking, f: BookingListFilters): boolean {
  if (f.vehicleId !== undefined && b.vehicleId !== f.vehicleId) return false;
  if (f.statuses && !f.statuses.includes(b.status)) return false;
  if (f.overlapping && !rangesOverlap(b, f.overlapping)) return false;
  if (f.endingWithin && !isWithin(b.endDate, f.endingWithin)) return false;
  if (f.updatedFrom && b.updatedAt.getTime() < f.updatedFrom.getTime()) return false;
  if (f.updatedTo && b.updatedAt.getTime() >= f.updatedTo.getTime()) return false;
  if (f.memberId !== undefined && !isBookingMember(b, f.memberId)) return false;
  return true;
}

/**
 * Runs every step synchronously between awaits, so each create and
 * transition is atomic with respect to the others in this process.
 */
export class MemoryBookingRepository implements BookingRepositoryPort {
  constructor(private readonly store: MemoryStore) {}

  async findById(bookingId: number): Promise<Booking | null> {
    return this.store.bookings.get(bookingId) ?? null;
  }

  async findByIds(bookingIds: readonly number[]): Promise<Booking[]> {
    return bookingIds
      .flatMap((id) => this.store.bookings.get(id) ?? [])
      .sort((a, b) => a.id - b.id);
  }

  async list(filters: BookingListFilters = {}): Promise<Booking[]> {
    const rows = [...this.store.bookings.values()]
      .filter((b) => bookingMatches(b, filters))
      .sort(BOOKING_ORDER[filters.order ?? 'start_asc']);
    return filters.limit !== undefined ? rows.slice(0, filters.limit) : rows;
  }

  async findActiveOverlapping(range: DateRange, vehicleId?: number): Promise<Booking[]> {
    return this.list({ vehicleId, statuses: ACTIVE_BOOKING_STATUSES, overlapping: range });
  }

  async create(booking: NewBooking): Promise<Booking> {
    if (!this.store.vehicles.has(booking.vehicleId)) throw new NotFoundError('vehicle', booking.vehicleId);
    const range = { startDate: booking.startDate, endDate: booking.endDate };
    if (findBlockingBookings([...this.store.bookings.values()], booking.vehicleId, range).length > 0) {
      throw bookingConflict(booking.vehicleId, booking.startDate, booking.endDate);
    }

    const now = this.store.clock.now();
    const created: Booking = {
      id: this.store.nextId('booking'),
      vehicleId: booking.vehicleId,
      requesterId: booking.requesterId,
      startDate: booking.startDate,
      endDate: booking.endDate,
      destination: booking.destination,
      status: 'BOOKED',
      odometerBefore: null,
      odometerAfter: null,
      returnedById: null,
      coTravelerIds: [...booking.coTravelerIds].sort((a, b) => a - b),
      createdAt: now,
      updatedAt: now,
    };
    this.store.bookings.set(created.id, created);
    return created;
  }

  async applyTransition(transition: BookingTransition): Promise<Booking | null> {
    const current = this.store.bookings.get(transition.bookingId);
    if (!current || current.status !== transition.from) return null;

    const now = this.store.clock.now();
    const { changes, vehicleUpdate } = transition;
    const updated: Booking = {
      ...current,
      status: changes.status,
      odometerBefore: changes.odometerBefore ?? current.odometerBefore,
      odometerAfter: changes.odometerAfter ?? current.odometerAfter,
      returnedById: changes.returnedById ?? current.returnedById,
      updatedAt: now,
    };
    this.store.bookings.set(updated.id, updated);

    const vehicle = vehicleUpdate ? this.store.vehicles.get(vehicleUpdate.vehicleId) : undefined;
    if (vehicleUpdate && vehicle) {
      this.store.vehicles.set(vehicle.id, {
        ...vehicle,
        currentOdometerKm: Math.max(vehicle.currentOdometerKm, vehicleUpdate.odometerAtLeastKm ?? vehicle.currentOdometerKm),
        status: vehicleUpdate.status ?? vehicle.status,
        updatedAt: now,
      });
    }
    return updated;
  }

  async update(bookingId: number, patch: AdminBookingPatch): Promise<Booking | null> {
    const current = this.store.bookings.get(bookingId);
    if (!current) return null;
    const updated: Booking = {
      ...current,
      vehicleId: pick(patch.vehicleId, current.vehicleId),
      requesterId: pick(patch.requesterId, current.requesterId),
      startDate: pick(patch.startDate, current.startDate),
      endDate: pick(patch.endDate, current.endDate),
      destination: pick(patch.destination, current.destination),
      returnedById: pick(patch.returnedById, current.returnedById),
      odometerBefore: pick(patch.odometerBefore, current.odometerBefore),
      odometerAfter: pick(patch.odometerAfter, current.odometerAfter),
      coTravelerIds: patch.coTravelerIds ? [...patch.coTravelerIds].sort((a, b) => a - b) : current.coTravelerIds,
      updatedAt: this.store.clock.now(),
    };
    this.store.bookings.set(bookingId, updated);
    return updated;
  }
}

// ─── Fuel refills ─────────────────────────────────────────────────────────────

export class MemoryFuelRefillRepository implements FuelRefillRepositoryPort {
  constructor(private readonly store: MemoryStore) {}

  async findById(refillId: number): Promise<FuelRefill | null> {
    return this.store.refills.get(refillId) ?? null;
  }

  async list(filters: FuelRefillListFilters = {}): Promise<FuelRefill[]> {
    const { vehicleId, bookingId, bookingIds, datedWithin } = filters;
    return [...this.store.refills.values()]
      .filter((r) => vehicleId === undefined || r.vehicleId === vehicleId)
      .filter((r) => bookingId === undefined || r.bookingId === bookingId)
      .filter((r) => !bookingIds || (r.bookingId !== null && bookingIds.includes(r.bookingId)))
      .filter((r) => !datedWithin || isWithin(r.refillDate, datedWithin))
      .sort((a, b) => (a.refillDate === b.refillDate ? a.id - b.id : a.refillDate < b.refillDate ? -1 : 1));
  }

  async countByBooking(bookingId: number): Promise<number> {
    return (await this.list({ bookingId })).length;
  }

  async create(refill: NewFuelRefill): Promise<FuelRefill> {
    const created: FuelRefill = { ...refill, id: this.store.nextId('refill'), createdAt: this.store.clock.now() };
    this.store.refills.set(created.id, created);
    return created;
  }

  async update(refillId: number, patch: FuelRefillPatch): Promise<FuelRefill | null> {
    const current = this.store.refills.get(refillId);
    if (!current) return null;
    const updated: FuelRefill = {
      ...current,
      refillDate: pick(patch.refillDate, current.refillDate),
      fuelPlace: pick(patch.fuelPlace, current.fuelPlace),
      odometerKm: pick(patch.odometerKm, current.odometerKm),
      liters: pick(patch.liters, current.liters),
      totalPrice: pick(patch.totalPrice, current.totalPrice),
      pricePerLiter: pick(patch.pricePerLiter, current.pricePerLiter),
      voucherNumber: pick(patch.voucherNumber, current.voucherNumber),
    };
    this.store.refills.set(refillId, updated);
    return updated;
  }
}

// ─── Employees ────────────────────────────────────────────────────────────────

export class MemoryEmployeeRepository implements EmployeeRepositoryPort {
  constructor(private readonly store: MemoryStore) {}

  async findById(employeeId: number): Promise<EmployeeProfile | null> {
    return this.store.employees.get(employeeId) ?? null;
  }

  async findByIds(employeeIds: readonly number[]): Promise<EmployeeProfile[]> {
    return [...new Set(employeeIds)]
      .flatMap((id) => this.store.employees.get(id) ?? [])
      .sort((a, b) => a.id - b.id);
  }

  async findByCode(employeeCode: string): Promise<EmployeeProfile | null> {
    return [...this.store.employees.values()].find((e) => e.employeeCode === employeeCode) ?? null;
  }

  async list(opts: { includeDisabled?: boolean } = {}): Promise<EmployeeProfile[]> {
    return [...this.store.employees.values()]
      .filter((e) => opts.includeDisabled !== false || e.isActive)
      .sort(
        (a, b) =>
          Number(a.workStatus !== 'ACTIVE') - Number(b.workStatus !== 'ACTIVE') ||
          (a.employeeCode < b.employeeCode ? -1 : a.employeeCode > b.employeeCode ? 1 : 0),
      );
  }

  async count(opts: { includeDisabled?: boolean } = {}): Promise<number> {
    return [...this.store.employees.values()].filter((e) => opts.includeDisabled || e.isActive).length;
  }

  async create(employee: NewEmployee): Promise<EmployeeProfile> {
    const now = this.store.clock.now();
    const created: EmployeeProfile = {
      id: this.store.nextId('employee'),
      employeeCode: employee.employeeCode,
      firstName: employee.firstName,
      lastName: employee.lastName,
      division: employee.division ?? null,
      department: employee.department ?? null,
      position: employee.position ?? null,
      role: employee.role ?? 'EMP',
      workStatus: 'ACTIVE',
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };
    this.store.employees.set(created.id, created);
    return created;
  }

  async update(employeeId: number, patch: EmployeePatch): Promise<EmployeeProfile | null> {
    const current = this.store.employees.get(employeeId);
    if (!current) return null;
    const updated: EmployeeProfile = {
      ...current,
      employeeCode: pick(patch.employeeCode, current.employeeCode),
      firstName: pick(patch.firstName, current.firstName),
      lastName: pick(patch.lastName, current.lastName),
      division: pick(patch.division, current.division),
      department: pick(patch.department, current.department),
      position: pick(patch.position, current.position),
      role: pick(patch.role, current.role),
      workStatus: pick(patch.workStatus, current.workStatus),
      isActive: pick(patch.isActive, current.isActive),
      updatedAt: this.store.clock.now(),
    };
    this.store.employees.set(employeeId, updated);
    return updated;
  }
}

// ─── Activity log ─────────────────────────────────────────────────────────────

export class MemoryActivityLog implements ActivityLogPort {
  constructor(private readonly store: MemoryStore) {}

  async append(entry: ActivityLogInput): Promise<ActivityLogEntry> {
    const created: ActivityLogEntry = {
      id: this.store.nextId('activity'),
      actorId: entry.actorId ?? null,
      action: entry.action,
      entityType: entry.entityType,
      entityId: entry.entityId ?? null,
      payload: entry.payload ?? {},
      ts: this.store.clock.now(),
    };
    this.store.activity.push(created);
    return created;
  }

  async list(filters: ActivityLogFilters = {}): Promise<ActivityLogEntry[]> {
    const offset = filters.offset ?? 0;
    return this.store.activity
      .filter((e) => !filters.entityType || e.entityType === filters.entityType)
      .filter((e) => filters.entityId === undefined || e.entityId === filters.entityId)
      .filter((e) => filters.actorId === undefined || e.actorId === filters.actorId)
      .sort((a, b) => b.ts.getTime() - a.ts.getTime() || b.id - a.id)
      .slice(offset, offset + (filters.limit ?? 50));
  }
}

export interface MemoryRepositories {
  vehicles: MemoryVehicleRepository;
  bookings: MemoryBookingRepository;
  refills: MemoryFuelRefillRepository;
  employees: MemoryEmployeeRepository;
  activityLog: MemoryActivityLog;
}

export function createMemoryRepositories(store: MemoryStore): MemoryRepositories {
  return {
    vehicles: new MemoryVehicleRepository(store),
    bookings: new MemoryBookingRepository(store),
    refills: new MemoryFuelRefillRepository(store),
    employees: new MemoryEmployeeRepository(store),
    activityLog: new MemoryActivityLog(store),
  };
}
