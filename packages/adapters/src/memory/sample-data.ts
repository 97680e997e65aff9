import { addDays, monthRange, startOfDay } from '@carpool/domain';
import type { Booking, BookingStatus, EmployeeProfile, FuelRefill, Vehicle } from '@carpool/domain';
import { SeededRng } from '../clock/deterministic-clock.js';

// Fixture generator for demos and tests. Nothing here touches a store: the
// caller loads the result, e.g. `new MemoryStore(clock).load(data)`.

export interface SampleData {
  employees: EmployeeProfile[];
  vehicles: Vehicle[];
  bookings: Booking[];
  refills: FuelRefill[];
}

export interface SampleDataOptions {
  year: number;
  month: number;
  seed?: number;
}

/**
 * Issues voucher numbers per vehicle. Each vehicle counts up from its own
 * start (given, or derived from the plate number as `<plate>01`), zero-padded
 * to six digits.
 */
export function createVoucherSequence(
  vehicles: readonly Pick<Vehicle, 'id' | 'plateNumber'>[],
  startByVehicle: ReadonlyMap<number, number> = new Map(),
): (vehicleId: number) => string {
  const counters = new Map<number, number>();
  for (const v of vehicles) {
    const plate = Number.parseInt(v.plateNumber, 10);
    counters.set(v.id, startByVehicle.get(v.id) ?? (Number.isNaN(plate) ? 100001 : plate * 100 + 1));
  }
  return (vehicleId) => {
    const current = counters.get(vehicleId) ?? 100001;
    counters.set(vehicleId, current + 1);
    return String(current).padStart(6, '0');
  };
}

const EMPLOYEES: ReadonlyArray<readonly [code: string, first: string, last: string]> = [
  ['adm001', 'Office', 'Clerk'],
  ['emp001', 'Dana', 'Keller'],
  ['emp002', 'Somsri', 'Sample'],
  ['emp003', 'Pornthip', 'Sample'],
  ['emp004', 'Chayapol', 'Sample'],
  ['emp005', 'Jiraporn', 'Sample'],
  ['emp006', 'Kitti', 'Sample'],
];

const VEHICLES: ReadonlyArray<readonly [prefix: string, number: string, brand: string, model: string, color: string]> = [
  ['KV', '6800', 'Toyota', 'Hilux Revo', '#377dff'],
  ['KV', '6808', 'Toyota', 'Hilux Revo', '#00c9a7'],
  ['KV', '6809', 'Isuzu', 'D-Max', '#f5a623'],
  ['NK', '3806', 'Toyota', 'Commuter', '#de4437'],
  ['NK', '3814', 'Nissan', 'Navara', '#8c54ff'],
];

const DESTINATIONS = ['Regional office', 'Branch office 2', 'Field inspection', 'Substation visit', 'Document delivery'];
const FUEL_PLACES = ['PTT', 'Bangchak', 'Shell', 'Caltex'];
const PRICES_PER_LITER = [38.0, 39.5, 40.1];
const LITERS = [15, 20, 25, 28, 30, 35];
const TRIP_LENGTHS = [1, 1, 2, 2, 3];

function weighted(rng: SeededRng, choices: ReadonlyArray<readonly [value: number, weight: number]>): number {
  const total = choices.reduce((acc, [, w]) => acc + w, 0);
  let roll = rng.next() * total;
  for (const [value, weight] of choices) {
    roll -= weight;
    if (roll < 0) return value;
  }
  return choices[choices.length - 1]?.[0] ?? 0;
}

function pickStatus(rng: SeededRng): BookingStatus {
  const r = rng.next();
  if (r < 0.16) return 'BOOKED';
  if (r < 0.3) return 'IN_USE';
  if (r < 0.38) return 'PENDING_RETURN';
  return 'RETURNED';
}

function atHour(date: string, hour: number): Date {
  const ts = startOfDay(date);
  ts.setHours(hour);
  return ts;
}

/**
 * One month of plausible history: per vehicle, 7 to 11 non-overlapping trips
 * with a continuous odometer and 0 to 3 refills each. The same seed always
 * produces the same data.
 */
export function generateSampleData(opts: SampleDataOptions): SampleData {
  const rng = new SeededRng(opts.seed ?? 12);
  const month = monthRange(opts.year, opts.month);
  const created = atHour(addDays(month.startDate, -7), 9);

  const employees = EMPLOYEES.map(([employeeCode, firstName, lastName], idx): EmployeeProfile => ({
    id: idx + 1,
    employeeCode,
    firstName,
    lastName,
    division: 'Operations',
    department: 'Fleet',
    position: null,
    role: idx === 0 ? 'ADM' : 'EMP',
    workStatus: 'ACTIVE',
    isActive: true,
    createdAt: created,
    updatedAt: created,
  }));
  const admin = employees[0];
  const staff = employees.slice(1);
  if (!admin || staff.length === 0) throw new Error('sample roster needs an admin and staff');

  const vehicles = VEHICLES.map(([platePrefix, plateNumber, brandName, modelName, colorCode], idx): Vehicle => ({
    id: idx + 1,
    platePrefix,
    plateNumber,
    province: 'Khon Kaen',
    currentOdometerKm: rng.nextInt(20_000, 90_000),
    brandName,
    modelName,
    colorCode,
    status: 'READY',
    seatCount: modelName === 'Commuter' ? 12 : 5,
    gearType: 'AUTO',
    usageType: 'POOL',
    createdAt: created,
    updatedAt: created,
  }));

  const nextVoucher = createVoucherSequence(vehicles);
  const bookings: Booking[] = [];
  const refills: FuelRefill[] = [];

  for (const [vIdx, vehicle] of vehicles.entries()) {
    let odometer = vehicle.currentOdometerKm;
    let cursor = addDays(month.startDate, rng.nextInt(0, 3));
    const target = rng.nextInt(7, 11);

    for (let n = 0; n < target && cursor <= month.endDate; n++) {
      const startDate = cursor;
      const candidateEnd = addDays(startDate, rng.pick(TRIP_LENGTHS) - 1);
      const endDate = candidateEnd > month.endDate ? month.endDate : candidateEnd;
      const status = pickStatus(rng);
      const requester = rng.next() < 0.25 ? staff[0] ?? admin : rng.pick(staff);
      const companion = rng.pick(staff);

      let odometerBefore: number | null = null;
      let odometerAfter: number | null = null;
      if (status !== 'BOOKED') {
        odometerBefore = odometer + rng.nextInt(0, 30);
        odometerAfter = odometerBefore + rng.nextInt(40, 450);
        odometer = odometerAfter;
      }

      const booking: Booking = {
        id: bookings.length + 1,
        vehicleId: vehicle.id,
        requesterId: requester.id,
        startDate,
        endDate,
        destination: rng.pick(DESTINATIONS),
        status,
        odometerBefore,
        odometerAfter: status === 'RETURNED' || status === 'PENDING_RETURN' ? odometerAfter : null,
        returnedById: status === 'RETURNED' ? admin.id : status === 'PENDING_RETURN' ? requester.id : null,
        coTravelerIds: companion.id !== requester.id && rng.next() < 0.4 ? [companion.id] : [],
        createdAt: atHour(addDays(startDate, -1), 10 + vIdx),
        updatedAt: atHour(endDate, 17),
      };
      bookings.push(booking);

      if (odometerBefore !== null && odometerAfter !== null) {
        const count =
          status === 'IN_USE'
            ? weighted(rng, [[0, 55], [1, 35], [2, 10]])
            : weighted(rng, [[0, 20], [1, 45], [2, 25], [3, 10]]);
        const span = Math.round((startOfDay(endDate).getTime() - startOfDay(startDate).getTime()) / 86_400_000);
        for (let i = 0; i < count; i++) {
          const liters = rng.pick(LITERS);
          const pricePerLiter = rng.pick(PRICES_PER_LITER);
          refills.push({
            id: refills.length + 1,
            vehicleId: vehicle.id,
            bookingId: booking.id,
            refillDate: addDays(startDate, rng.nextInt(0, span)),
            fuelPlace: rng.pick(FUEL_PLACES),
            odometerKm: rng.nextInt(odometerBefore, odometerAfter),
            liters,
            totalPrice: Math.round(liters * pricePerLiter * 100) / 100,
            pricePerLiter,
            voucherNumber: nextVoucher(vehicle.id),
            createdAt: atHour(endDate, 16),
          });
        }
      }

      cursor = addDays(endDate, 1 + rng.pick([0, 1, 1, 2]));
    }

    vehicles[vIdx] = { ...vehicle, currentOdometerKm: odometer };
  }

  return { employees, vehicles, bookings, refills };
}
