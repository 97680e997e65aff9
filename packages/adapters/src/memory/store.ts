import type {
  ActivityLogEntry,
  Booking,
  ClockPort,
  EmployeeProfile,
  FuelRefill,
  Vehicle,
} from '@carpool/domain';
import { systemClock } from '../clock/deterministic-clock.js';

type Sequence = 'vehicle' | 'booking' | 'refill' | 'employee' | 'activity';

/**
 * Process-local tables behind the in-memory repositories. Ids are assigned
 * from per-table counters starting at 1, like SERIAL columns.
 */
export class MemoryStore {
  readonly vehicles = new Map<number, Vehicle>();
  readonly bookings = new Map<number, Booking>();
  readonly refills = new Map<number, FuelRefill>();
  readonly employees = new Map<number, EmployeeProfile>();
  readonly activity: ActivityLogEntry[] = [];

  private readonly sequences: Record<Sequence, number> = {
    vehicle: 0,
    booking: 0,
    refill: 0,
    employee: 0,
    activity: 0,
  };

  constructor(readonly clock: ClockPort = systemClock) {}

  nextId(sequence: Sequence): number {
    this.sequences[sequence] += 1;
    return this.sequences[sequence];
  }

  /** Loads rows as they are, keeping the counters ahead of the given ids. */
  load(rows: {
    vehicles?: readonly Vehicle[];
    bookings?: readonly Booking[];
    refills?: readonly FuelRefill[];
    employees?: readonly EmployeeProfile[];
  }): this {
    for (const v of rows.vehicles ?? []) this.put('vehicle', this.vehicles, v);
    for (const b of rows.bookings ?? []) this.put('booking', this.bookings, b);
    for (const r of rows.refills ?? []) this.put('refill', this.refills, r);
    for (const e of rows.employees ?? []) this.put('employee', this.employees, e);
    return this;
  }

  private put<T extends { id: number }>(sequence: Sequence, table: Map<number, T>, row: T): void {
    table.set(row.id, row);
    this.sequences[sequence] = Math.max(this.sequences[sequence], row.id);
  }
}
