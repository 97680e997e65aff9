// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, withTransaction, pgDatabase } from './postgres/pool.js';
export type { Database, Queryable, Row, DbPool, DbClient } from './postgres/pool.js';
export { RowShapeError } from './postgres/row.js';
export { PgVehicleRepository, mapVehicleRow } from './postgres/vehicle.repository.js';
export { PgBookingRepository, mapBookingRow } from './postgres/booking.repository.js';
export { PgFuelRefillRepository, mapFuelRefillRow } from './postgres/fuel-refill.repository.js';
export { PgEmployeeRepository, mapEmployeeRow } from './postgres/employee.repository.js';
export { PgActivityLogRepository, mapActivityLogRow } from './postgres/activity-log.repository.js';

// ─── In-memory Adapters ───────────────────────────────────────────────────────
export { MemoryStore } from './memory/store.js';
export {
  MemoryActivityLog,
  MemoryBookingRepository,
  MemoryEmployeeRepository,
  MemoryFuelRefillRepository,
  MemoryVehicleRepository,
  createMemoryRepositories,
} from './memory/repositories.js';
export type { MemoryRepositories } from './memory/repositories.js';
export { createVoucherSequence, generateSampleData } from './memory/sample-data.js';
export type { SampleData, SampleDataOptions } from './memory/sample-data.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { DeterministicClock, SeededRng, systemClock } from './clock/deterministic-clock.js';
