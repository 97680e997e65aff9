// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './calendar/calendar-date.js';
export * from './entities/vehicle.js';
export * from './entities/booking.js';
export * from './entities/fuel-refill.js';
export * from './entities/employee.js';
export * from './entities/audit-issue.js';
export * from './entities/activity-log.js';
export * from './errors.js';

// ─── Core rules ───────────────────────────────────────────────────────────────
export * from './scheduling/overlap.js';
export * from './lifecycle/booking-lifecycle.js';
export * from './audit/monthly-audit.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/booking-lifecycle.port.js';
export * from './ports/inbound/monthly-audit.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/vehicle-repository.port.js';
export * from './ports/outbound/booking-repository.port.js';
export * from './ports/outbound/fuel-refill-repository.port.js';
export * from './ports/outbound/employee-repository.port.js';
export * from './ports/outbound/activity-log.port.js';
export * from './ports/outbound/clock.port.js';

// ─── Use cases ────────────────────────────────────────────────────────────────
export * from './services/access.js';
export * from './services/availability.service.js';
export * from './services/booking.service.js';
export * from './services/fuel-refill.service.js';
export * from './services/vehicle.service.js';
export * from './services/employee.service.js';
export * from './services/monthly-audit.service.js';
export * from './services/report.service.js';
