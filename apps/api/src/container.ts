import {
  PgActivityLogRepository,
  PgBookingRepository,
  PgEmployeeRepository,
  PgFuelRefillRepository,
  PgVehicleRepository,
  systemClock,
} from '@carpool/adapters';
import {
  AvailabilityService,
  BookingService,
  EmployeeService,
  FuelRefillService,
  MonthlyAuditService,
  ReportService,
  VehicleService,
} from '@carpool/domain';
import type {
  ActivityLogPort,
  BookingRepositoryPort,
  ClockPort,
  EmployeeRepositoryPort,
  FuelRefillRepositoryPort,
  VehicleRepositoryPort,
} from '@carpool/domain';

// ─── Wiring ───────────────────────────────────────────────────────────────────

export interface ApiRepositories {
  vehicles: VehicleRepositoryPort;
  bookings: BookingRepositoryPort;
  refills: FuelRefillRepositoryPort;
  employees: EmployeeRepositoryPort;
  activityLog: ActivityLogPort;
  clock: ClockPort;
}

export interface ApiServices {
  availability: AvailabilityService;
  bookings: BookingService;
  refills: FuelRefillService;
  vehicles: VehicleService;
  employees: EmployeeService;
  audit: MonthlyAuditService;
  reports: ReportService;
}

/** Everything a router needs: the services plus the raw ports for identity and logging. */
export interface ApiDeps {
  repos: ApiRepositories;
  services: ApiServices;
}

export function createServices(repos: ApiRepositories, opts: { gapThresholdKm?: number } = {}): ApiServices {
  return {
    availability: new AvailabilityService(repos),
    bookings: new BookingService(repos),
    refills: new FuelRefillService(repos),
    vehicles: new VehicleService(repos.vehicles),
    employees: new EmployeeService(repos.employees),
    audit: new MonthlyAuditService({ ...repos, defaultGapThresholdKm: opts.gapThresholdKm }),
    reports: new ReportService(repos),
  };
}

/** Repositories on the shared pg pool. */
export function createPgRepositories(): ApiRepositories {
  return {
    vehicles: new PgVehicleRepository(),
    bookings: new PgBookingRepository(),
    refills: new PgFuelRefillRepository(),
    employees: new PgEmployeeRepository(),
    activityLog: new PgActivityLogRepository(),
    clock: systemClock,
  };
}
