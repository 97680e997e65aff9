import type { CalendarDate } from '../../calendar/calendar-date.js';
import type { AuditIssue } from '../../entities/audit-issue.js';
import type { Vehicle } from '../../entities/vehicle.js';

export interface FleetAuditEntry {
  vehicle: Vehicle;
  issues: AuditIssue[];
}

export interface MonthlyAuditPort {
  auditVehicleMonth(
    vehicleId: number,
    monthStart: CalendarDate,
    monthEnd: CalendarDate,
    gapThresholdKm?: number,
  ): Promise<AuditIssue[]>;

  /** Vehicles with at least one finding, ordered by plate. */
  auditFleetMonth(year: number, month: number, gapThresholdKm?: number): Promise<FleetAuditEntry[]>;
}
