export type AuditIssueType =
  | 'missing_before'
  | 'missing_after'
  | 'reversed_odometer'
  | 'gap_negative'
  | 'gap_between_trips'
  | 'fuel_odometer_outside_trip'
  | 'fuel_without_booking';

export interface AuditIssue {
  readonly type: AuditIssueType;
  readonly vehicleId: number;
  readonly bookingId: number | null;
  readonly refillId: number | null;
  /** `start..end` for a trip, `end -> start` between trips, the day of a refill. */
  readonly dateRange: string;
  readonly message: string;
  /** Numbers behind the finding, e.g. `{ gapKm: 250, thresholdKm: 200 }`. */
  readonly details?: Readonly<Record<string, number>>;
}

export const DEFAULT_GAP_THRESHOLD_KM = 200;
