export type ActivityEntityType = 'booking' | 'vehicle' | 'fuel_refill' | 'employee';

export const ACTIVITY_ENTITY_TYPES: readonly ActivityEntityType[] = ['booking', 'vehicle', 'fuel_refill', 'employee'];

export interface ActivityLogEntry {
  readonly id: number;
  readonly actorId: number | null;
  readonly action: string;        // e.g. "booking.start_use"
  readonly entityType: ActivityEntityType;
  readonly entityId: number | null;
  readonly payload: Record<string, unknown>;
  readonly ts: Date;
}

export interface ActivityLogInput {
  actorId?: number | null;
  action: string;
  entityType: ActivityEntityType;
  entityId?: number | null;
  payload?: Record<string, unknown>;
}
