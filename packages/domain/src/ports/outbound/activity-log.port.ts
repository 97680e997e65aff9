import type { ActivityEntityType, ActivityLogEntry, ActivityLogInput } from '../../entities/activity-log.js';

export interface ActivityLogFilters {
  entityType?: ActivityEntityType;
  entityId?: number;
  actorId?: number;
  limit?: number;
  offset?: number;
}

export interface ActivityLogPort {
  append(entry: ActivityLogInput): Promise<ActivityLogEntry>;
  /** Newest first. */
  list(filters?: ActivityLogFilters): Promise<ActivityLogEntry[]>;
}
