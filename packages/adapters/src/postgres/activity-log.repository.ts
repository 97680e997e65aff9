import { ACTIVITY_ENTITY_TYPES } from '@carpool/domain';
import type {
  ActivityLogEntry,
  ActivityLogFilters,
  ActivityLogInput,
  ActivityLogPort,
} from '@carpool/domain';
import { pgDatabase } from './pool.js';
import type { Queryable, Row } from './pool.js';
import { jsonObject, num, numOrNull, oneOf, str, timestamp } from './row.js';

export class PgActivityLogRepository implements ActivityLogPort {
  constructor(private readonly db: Queryable = pgDatabase) {}

  async append(entry: ActivityLogInput): Promise<ActivityLogEntry> {
    const { rows } = await this.db.query(
      `INSERT INTO carpool.activity_logs
         (actor_id, action, entity_type, entity_id, payload)
       VALUES
         ($1, $2, $3, $4, $5::jsonb)
       RETURNING *`,
      [
        entry.actorId ?? null,
        entry.action,
        entry.entityType,
        entry.entityId ?? null,
        JSON.stringify(entry.payload ?? {}),
      ],
    );
    const row = rows[0];
    if (!row) throw new Error('activity log insert returned no row');
    return mapActivityLogRow(row);
  }

  async list(filters: ActivityLogFilters = {}): Promise<ActivityLogEntry[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.entityType) {
      conditions.push(`entity_type = $${idx++}`);
      params.push(filters.entityType);
    }
    if (filters.entityId !== undefined) {
      conditions.push(`entity_id = $${idx++}`);
      params.push(filters.entityId);
    }
    if (filters.actorId !== undefined) {
      conditions.push(`actor_id = $${idx++}`);
      params.push(filters.actorId);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const { rows } = await this.db.query(
      `SELECT * FROM carpool.activity_logs ${where}
       ORDER BY ts DESC, id DESC
       LIMIT $${idx++} OFFSET $${idx++}`,
      [...params, filters.limit ?? 50, filters.offset ?? 0],
    );
    return rows.map(mapActivityLogRow);
  }
}

export function mapActivityLogRow(row: Row): ActivityLogEntry {
  return {
    id: num(row, 'id'),
    actorId: numOrNull(row, 'actor_id'),
    action: str(row, 'action'),
    entityType: oneOf(row, 'entity_type', ACTIVITY_ENTITY_TYPES),
    entityId: numOrNull(row, 'entity_id'),
    payload: jsonObject(row, 'payload'),
    ts: timestamp(row, 'ts'),
  };
}
