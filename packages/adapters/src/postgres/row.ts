import type { Row } from './pool.js';

// Column readers for row mappers. `pg` hands back NUMERIC and BIGINT as
// strings, DATE as a string (see pool.ts) and TIMESTAMPTZ as a Date.

export class RowShapeError extends Error {
  constructor(column: string, expected: string, value: unknown) {
    super(`column ${column}: expected ${expected}, got ${value === null ? 'null' : typeof value}`);
    this.name = 'RowShapeError';
  }
}

export function str(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') throw new RowShapeError(column, 'text', value);
  return value;
}

export function strOrNull(row: Row, column: string): string | null {
  return row[column] === null || row[column] === undefined ? null : str(row, column);
}

export function num(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  throw new RowShapeError(column, 'number', value);
}

export function numOrNull(row: Row, column: string): number | null {
  return row[column] === null || row[column] === undefined ? null : num(row, column);
}

export function bool(row: Row, column: string): boolean {
  const value = row[column];
  if (typeof value !== 'boolean') throw new RowShapeError(column, 'boolean', value);
  return value;
}

export function timestamp(row: Row, column: string): Date {
  const value = row[column];
  if (value instanceof Date) return value;
  if (typeof value === 'string') return new Date(value);
  throw new RowShapeError(column, 'timestamp', value);
}

/** Text column constrained to a known set of values. */
export function oneOf<T extends string>(row: Row, column: string, allowed: readonly T[]): T {
  const value = str(row, column);
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) throw new RowShapeError(column, allowed.join('|'), value);
  return match;
}

export function numArray(row: Row, column: string): number[] {
  const value = row[column];
  if (value === null || value === undefined) return [];
  if (!Array.isArray(value)) throw new RowShapeError(column, 'array', value);
  return value.map((entry: unknown) => {
    if (typeof entry === 'number') return entry;
    if (typeof entry === 'string' && /^-?\d+$/.test(entry)) return Number(entry);
    throw new RowShapeError(column, 'number[]', entry);
  });
}

export function jsonObject(row: Row, column: string): Record<string, unknown> {
  const value: unknown = row[column];
  if (value === null || value === undefined) return {};
  if (typeof value !== 'object' || Array.isArray(value)) throw new RowShapeError(column, 'json object', value);
  return Object.fromEntries(Object.entries(value));
}

/** `column = $n` for every defined value, numbered from 1. */
export function assignments(fields: ReadonlyArray<readonly [string, unknown]>): { sets: string[]; params: unknown[] } {
  const sets: string[] = [];
  const params: unknown[] = [];
  for (const [column, value] of fields) {
    if (value === undefined) continue;
    params.push(value);
    sets.push(`${column} = $${params.length}`);
  }
  return { sets, params };
}
