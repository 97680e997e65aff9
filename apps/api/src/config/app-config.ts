/**
 * API configuration
 * Read once from the environment (after `dotenv/config`) and validated with zod.
 * DATABASE_URL and PG_POOL_MAX are consumed by the pg pool itself; they are
 * checked here so a bad value stops startup instead of the first query.
 */

import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  CORS_ORIGIN: z.string().min(1).default('*'),
  AUDIT_GAP_THRESHOLD_KM: z.coerce.number().int().min(0).default(200),
  PG_POOL_MAX: z.coerce.number().int().min(1).default(10),
});

export interface AppConfig {
  port: number;
  corsOrigin: string;
  auditGapThresholdKm: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    auditGapThresholdKm: parsed.AUDIT_GAP_THRESHOLD_KM,
  };
}
