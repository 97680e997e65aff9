import 'dotenv/config';
import { z } from 'zod';
import {
  PgBookingRepository,
  PgFuelRefillRepository,
  PgVehicleRepository,
  closePool,
} from '@carpool/adapters';
import { DEFAULT_GAP_THRESHOLD_KM, MonthlyAuditService, requireMonth } from '@carpool/domain';
import type { FleetAuditEntry } from '@carpool/domain';
import { formatAuditReport, parseAuditArgs } from './cli.js';

/**
 * Monthly odometer audit from the command line.
 *
 * Env vars:
 *   DATABASE_URL            PostgreSQL connection string (required)
 *   AUDIT_GAP_THRESHOLD_KM  default gap threshold when --gap is not given (default: 200)
 */

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  AUDIT_GAP_THRESHOLD_KM: z.coerce.number().int().min(0).default(DEFAULT_GAP_THRESHOLD_KM),
});

async function main(): Promise<void> {
  const env = envSchema.parse(process.env);
  const args = parseAuditArgs(process.argv.slice(2));
  const gapThresholdKm = args.gapThresholdKm ?? env.AUDIT_GAP_THRESHOLD_KM;

  const vehicles = new PgVehicleRepository();
  const audit = new MonthlyAuditService({
    vehicles,
    bookings: new PgBookingRepository(),
    refills: new PgFuelRefillRepository(),
    defaultGapThresholdKm: env.AUDIT_GAP_THRESHOLD_KM,
  });

  let entries: FleetAuditEntry[];
  if (args.vehicleId !== undefined) {
    const range = requireMonth(args.year, args.month);
    const vehicle = await vehicles.findById(args.vehicleId);
    if (!vehicle) throw new Error(`vehicle ${args.vehicleId} not found`);
    const issues = await audit.auditVehicleMonth(vehicle.id, range.startDate, range.endDate, gapThresholdKm);
    entries = [{ vehicle, issues }];
  } else {
    entries = await audit.auditFleetMonth(args.year, args.month, gapThresholdKm);
  }

  console.log(formatAuditReport(entries, { year: args.year, month: args.month, gapThresholdKm }));
}

main()
  .catch((err) => {
    console.error('[audit-cli] audit failed', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(() => {
    closePool().catch((err) => {
      console.error('[audit-cli] error while closing the pool', err);
    });
  });
