import { parseArgs } from 'node:util';
import { z } from 'zod';
import { displayPlate } from '@carpool/domain';
import type { FleetAuditEntry } from '@carpool/domain';

export const USAGE = 'usage: audit-month <year> <month> [--gap <km>] [--vehicle <id>]';

export interface AuditArgs {
  year: number;
  month: number;
  gapThresholdKm?: number;
  vehicleId?: number;
}

const argsSchema = z.object({
  year: z.coerce.number().int().min(1900).max(9999),
  month: z.coerce.number().int().min(1).max(12),
  gap: z.coerce.number().int().min(0).optional(),
  vehicle: z.coerce.number().int().positive().optional(),
});

export function parseAuditArgs(argv: readonly string[]): AuditArgs {
  const { values, positionals } = parseArgs({
    args: [...argv],
    options: {
      gap: { type: 'string' },
      vehicle: { type: 'string' },
    },
    allowPositionals: true,
  });
  if (positionals.length !== 2) throw new Error(USAGE);

  const parsed = argsSchema.parse({
    year: positionals[0],
    month: positionals[1],
    gap: values.gap,
    vehicle: values.vehicle,
  });
  return { year: parsed.year, month: parsed.month, gapThresholdKm: parsed.gap, vehicleId: parsed.vehicle };
}

/** Plain-text report, one block per vehicle with findings. */
export function formatAuditReport(
  entries: readonly FleetAuditEntry[],
  header: { year: number; month: number; gapThresholdKm: number },
): string {
  const lines = [
    `Monthly audit ${header.year}-${String(header.month).padStart(2, '0')} (gap threshold ${header.gapThresholdKm} km)`,
  ];
  const withIssues = entries.filter((e) => e.issues.length > 0);
  if (withIssues.length === 0) {
    lines.push('No issues found.');
    return lines.join('\n');
  }

  for (const { vehicle, issues } of withIssues) {
    lines.push('', `${displayPlate(vehicle)} (#${vehicle.id}): ${issues.length} issue(s)`);
    for (const issue of issues) {
      lines.push(`  [${issue.type}] ${issue.dateRange}  ${issue.message}`);
    }
  }
  const total = withIssues.reduce((acc, e) => acc + e.issues.length, 0);
  lines.push('', `${total} issue(s) across ${withIssues.length} vehicle(s)`);
  return lines.join('\n');
}
