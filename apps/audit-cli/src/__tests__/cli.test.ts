/**
 * audit-month argument parsing and report formatting
 */

import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';

import type { AuditIssue, Vehicle } from '@carpool/domain';
import { USAGE, formatAuditReport, parseAuditArgs } from '../cli.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const T0 = new Date(2025, 11, 1, 8, 0, 0);

function vehicle(id: number, platePrefix: string, plateNumber: string): Vehicle {
  return {
    id,
    platePrefix,
    plateNumber,
    province: 'Khon Kaen',
    currentOdometerKm: 20_000,
    brandName: 'Toyota',
    modelName: 'Hilux Revo',
    colorCode: '#377dff',
    status: 'READY',
    seatCount: 5,
    gearType: 'AUTO',
    usageType: 'POOL',
    createdAt: T0,
    updatedAt: T0,
  };
}

const gap: AuditIssue = {
  type: 'gap_between_trips',
  vehicleId: 1,
  bookingId: 2,
  refillId: null,
  dateRange: '2025-12-02 -> 2025-12-05',
  message: 'Unexplained distance of 250 km between booking #1 and booking #2 (threshold 200 km)',
};

const orphan: AuditIssue = {
  type: 'fuel_without_booking',
  vehicleId: 3,
  bookingId: null,
  refillId: 7,
  dateRange: '2025-12-20',
  message: 'Refill on 2025-12-20 is not linked to any booking (voucher 380601)',
};

// ─── parseAuditArgs ───────────────────────────────────────────────────────────

describe('parseAuditArgs', () => {
  it('reads year and month', () => {
    expect(parseAuditArgs(['2025', '12'])).toEqual({
      year: 2025,
      month: 12,
      gapThresholdKm: undefined,
      vehicleId: undefined,
    });
  });

  it('reads the optional flags', () => {
    expect(parseAuditArgs(['2025', '3', '--gap', '150', '--vehicle', '4'])).toEqual({
      year: 2025,
      month: 3,
      gapThresholdKm: 150,
      vehicleId: 4,
    });
  });

  it('prints usage when year or month is missing', () => {
    expect(() => parseAuditArgs(['2025'])).toThrow(USAGE);
    expect(() => parseAuditArgs(['2025', '12', '1'])).toThrow(USAGE);
  });

  it('rejects an out-of-range month', () => {
    expect(() => parseAuditArgs(['2025', '13'])).toThrow(ZodError);
  });

  it('rejects a non-numeric gap', () => {
    expect(() => parseAuditArgs(['2025', '12', '--gap', 'far'])).toThrow(ZodError);
  });
});

// ─── formatAuditReport ────────────────────────────────────────────────────────

describe('formatAuditReport', () => {
  const header = { year: 2025, month: 12, gapThresholdKm: 200 };

  it('says so when nothing was found', () => {
    expect(formatAuditReport([{ vehicle: vehicle(1, 'KV', '6800'), issues: [] }], { ...header, month: 3 })).toBe(
      'Monthly audit 2025-03 (gap threshold 200 km)\nNo issues found.',
    );
  });

  it('groups findings per vehicle with a total', () => {
    const report = formatAuditReport(
      [
        { vehicle: vehicle(1, 'KV', '6800'), issues: [gap] },
        { vehicle: vehicle(2, 'KV', '6809'), issues: [] },
        { vehicle: vehicle(3, 'NK', '3806'), issues: [orphan] },
      ],
      header,
    );

    expect(report.split('\n')).toEqual([
      'Monthly audit 2025-12 (gap threshold 200 km)',
      '',
      'KV 6800 Khon Kaen (#1): 1 issue(s)',
      '  [gap_between_trips] 2025-12-02 -> 2025-12-05  Unexplained distance of 250 km between booking #1 and booking #2 (threshold 200 km)',
      '',
      'NK 3806 Khon Kaen (#3): 1 issue(s)',
      '  [fuel_without_booking] 2025-12-20  Refill on 2025-12-20 is not linked to any booking (voucher 380601)',
      '',
      '2 issue(s) across 2 vehicle(s)',
    ]);
  });
});
