import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { requireMonth } from '@carpool/domain';
import type { FleetAuditEntry } from '@carpool/domain';
import type { ApiDeps } from '../container.js';
import { requireAdminRole } from '../middleware/request-context.js';
import { idSchema, monthQuerySchema } from './schemas.js';

const auditQuerySchema = monthQuerySchema.extend({
  gapThresholdKm: z.coerce.number().int().min(0).optional(),
});

const fuelQuerySchema = monthQuerySchema.extend({ vehicleId: idSchema });

export function reportsRouter({ services }: ApiDeps): Router {
  const router = Router();
  router.use(requireAdminRole);

  /**
   * GET /api/reports/audit?year&month&vehicleId&gapThresholdKm
   * Whole fleet: only vehicles with findings. One vehicle: always listed.
   */
  router.get('/audit', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = auditQuerySchema.parse(req.query);
      let data: FleetAuditEntry[];
      if (query.vehicleId !== undefined) {
        const range = requireMonth(query.year, query.month);
        const vehicle = await services.vehicles.get(query.vehicleId);
        const issues = await services.audit.auditVehicleMonth(
          vehicle.id,
          range.startDate,
          range.endDate,
          query.gapThresholdKm,
        );
        data = [{ vehicle, issues }];
      } else {
        data = await services.audit.auditFleetMonth(query.year, query.month, query.gapThresholdKm);
      }
      res.json({
        year: query.year,
        month: query.month,
        issueCount: data.reduce((acc, entry) => acc + entry.issues.length, 0),
        data,
      });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/usage?year&month&vehicleId - distance per returned trip */
  router.get('/usage', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = monthQuerySchema.parse(req.query);
      res.json(await services.reports.usageSummary(query.year, query.month, query.vehicleId));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/fuel?year&month&vehicleId - one vehicle's monthly fuel sheet */
  router.get('/fuel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = fuelQuerySchema.parse(req.query);
      res.json(await services.reports.fuelReport(query.year, query.month, query.vehicleId));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
