import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ApiDeps } from '../container.js';
import { getActor, requireAdminRole } from '../middleware/request-context.js';
import { writeActivityLog } from '../services/activity-log.service.js';
import { idSchema, odometerSchema } from './schemas.js';

const paramsSchema = z.object({ vehicleId: idSchema });

const availableQuerySchema = z.object({
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  date: z.string().optional(),
});

const vehicleBodySchema = z.object({
  platePrefix: z.string(),
  plateNumber: z.string(),
  province: z.string(),
  brandName: z.string(),
  modelName: z.string(),
  currentOdometerKm: odometerSchema.optional(),
  colorCode: z.string().optional(),
  status: z.enum(['READY', 'MAINTENANCE', 'OUT_OF_SERVICE', 'RETIRED']).optional(),
  seatCount: z.number().int().optional(),
  gearType: z.enum(['AUTO', 'MANUAL']).optional(),
  usageType: z.enum(['POOL', 'OFFICE', 'INSPECT', 'OTHER']).optional(),
});

export function vehiclesRouter({ repos, services }: ApiDeps): Router {
  const router = Router();

  /** GET /api/vehicles - non-retired first, then by plate */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const vehicles = await services.vehicles.list();
      res.json({ data: vehicles, total: vehicles.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/vehicles/available?startDate&endDate (or ?date, default today) */
  router.get('/available', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = availableQuerySchema.parse(req.query);
      const vehicles =
        query.startDate !== undefined || query.endDate !== undefined
          ? await services.availability.listAvailableVehicles(query.startDate, query.endDate)
          : await services.availability.listAvailableVehiclesOn(query.date);
      res.json({ data: vehicles, total: vehicles.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/vehicles/:vehicleId */
  router.get('/:vehicleId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { vehicleId } = paramsSchema.parse(req.params);
      res.json(await services.vehicles.get(vehicleId));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/vehicles */
  router.post('/', requireAdminRole, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const body = vehicleBodySchema.parse(req.body);
      const vehicle = await services.vehicles.create(actor, body);
      await writeActivityLog(repos.activityLog, {
        actorId: actor.id,
        action: 'vehicle.create',
        entityType: 'vehicle',
        entityId: vehicle.id,
        payload: { plate: `${vehicle.platePrefix} ${vehicle.plateNumber}` },
      });
      res.status(201).json(vehicle);
    } catch (err) {
      next(err);
    }
  });

  /** PATCH /api/vehicles/:vehicleId */
  router.patch('/:vehicleId', requireAdminRole, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { vehicleId } = paramsSchema.parse(req.params);
      const body = vehicleBodySchema.partial().parse(req.body);
      const vehicle = await services.vehicles.update(actor, vehicleId, body);
      await writeActivityLog(repos.activityLog, {
        actorId: actor.id,
        action: 'vehicle.update',
        entityType: 'vehicle',
        entityId: vehicle.id,
        payload: { fields: Object.keys(body) },
      });
      res.json(vehicle);
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/vehicles/:vehicleId - retires the vehicle */
  router.delete('/:vehicleId', requireAdminRole, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { vehicleId } = paramsSchema.parse(req.params);
      const vehicle = await services.vehicles.retire(actor, vehicleId);
      await writeActivityLog(repos.activityLog, {
        actorId: actor.id,
        action: 'vehicle.retire',
        entityType: 'vehicle',
        entityId: vehicle.id,
      });
      res.json(vehicle);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
