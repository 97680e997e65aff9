import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ApiDeps } from '../container.js';
import { getActor, requireAdminRole } from '../middleware/request-context.js';
import { writeActivityLog } from '../services/activity-log.service.js';
import { idSchema, odometerSchema } from './schemas.js';

const paramsSchema = z.object({ refillId: idSchema });

const recordBodySchema = z.object({
  vehicleId: idSchema.nullable().optional(),
  bookingId: idSchema.nullable().optional(),
  refillDate: z.string().optional(),
  fuelPlace: z.string(),
  voucherNumber: z.string(),
  odometerKm: odometerSchema,
  liters: z.number(),
  pricePerLiter: z.number(),
  totalPrice: z.number(),
});

const editBodySchema = z.object({
  refillDate: z.string().optional(),
  fuelPlace: z.string().optional(),
  voucherNumber: z.string().optional(),
  odometerKm: odometerSchema.optional(),
  liters: z.number().optional(),
  pricePerLiter: z.number().nullable().optional(),
  totalPrice: z.number().optional(),
});

export function fuelRefillsRouter({ repos, services }: ApiDeps): Router {
  const router = Router();

  /** POST /api/fuel-refills - on one of the caller's bookings, or standalone */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const body = recordBodySchema.parse(req.body);
      const refill = await services.refills.record(actor, body);
      await writeActivityLog(repos.activityLog, {
        actorId: actor.id,
        action: 'fuel_refill.create',
        entityType: 'fuel_refill',
        entityId: refill.id,
        payload: { bookingId: refill.bookingId, vehicleId: refill.vehicleId, voucherNumber: refill.voucherNumber },
      });
      res.status(201).json(refill);
    } catch (err) {
      next(err);
    }
  });

  /** PATCH /api/fuel-refills/:refillId */
  router.patch('/:refillId', requireAdminRole, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { refillId } = paramsSchema.parse(req.params);
      const body = editBodySchema.parse(req.body);
      const refill = await services.refills.adminUpdate(actor, refillId, body);
      await writeActivityLog(repos.activityLog, {
        actorId: actor.id,
        action: 'fuel_refill.update',
        entityType: 'fuel_refill',
        entityId: refill.id,
        payload: { fields: Object.keys(body) },
      });
      res.json(refill);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
