import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ApiDeps } from '../container.js';
import { getActor, requireAdminRole } from '../middleware/request-context.js';
import { writeActivityLog } from '../services/activity-log.service.js';
import { idSchema, monthQuerySchema, odometerSchema } from './schemas.js';

const bookingParamsSchema = z.object({ bookingId: idSchema });

const monthBookingsQuerySchema = monthQuerySchema.extend({
  kind: z.enum(['all', 'book', 'return']).default('all'),
});

const bookingEditSchema = z.object({
  vehicleId: idSchema.optional(),
  requesterId: idSchema.optional(),
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  destination: z.string().optional(),
  returnedById: idSchema.nullable().optional(),
  coTravelerIds: z.array(idSchema).max(50).optional(),
  odometerBefore: odometerSchema.nullable().optional(),
  odometerAfter: odometerSchema.nullable().optional(),
});

const activityLogsQuerySchema = z.object({
  entityType: z.enum(['booking', 'vehicle', 'fuel_refill', 'employee']).optional(),
  entityId: idSchema.optional(),
  actorId: idSchema.optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export function adminRouter({ repos, services }: ApiDeps): Router {
  const router = Router();
  router.use(requireAdminRole);

  /** GET /api/admin/dashboard - counts and today's active bookings */
  router.get('/dashboard', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await services.reports.dashboard());
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/admin/bookings?year&month&vehicleId&kind - bookings ending in the month */
  router.get('/bookings', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = monthBookingsQuerySchema.parse(req.query);
      const result = await services.reports.monthBookings(query.year, query.month, {
        vehicleId: query.vehicleId,
        kind: query.kind,
      });
      res.json({ data: result.bookings, counts: result.counts });
    } catch (err) {
      next(err);
    }
  });

  /** PATCH /api/admin/bookings/:bookingId - direct correction outside the lifecycle */
  router.patch('/bookings/:bookingId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { bookingId } = bookingParamsSchema.parse(req.params);
      const body = bookingEditSchema.parse(req.body);
      const booking = await services.bookings.adminUpdate(actor, bookingId, body);
      await writeActivityLog(repos.activityLog, {
        actorId: actor.id,
        action: 'booking.admin_update',
        entityType: 'booking',
        entityId: booking.id,
        payload: { fields: Object.keys(body) },
      });
      res.json(booking);
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/admin/activity-logs */
  router.get('/activity-logs', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = activityLogsQuerySchema.parse(req.query);
      const entries = await repos.activityLog.list(query);
      res.json({ data: entries, limit: query.limit, offset: query.offset });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
