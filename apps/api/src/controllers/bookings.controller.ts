import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { requireDateRange } from '@carpool/domain';
import type { Booking, EmployeeProfile } from '@carpool/domain';
import type { ApiDeps } from '../container.js';
import { getActor } from '../middleware/request-context.js';
import { writeActivityLog } from '../services/activity-log.service.js';
import { idSchema, odometerSchema } from './schemas.js';

const paramsSchema = z.object({ bookingId: idSchema });

const mineQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

const calendarQuerySchema = z.object({
  startDate: z.string().optional(),
  endDate: z.string().optional(),
});

const createBodySchema = z.object({
  vehicleId: idSchema,
  startDate: z.string(),
  endDate: z.string(),
  destination: z.string(),
  coTravelerIds: z.array(idSchema).max(50).default([]),
});

const startUseBodySchema = z.object({ odometerBefore: odometerSchema });

const returnBodySchema = z.object({
  odometerAfter: odometerSchema,
  hasFuel: z.boolean(),
});

export function bookingsRouter({ repos, services }: ApiDeps): Router {
  const router = Router();

  const logStep = (actor: EmployeeProfile, action: string, booking: Booking, payload: Record<string, unknown> = {}) =>
    writeActivityLog(repos.activityLog, {
      actorId: actor.id,
      action: `booking.${action}`,
      entityType: 'booking',
      entityId: booking.id,
      payload: { status: booking.status, ...payload },
    });

  /** GET /api/bookings/mine - bookings the caller requested or travels on */
  router.get('/mine', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = mineQuerySchema.parse(req.query);
      const bookings = await services.bookings.listMine(getActor(req), limit);
      res.json({ data: bookings, total: bookings.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/bookings/calendar?startDate&endDate - active bookings as all-day events */
  router.get('/calendar', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = calendarQuerySchema.parse(req.query);
      const window =
        query.startDate !== undefined || query.endDate !== undefined
          ? requireDateRange(query.startDate, query.endDate)
          : undefined;
      res.json({ data: await services.bookings.calendar(window) });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/bookings */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const body = createBodySchema.parse(req.body);
      const booking = await services.bookings.create(actor, body);
      await logStep(actor, 'create', booking, {
        vehicleId: booking.vehicleId,
        startDate: booking.startDate,
        endDate: booking.endDate,
      });
      res.status(201).json(booking);
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/bookings/:bookingId - booking with vehicle, people and refills */
  router.get('/:bookingId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { bookingId } = paramsSchema.parse(req.params);
      res.json(await services.bookings.getDetail(getActor(req), bookingId));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/bookings/:bookingId/start-use */
  router.post('/:bookingId/start-use', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { bookingId } = paramsSchema.parse(req.params);
      const body = startUseBodySchema.parse(req.body);
      const booking = await services.bookings.startUse(actor, bookingId, body.odometerBefore);
      await logStep(actor, 'start_use', booking, { odometerBefore: booking.odometerBefore });
      res.json(booking);
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/bookings/:bookingId/return */
  router.post('/:bookingId/return', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { bookingId } = paramsSchema.parse(req.params);
      const body = returnBodySchema.parse(req.body);
      const booking = await services.bookings.returnVehicle(actor, bookingId, body);
      await logStep(actor, 'return', booking, { odometerAfter: booking.odometerAfter, hasFuel: body.hasFuel });
      res.json(booking);
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/bookings/:bookingId/confirm-return */
  router.post('/:bookingId/confirm-return', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { bookingId } = paramsSchema.parse(req.params);
      const booking = await services.bookings.confirmReturn(actor, bookingId);
      await logStep(actor, 'confirm_return', booking);
      res.json(booking);
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/bookings/:bookingId/cancel */
  router.post('/:bookingId/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { bookingId } = paramsSchema.parse(req.params);
      const booking = await services.bookings.cancel(actor, bookingId);
      await logStep(actor, 'cancel', booking);
      res.json(booking);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
