import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import type { ApiDeps } from './container.js';
import { vehiclesRouter } from './controllers/vehicles.controller.js';
import { bookingsRouter } from './controllers/bookings.controller.js';
import { fuelRefillsRouter } from './controllers/fuel-refills.controller.js';
import { employeesRouter } from './controllers/employees.controller.js';
import { adminRouter } from './controllers/admin.controller.js';
import { reportsRouter } from './controllers/reports.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import { requireActor } from './middleware/request-context.js';

export interface BuildAppOptions {
  corsOrigin?: string;
  /** Access log; off in tests. */
  accessLog?: boolean;
}

export function buildApp(deps: ApiDeps, opts: BuildAppOptions = {}): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: opts.corsOrigin ?? '*' }));
  if (opts.accessLog ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: deps.repos.clock.now().toISOString() });
  });

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api', requireActor(deps.repos.employees));
  app.use('/api/vehicles', vehiclesRouter(deps));
  app.use('/api/bookings', bookingsRouter(deps));
  app.use('/api/fuel-refills', fuelRefillsRouter(deps));
  app.use('/api/employees', employeesRouter(deps));
  app.use('/api/admin', adminRouter(deps));
  app.use('/api/reports', reportsRouter(deps));

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
