import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { EmployeeProfile } from '@carpool/domain';
import type { ApiDeps } from '../container.js';
import { getActor, requireAdminRole } from '../middleware/request-context.js';
import { writeActivityLog } from '../services/activity-log.service.js';
import { idSchema } from './schemas.js';

const paramsSchema = z.object({ employeeId: idSchema });

const employeeBodySchema = z.object({
  employeeCode: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  division: z.string().nullable().optional(),
  department: z.string().nullable().optional(),
  position: z.string().nullable().optional(),
  role: z.enum(['EMP', 'ADM']).optional(),
});

export function employeesRouter({ repos, services }: ApiDeps): Router {
  const router = Router();
  router.use(requireAdminRole);

  const logChange = (actor: EmployeeProfile, action: string, employee: EmployeeProfile, payload: Record<string, unknown> = {}) =>
    writeActivityLog(repos.activityLog, {
      actorId: actor.id,
      action: `employee.${action}`,
      entityType: 'employee',
      entityId: employee.id,
      payload: { employeeCode: employee.employeeCode, ...payload },
    });

  /** GET /api/employees */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const employees = await services.employees.list(getActor(req));
      res.json({ data: employees, total: employees.length });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/employees */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const body = employeeBodySchema.parse(req.body);
      const employee = await services.employees.create(actor, body);
      await logChange(actor, 'create', employee);
      res.status(201).json(employee);
    } catch (err) {
      next(err);
    }
  });

  /** PATCH /api/employees/:employeeId */
  router.patch('/:employeeId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { employeeId } = paramsSchema.parse(req.params);
      const body = employeeBodySchema.partial().parse(req.body);
      const employee = await services.employees.update(actor, employeeId, body);
      await logChange(actor, 'update', employee, { fields: Object.keys(body) });
      res.json(employee);
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/employees/:employeeId/toggle-status - flips ACTIVE / INACTIVE */
  router.post('/:employeeId/toggle-status', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { employeeId } = paramsSchema.parse(req.params);
      const employee = await services.employees.toggleStatus(actor, employeeId);
      await logChange(actor, 'toggle_status', employee, { workStatus: employee.workStatus });
      res.json(employee);
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/employees/:employeeId - disables the account */
  router.delete('/:employeeId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getActor(req);
      const { employeeId } = paramsSchema.parse(req.params);
      const employee = await services.employees.disable(actor, employeeId);
      await logChange(actor, 'disable', employee);
      res.json(employee);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
