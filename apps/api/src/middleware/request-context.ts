import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ForbiddenError, UnauthorizedError, isAdmin } from '@carpool/domain';
import type { EmployeeProfile, EmployeeRepositoryPort } from '@carpool/domain';

declare global {
  namespace Express {
    interface Request {
      actor?: EmployeeProfile;
    }
  }
}

const USER_ID_PATTERN = /^[1-9]\d*$/;

/**
 * Resolves the `x-user-id` header to an enabled employee. Sign-in happens
 * upstream; a missing, unknown or disabled id is answered with 401.
 */
export function requireActor(employees: EmployeeRepositoryPort): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      const header = req.header('x-user-id')?.trim();
      if (!header || !USER_ID_PATTERN.test(header)) throw new UnauthorizedError('x-user-id header is required');

      const employee = await employees.findById(Number(header));
      if (!employee || !employee.isActive) throw new UnauthorizedError();

      req.actor = employee;
      next();
    } catch (err) {
      next(err);
    }
  };
}

export function requireAdminRole(req: Request, _res: Response, next: NextFunction): void {
  if (!req.actor) {
    next(new UnauthorizedError());
    return;
  }
  if (!isAdmin(req.actor)) {
    next(new ForbiddenError('admin role required'));
    return;
  }
  next();
}

export function getActor(req: Request): EmployeeProfile {
  if (!req.actor) throw new UnauthorizedError();
  return req.actor;
}
