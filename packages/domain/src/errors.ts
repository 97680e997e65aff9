import type { BookingStatus } from './entities/booking.js';

/**
 * Every rejection the domain raises. All of them are recoverable: nothing is
 * written before one is thrown, and the caller is expected to re-prompt.
 * `status` is the HTTP status the API answers with.
 */
export abstract class DomainError extends Error {
  abstract readonly status: number;

  constructor(
    readonly code: string,
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or missing input: bad dates, non-numeric odometer, blank fields. */
export class ValidationError extends DomainError {
  readonly status = 400;

  constructor(message: string, readonly field?: string) {
    super('invalid_input', message, field ? { field } : {});
  }
}

/** The booking is not in a state that allows the requested action. */
export class InvalidTransitionError extends DomainError {
  readonly status = 409;

  constructor(bookingId: number, from: BookingStatus, action: string) {
    super('invalid_transition', `booking ${bookingId} cannot ${action.replace(/_/g, ' ')} while ${from}`, {
      bookingId,
      from,
      action,
    });
  }
}

/**
 * A business rule refused the change: overlapping dates, an odometer going
 * backwards, confirming a return without any refill.
 */
export class BusinessRuleError extends DomainError {
  constructor(
    code: string,
    message: string,
    details: Record<string, unknown> = {},
    readonly status: number = 409,
  ) {
    super(code, message, details);
  }
}

export class NotFoundError extends DomainError {
  readonly status = 404;

  constructor(entity: string, id: number | string) {
    super('not_found', `${entity} not found`, { entity, id });
  }
}

export class ForbiddenError extends DomainError {
  readonly status = 403;

  constructor(message = 'forbidden') {
    super('forbidden', message);
  }
}

export class UnauthorizedError extends DomainError {
  readonly status = 401;

  constructor(message = 'unknown or inactive user') {
    super('unauthorized', message);
  }
}

export function bookingConflict(vehicleId: number, startDate: string, endDate: string): BusinessRuleError {
  return new BusinessRuleError(
    'booking_conflict',
    'vehicle is already booked for part of this date range',
    { vehicleId, startDate, endDate },
  );
}
