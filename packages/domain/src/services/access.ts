import { isBookingMember } from '../entities/booking.js';
import type { Booking } from '../entities/booking.js';
import { isAdmin } from '../entities/employee.js';
import type { EmployeeProfile } from '../entities/employee.js';
import { ForbiddenError, UnauthorizedError, ValidationError } from '../errors.js';

export function requireActive(actor: EmployeeProfile): void {
  if (!actor.isActive) throw new UnauthorizedError();
}

export function requireAdmin(actor: EmployeeProfile): void {
  requireActive(actor);
  if (!isAdmin(actor)) throw new ForbiddenError('admin role required');
}

/** Lifecycle actions are open to the requester and the co-travelers only. */
export function requireMember(actor: EmployeeProfile, booking: Booking): void {
  requireActive(actor);
  if (!isBookingMember(booking, actor.id)) {
    throw new ForbiddenError('only the requester or a co-traveler may do this');
  }
}

export function requireMemberOrAdmin(actor: EmployeeProfile, booking: Booking): void {
  if (isAdmin(actor)) return;
  requireMember(actor, booking);
}

/** Trimmed, non-blank text. */
export function requireText(raw: string | null | undefined, field: string): string {
  const value = (raw ?? '').trim();
  if (!value) throw new ValidationError(`${field} is required`, field);
  return value;
}

export function optionalText(raw: string | null | undefined): string | null {
  const value = (raw ?? '').trim();
  return value || null;
}
