/**
 * Entity helper and error contract tests
 */

import { describe, it, expect } from '@jest/globals';

import {
  BusinessRuleError,
  ForbiddenError,
  InvalidTransitionError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  bookingConflict,
  compareByPlate,
  displayPlate,
  fullName,
  isActiveBookingStatus,
  isAdmin,
  isBookingMember,
} from '../index.js';
import { makeBooking, makeEmployee, makeVehicle } from './fixtures.js';

describe('vehicle helpers', () => {
  it('prints the plate with its province', () => {
    expect(displayPlate(makeVehicle())).toBe('KV 6800 Khon Kaen');
  });

  it('orders by prefix, number, then id', () => {
    const vehicles = [
      makeVehicle({ id: 3, platePrefix: 'NK', plateNumber: '3806' }),
      makeVehicle({ id: 2, platePrefix: 'KV', plateNumber: '6809' }),
      makeVehicle({ id: 5, platePrefix: 'KV', plateNumber: '6800' }),
      makeVehicle({ id: 4, platePrefix: 'KV', plateNumber: '6800' }),
    ];
    expect([...vehicles].sort(compareByPlate).map((v) => v.id)).toEqual([4, 5, 2, 3]);
  });
});

describe('employee helpers', () => {
  it('grants admin only to enabled ADM accounts', () => {
    expect(isAdmin(makeEmployee({ role: 'ADM' }))).toBe(true);
    expect(isAdmin(makeEmployee({ role: 'ADM', isActive: false }))).toBe(false);
    expect(isAdmin(makeEmployee())).toBe(false);
  });

  it('falls back to the code when the name is blank', () => {
    expect(fullName(makeEmployee())).toBe('Dana Keller');
    expect(fullName(makeEmployee({ firstName: '', lastName: '' }))).toBe('emp001');
  });
});

describe('booking helpers', () => {
  it('treats requester and co-travelers as members', () => {
    const booking = makeBooking({ requesterId: 2, coTravelerIds: [3] });
    expect(isBookingMember(booking, 2)).toBe(true);
    expect(isBookingMember(booking, 3)).toBe(true);
    expect(isBookingMember(booking, 4)).toBe(false);
  });

  it('holds the vehicle only while booked or in use', () => {
    expect(isActiveBookingStatus('BOOKED')).toBe(true);
    expect(isActiveBookingStatus('IN_USE')).toBe(true);
    expect(isActiveBookingStatus('PENDING_RETURN')).toBe(false);
  });
});

describe('errors', () => {
  it('carries a code and an HTTP status', () => {
    expect(new ValidationError('x is required', 'x')).toMatchObject({ code: 'invalid_input', status: 400, details: { field: 'x' } });
    expect(new InvalidTransitionError(1, 'RETURNED', 'cancel')).toMatchObject({ code: 'invalid_transition', status: 409 });
    expect(new NotFoundError('vehicle', 9)).toMatchObject({ code: 'not_found', status: 404, message: 'vehicle not found' });
    expect(new ForbiddenError().status).toBe(403);
    expect(new UnauthorizedError().status).toBe(401);
    expect(new BusinessRuleError('odometer_reversed', 'x', {}, 422).status).toBe(422);
  });

  it('describes a booking conflict', () => {
    const err = bookingConflict(1, '2025-12-10', '2025-12-12');
    expect(err).toBeInstanceOf(BusinessRuleError);
    expect(err).toMatchObject({
      code: 'booking_conflict',
      status: 409,
      details: { vehicleId: 1, startDate: '2025-12-10', endDate: '2025-12-12' },
    });
    expect(err.name).toBe('BusinessRuleError');
  });
});
