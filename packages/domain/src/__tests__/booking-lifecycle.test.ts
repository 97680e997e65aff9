/**
 * Booking lifecycle tests
 *
 * BOOKED → IN_USE → (RETURNED | PENDING_RETURN → RETURNED), BOOKED → CANCELLED.
 * Planners validate input and describe the write; they never touch storage.
 */

import { describe, it, expect } from '@jest/globals';

import {
  BusinessRuleError,
  InvalidTransitionError,
  ValidationError,
  advanceOdometer,
  allowedActions,
  isTerminalStatus,
  nextStatus,
  parseOdometerReading,
  planCancel,
  planConfirmReturn,
  planReturn,
  planStartUse,
} from '../index.js';
import { makeBooking } from './fixtures.js';

// ─── Transition table ─────────────────────────────────────────────────────────

describe('transition table', () => {
  it('lists the actions available from each status', () => {
    expect(allowedActions('BOOKED')).toEqual(['start_use', 'cancel']);
    expect(allowedActions('IN_USE')).toEqual(['return_without_fuel', 'return_with_fuel']);
    expect(allowedActions('PENDING_RETURN')).toEqual(['confirm_return']);
    expect(allowedActions('RETURNED')).toEqual([]);
    expect(allowedActions('CANCELLED')).toEqual([]);
  });

  it('marks returned and cancelled as terminal', () => {
    expect(isTerminalStatus('RETURNED')).toBe(true);
    expect(isTerminalStatus('CANCELLED')).toBe(true);
    expect(isTerminalStatus('PENDING_RETURN')).toBe(false);
  });

  it('rejects an action from the wrong status', () => {
    const booking = makeBooking({ id: 7, status: 'IN_USE' });
    expect(() => nextStatus(booking, 'start_use')).toThrow(InvalidTransitionError);
    expect(() => nextStatus(booking, 'start_use')).toThrow('booking 7 cannot start use while IN_USE');
  });
});

// ─── Odometer input ───────────────────────────────────────────────────────────

describe('parseOdometerReading', () => {
  it('accepts integers and digit strings', () => {
    expect(parseOdometerReading(20100, 'odometerBefore')).toBe(20100);
    expect(parseOdometerReading(' 20100 ', 'odometerBefore')).toBe(20100);
    expect(parseOdometerReading('+15', 'odometerBefore')).toBe(15);
    expect(parseOdometerReading(0, 'odometerBefore')).toBe(0);
  });

  it('rejects non-integers', () => {
    for (const raw of ['abc', '12.5', 12.5, '', null, undefined, '1e5']) {
      expect(() => parseOdometerReading(raw, 'odometerAfter')).toThrow('odometerAfter must be an integer');
    }
  });

  it('rejects negative readings', () => {
    expect(() => parseOdometerReading(-1, 'odometerKm')).toThrow('odometerKm must not be negative');
    expect(() => parseOdometerReading('-20', 'odometerKm')).toThrow(ValidationError);
  });

  it('never moves the resting odometer backwards', () => {
    expect(advanceOdometer(20_000, 19_500)).toBe(20_000);
    expect(advanceOdometer(20_000, 20_450)).toBe(20_450);
    expect(advanceOdometer(20_000, null)).toBe(20_000);
  });
});

// ─── Plans ────────────────────────────────────────────────────────────────────

describe('planStartUse', () => {
  it('moves BOOKED to IN_USE and raises the vehicle odometer', () => {
    const plan = planStartUse(makeBooking({ id: 3, vehicleId: 9 }), '20100');
    expect(plan).toEqual({
      bookingId: 3,
      action: 'start_use',
      from: 'BOOKED',
      changes: { status: 'IN_USE', odometerBefore: 20100 },
      vehicleUpdate: { vehicleId: 9, odometerAtLeastKm: 20100 },
    });
  });

  it('refuses a second start', () => {
    const booking = makeBooking({ status: 'IN_USE', odometerBefore: 20100 });
    expect(() => planStartUse(booking, 20100)).toThrow(InvalidTransitionError);
  });
});

describe('planReturn', () => {
  const inUse = makeBooking({ id: 4, status: 'IN_USE', odometerBefore: 20_000 });

  it('returns directly without fuel', () => {
    const plan = planReturn(inUse, 20_250, { hasFuel: false, returnedById: 2 });
    expect(plan.action).toBe('return_without_fuel');
    expect(plan.changes).toEqual({ status: 'RETURNED', odometerAfter: 20_250, returnedById: 2 });
    expect(plan.vehicleUpdate).toEqual({ vehicleId: 1, odometerAtLeastKm: 20_250 });
  });

  it('waits for a refill when fuel was bought', () => {
    const plan = planReturn(inUse, 20_250, { hasFuel: true, returnedById: 5 });
    expect(plan.action).toBe('return_with_fuel');
    expect(plan.changes.status).toBe('PENDING_RETURN');
    expect(plan.vehicleUpdate).toBeNull();
  });

  it('accepts a reading equal to the start', () => {
    expect(planReturn(inUse, 20_000, { hasFuel: false, returnedById: 2 }).changes.odometerAfter).toBe(20_000);
  });

  it('rejects a reading below the start with 422', () => {
    let caught: unknown;
    try {
      planReturn(inUse, 19_999, { hasFuel: false, returnedById: 2 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(BusinessRuleError);
    expect(caught).toMatchObject({ code: 'odometer_reversed', status: 422 });
  });

  it('refuses to return a booking that never started', () => {
    expect(() => planReturn(makeBooking(), 20_000, { hasFuel: false, returnedById: 2 })).toThrow(
      'booking 1 cannot return without fuel while BOOKED',
    );
  });
});

describe('planConfirmReturn', () => {
  const pending = makeBooking({ id: 5, status: 'PENDING_RETURN', odometerBefore: 20_000, odometerAfter: 20_300 });

  it('requires at least one attached refill', () => {
    expect(() => planConfirmReturn(pending, 0)).toThrow(BusinessRuleError);
    expect(() => planConfirmReturn(pending, 0)).toThrow(
      'at least one fuel refill must be recorded before the return can be confirmed',
    );
  });

  it('returns the vehicle to READY at the recorded reading', () => {
    const plan = planConfirmReturn(pending, 2);
    expect(plan.changes).toEqual({ status: 'RETURNED' });
    expect(plan.vehicleUpdate).toEqual({ vehicleId: 1, odometerAtLeastKm: 20_300, status: 'READY' });
  });

  it('checks the status before the refill count', () => {
    expect(() => planConfirmReturn(makeBooking({ status: 'RETURNED' }), 0)).toThrow(InvalidTransitionError);
  });
});

describe('planCancel', () => {
  it('cancels a booked trip without touching the vehicle', () => {
    const plan = planCancel(makeBooking({ id: 6 }));
    expect(plan).toMatchObject({ bookingId: 6, from: 'BOOKED', changes: { status: 'CANCELLED' }, vehicleUpdate: null });
  });

  it('cannot cancel once in use', () => {
    expect(() => planCancel(makeBooking({ status: 'IN_USE' }))).toThrow(InvalidTransitionError);
  });
});
