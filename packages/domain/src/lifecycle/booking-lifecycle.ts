import type { Booking, BookingStatus } from '../entities/booking.js';
import type { VehicleStatus } from '../entities/vehicle.js';
import { BusinessRuleError, InvalidTransitionError, ValidationError } from '../errors.js';

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

export type BookingAction =
  | 'start_use'
  | 'return_without_fuel'
  | 'return_with_fuel'
  | 'confirm_return'
  | 'cancel';

export const BOOKING_ACTIONS: readonly BookingAction[] = [
  'start_use',
  'cancel',
  'return_without_fuel',
  'return_with_fuel',
  'confirm_return',
];

export const BOOKING_TRANSITIONS: Readonly<
  Record<BookingAction, { readonly from: BookingStatus; readonly to: BookingStatus }>
> = {
  start_use: { from: 'BOOKED', to: 'IN_USE' },
  cancel: { from: 'BOOKED', to: 'CANCELLED' },
  return_without_fuel: { from: 'IN_USE', to: 'RETURNED' },
  return_with_fuel: { from: 'IN_USE', to: 'PENDING_RETURN' },
  confirm_return: { from: 'PENDING_RETURN', to: 'RETURNED' },
};

const TERMINAL_STATUSES: readonly BookingStatus[] = ['RETURNED', 'CANCELLED'];

export function isTerminalStatus(status: BookingStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Actions available from `status`, in table order. */
export function allowedActions(status: BookingStatus): BookingAction[] {
  return BOOKING_ACTIONS.filter((action) => BOOKING_TRANSITIONS[action].from === status);
}

export function nextStatus(booking: Pick<Booking, 'id' | 'status'>, action: BookingAction): BookingStatus {
  const rule = BOOKING_TRANSITIONS[action];
  if (booking.status !== rule.from) {
    throw new InvalidTransitionError(booking.id, booking.status, action);
  }
  return rule.to;
}

// ---------------------------------------------------------------------------
// Transition plans
// ---------------------------------------------------------------------------

export interface BookingChanges {
  status: BookingStatus;
  odometerBefore?: number;
  odometerAfter?: number;
  returnedById?: number;
}

/**
 * Effect on the vehicle: the resting odometer becomes
 * max(current, `odometerAtLeastKm`), and the status is set when given.
 */
export interface VehicleUpdate {
  vehicleId: number;
  odometerAtLeastKm: number | null;
  status?: VehicleStatus;
}

/**
 * Everything one lifecycle step writes. Storage applies it as a
 * compare-and-set on `from`, so a booking that moved in the meantime is not
 * overwritten.
 */
export interface BookingTransition {
  readonly bookingId: number;
  readonly action: BookingAction;
  readonly from: BookingStatus;
  readonly changes: BookingChanges;
  readonly vehicleUpdate: VehicleUpdate | null;
}

/**
 * Odometer input must be a whole, non-negative number of kilometres: either
 * a JSON integer or a string of digits (surrounding blanks and a leading `+`
 * are tolerated).
 */
export function parseOdometerReading(raw: unknown, field: string): number {
  let value: number | null = null;
  if (typeof raw === 'number') {
    value = Number.isSafeInteger(raw) ? raw : null;
  } else if (typeof raw === 'string' && /^\s*[+-]?\d+\s*$/.test(raw)) {
    value = Number.parseInt(raw, 10);
    if (!Number.isSafeInteger(value)) value = null;
  }
  if (value === null) throw new ValidationError(`${field} must be an integer`, field);
  if (value < 0) throw new ValidationError(`${field} must not be negative`, field);
  return value;
}

export function advanceOdometer(currentKm: number, readingKm: number | null): number {
  return readingKm === null ? currentKm : Math.max(currentKm, readingKm);
}

/** BOOKED → IN_USE, recording the odometer-before reading. */
export function planStartUse(booking: Booking, rawOdometerBefore: unknown): BookingTransition {
  const to = nextStatus(booking, 'start_use');
  const odometerBefore = parseOdometerReading(rawOdometerBefore, 'odometerBefore');
  return {
    bookingId: booking.id,
    action: 'start_use',
    from: booking.status,
    changes: { status: to, odometerBefore },
    vehicleUpdate: { vehicleId: booking.vehicleId, odometerAtLeastKm: odometerBefore },
  };
}

/**
 * IN_USE → RETURNED when no fuel was bought, IN_USE → PENDING_RETURN when a
 * refill still has to be attached. Both record odometer-after and who
 * returned the vehicle; only the direct return advances the vehicle.
 */
export function planReturn(
  booking: Booking,
  rawOdometerAfter: unknown,
  opts: { hasFuel: boolean; returnedById: number },
): BookingTransition {
  const action: BookingAction = opts.hasFuel ? 'return_with_fuel' : 'return_without_fuel';
  const to = nextStatus(booking, action);
  const odometerAfter = parseOdometerReading(rawOdometerAfter, 'odometerAfter');

  if (booking.odometerBefore !== null && odometerAfter < booking.odometerBefore) {
    throw new BusinessRuleError(
      'odometer_reversed',
      `odometerAfter (${odometerAfter}) must not be lower than odometerBefore (${booking.odometerBefore})`,
      { odometerBefore: booking.odometerBefore, odometerAfter },
      422,
    );
  }

  return {
    bookingId: booking.id,
    action,
    from: booking.status,
    changes: { status: to, odometerAfter, returnedById: opts.returnedById },
    vehicleUpdate: opts.hasFuel ? null : { vehicleId: booking.vehicleId, odometerAtLeastKm: odometerAfter },
  };
}

/** PENDING_RETURN → RETURNED once at least one refill is attached. */
export function planConfirmReturn(booking: Booking, attachedRefillCount: number): BookingTransition {
  const to = nextStatus(booking, 'confirm_return');
  if (attachedRefillCount < 1) {
    throw new BusinessRuleError(
      'fuel_refill_required',
      'at least one fuel refill must be recorded before the return can be confirmed',
      { bookingId: booking.id },
      422,
    );
  }
  return {
    bookingId: booking.id,
    action: 'confirm_return',
    from: booking.status,
    changes: { status: to },
    vehicleUpdate: { vehicleId: booking.vehicleId, odometerAtLeastKm: booking.odometerAfter, status: 'READY' },
  };
}

/** BOOKED → CANCELLED, any time before use starts. */
export function planCancel(booking: Booking): BookingTransition {
  const to = nextStatus(booking, 'cancel');
  return {
    bookingId: booking.id,
    action: 'cancel',
    from: booking.status,
    changes: { status: to },
    vehicleUpdate: null,
  };
}
