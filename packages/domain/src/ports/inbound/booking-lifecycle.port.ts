import type { Booking } from '../../entities/booking.js';
import type { EmployeeProfile } from '../../entities/employee.js';

// ---------------------------------------------------------------------------
// Booking lifecycle (inbound)
// ---------------------------------------------------------------------------

export interface CreateBookingCommand {
  vehicleId: number;
  /** Raw `YYYY-MM-DD` values; validated by the use case. */
  startDate: unknown;
  endDate: unknown;
  destination: string;
  coTravelerIds?: number[];
}

export interface ReturnVehicleCommand {
  odometerAfter: unknown;
  /** Fuel was bought during the trip; the return then waits for a refill record. */
  hasFuel: boolean;
}

export interface BookingLifecyclePort {
  create(actor: EmployeeProfile, cmd: CreateBookingCommand): Promise<Booking>;
  startUse(actor: EmployeeProfile, bookingId: number, odometerBefore: unknown): Promise<Booking>;
  returnVehicle(actor: EmployeeProfile, bookingId: number, cmd: ReturnVehicleCommand): Promise<Booking>;
  confirmReturn(actor: EmployeeProfile, bookingId: number): Promise<Booking>;
  cancel(actor: EmployeeProfile, bookingId: number): Promise<Booking>;
}
