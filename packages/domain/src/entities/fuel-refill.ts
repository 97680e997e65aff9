import type { CalendarDate } from '../calendar/calendar-date.js';

export interface FuelRefill {
  readonly id: number;
  readonly vehicleId: number;
  /** Null for a refill recorded outside any booking. */
  readonly bookingId: number | null;
  readonly refillDate: CalendarDate;
  readonly fuelPlace: string;
  readonly odometerKm: number;
  readonly liters: number;
  readonly totalPrice: number;
  readonly pricePerLiter: number | null;
  readonly voucherNumber: string;
  readonly createdAt: Date;
}

export interface NewFuelRefill {
  vehicleId: number;
  bookingId: number | null;
  refillDate: CalendarDate;
  fuelPlace: string;
  odometerKm: number;
  liters: number;
  totalPrice: number;
  pricePerLiter: number | null;
  voucherNumber: string;
}

export type FuelRefillPatch = Partial<Omit<NewFuelRefill, 'vehicleId' | 'bookingId'>>;
