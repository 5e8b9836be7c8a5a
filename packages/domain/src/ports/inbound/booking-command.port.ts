import type { Booking, BookingStatus } from '../../entities/booking.js';

export interface CreateBookingCommand {
  name: string;
  email: string;
  campus: string;
  pickupCode: string;
  dropoffCode: string;
  scheduledTime?: Date;
  /** Defaults to 1. */
  seats?: number;
}

export interface CreateBookingResult {
  bookingId: string;
  etaMinutes: number;
  status: BookingStatus;
  qrToken: string;
  /** Identifier of the assigned shuttle, not its store id. */
  assignedShuttle: string;
}

export type CancelOutcome = 'canceled' | 'already_canceled';

export interface CancelBookingResult {
  status: CancelOutcome;
  booking: Booking;
}

export interface BookingCommandPort {
  createBooking(cmd: CreateBookingCommand): Promise<CreateBookingResult>;
  cancelBooking(bookingId: string): Promise<CancelBookingResult>;
}
