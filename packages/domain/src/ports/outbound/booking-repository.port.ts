import type { Booking } from '../../entities/booking.js';

export type NewBooking = Omit<Booking, 'id' | 'createdAt' | 'updatedAt' | 'canceledAt'>;

export interface BookingListFilters {
  email?: string;
  campus?: string;
  limit?: number;
  offset?: number;
}

export interface BookingRepositoryPort {
  create(booking: NewBooking): Promise<Booking>;
  findById(bookingId: string): Promise<Booking | null>;
  /** Newest first. */
  list(filters?: BookingListFilters): Promise<Booking[]>;
  /**
   * Transitions a confirmed booking to canceled. Resolves null when the
   * booking is missing or no longer confirmed.
   */
  markCanceled(bookingId: string, canceledAt: Date): Promise<Booking | null>;
}
