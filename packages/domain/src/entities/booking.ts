export type BookingStatus = 'confirmed' | 'completed' | 'canceled';

/** Placeholder until a routing service supplies real estimates. */
export const PLACEHOLDER_ETA_MINUTES = 10;

/** Scheduled bookings cannot be canceled this close to pickup. */
export const CANCELLATION_CUTOFF_MINUTES = 5;

export const MIN_SEATS_PER_BOOKING = 1;
export const MAX_SEATS_PER_BOOKING = 6;

export interface Booking {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly campus: string;
  readonly pickupCode: string;
  readonly dropoffCode: string;
  /** Planned pickup time; absent means ASAP. */
  readonly scheduledTime?: Date;
  readonly status: BookingStatus;
  readonly etaMinutes: number;
  readonly seats: number;
  readonly assignedShuttleId?: string;
  readonly assignedShuttleIdentifier?: string;
  readonly qrToken?: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly canceledAt?: Date;
}

/**
 * Last instant at which a scheduled booking may still be canceled
 * (exclusive). ASAP bookings have no cutoff.
 */
export function cancellationCutoff(booking: Pick<Booking, 'scheduledTime'>): Date | null {
  if (!booking.scheduledTime) return null;
  return new Date(booking.scheduledTime.getTime() - CANCELLATION_CUTOFF_MINUTES * 60_000);
}
