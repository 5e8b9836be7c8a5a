import {
  BOOKABLE_SHUTTLE_STATUSES,
  BookingError,
  MAX_SEATS_PER_BOOKING,
  MIN_SEATS_PER_BOOKING,
  PLACEHOLDER_ETA_MINUTES,
  StoreUnavailableError,
  cancellationCutoff,
  type BoardingTokenSignerPort,
  type Booking,
  type BookingCommandPort,
  type BookingRepositoryPort,
  type CancelBookingResult,
  type ClockPort,
  type CreateBookingCommand,
  type CreateBookingResult,
  type Shuttle,
  type ShuttleRepositoryPort,
} from '@campus-shuttle/domain';

export interface BookingAllocatorDeps {
  shuttles: ShuttleRepositoryPort;
  bookings: BookingRepositoryPort;
  signer: BoardingTokenSignerPort;
  clock: ClockPort;
}

/**
 * Assigns ride requests to shuttles and keeps seat occupancy in step with
 * booking state.
 *
 * Every rejection happens before the first write. Seat reservation is one
 * conditional update on the shuttle, so two requests racing for the last
 * seats cannot both land.
 */
export class BookingAllocator implements BookingCommandPort {
  private readonly shuttles: ShuttleRepositoryPort;
  private readonly bookings: BookingRepositoryPort;
  private readonly signer: BoardingTokenSignerPort;
  private readonly clock: ClockPort;

  constructor(deps: BookingAllocatorDeps) {
    this.shuttles = deps.shuttles;
    this.bookings = deps.bookings;
    this.signer = deps.signer;
    this.clock = deps.clock;
  }

  async createBooking(cmd: CreateBookingCommand): Promise<CreateBookingResult> {
    const seats = cmd.seats ?? MIN_SEATS_PER_BOOKING;

    if (cmd.pickupCode === cmd.dropoffCode) {
      throw new BookingError('INVALID_REQUEST', 'Pickup and dropoff cannot be the same stop', {
        pickupCode: cmd.pickupCode,
      });
    }
    if (!Number.isInteger(seats) || seats < MIN_SEATS_PER_BOOKING) {
      throw invalidSeats(seats);
    }

    const shuttle = await this.selectShuttle(cmd.campus);
    if (!shuttle) {
      throw new BookingError('NO_AVAILABILITY', `No shuttle available in ${cmd.campus}`, {
        campus: cmd.campus,
      });
    }
    if (shuttle.occupancy + seats > shuttle.capacity) {
      throw capacityExceeded(shuttle, seats);
    }
    // Capacity is reported first; the per-booking cap applies only to requests that would fit.
    if (seats > MAX_SEATS_PER_BOOKING) {
      throw invalidSeats(seats);
    }

    const reserved = await this.shuttles.reserveSeats({ shuttleId: shuttle.id, seats });
    if (!reserved) {
      // Another booking took the seats (or the shuttle left service) after we read it.
      const latest = (await this.shuttles.findById(shuttle.id)) ?? shuttle;
      throw capacityExceeded(latest, seats);
    }

    const issuedAt = this.clock.now();
    const qrToken = this.signer.sign({
      shuttleIdentifier: reserved.identifier,
      email: cmd.email,
      issuedAt,
    });

    let booking: Booking;
    try {
      booking = await this.bookings.create({
        name: cmd.name,
        email: cmd.email,
        campus: cmd.campus,
        pickupCode: cmd.pickupCode,
        dropoffCode: cmd.dropoffCode,
        scheduledTime: cmd.scheduledTime,
        status: 'confirmed',
        etaMinutes: PLACEHOLDER_ETA_MINUTES,
        seats,
        assignedShuttleId: reserved.id,
        assignedShuttleIdentifier: reserved.identifier,
        qrToken,
      });
    } catch (err) {
      await this.releaseQuietly(reserved.id, seats, 'booking insert failed');
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError('booking could not be saved', { cause: err });
    }

    return {
      bookingId: booking.id,
      etaMinutes: booking.etaMinutes,
      status: booking.status,
      qrToken,
      assignedShuttle: reserved.identifier,
    };
  }

  async cancelBooking(bookingId: string): Promise<CancelBookingResult> {
    const booking = await this.bookings.findById(bookingId);
    if (!booking) {
      throw new BookingError('NOT_FOUND', 'Booking not found', { bookingId });
    }
    if (booking.status === 'canceled') {
      return { status: 'already_canceled', booking };
    }

    const now = this.clock.now();
    const cutoff = cancellationCutoff(booking);
    if (cutoff && now.getTime() >= cutoff.getTime()) {
      throw new BookingError('WINDOW_CLOSED', 'Cancellation window has closed for this booking', {
        bookingId,
        cutoff: cutoff.toISOString(),
      });
    }

    const canceled = await this.bookings.markCanceled(booking.id, now);
    if (!canceled) {
      // Lost a race with a concurrent cancel; that request released the seats.
      const latest = (await this.bookings.findById(booking.id)) ?? booking;
      return { status: 'already_canceled', booking: latest };
    }

    if (canceled.assignedShuttleId) {
      await this.releaseQuietly(canceled.assignedShuttleId, canceled.seats, `cancel ${canceled.id}`);
    }

    return { status: 'canceled', booking: canceled };
  }

  /** First bookable shuttle in the campus, by identifier then id. */
  private async selectShuttle(campus: string): Promise<Shuttle | null> {
    const candidates = await this.shuttles.list({ campus, statuses: BOOKABLE_SHUTTLE_STATUSES });
    return candidates[0] ?? null;
  }

  private async releaseQuietly(shuttleId: string, seats: number, reason: string): Promise<void> {
    try {
      const released = await this.shuttles.releaseSeats(shuttleId, seats);
      if (!released) {
        console.warn(`[booking-allocator] shuttle ${shuttleId} missing; ${seats} seat(s) not released (${reason})`);
      }
    } catch (err) {
      console.warn(`[booking-allocator] failed to release ${seats} seat(s) on ${shuttleId} (${reason})`, err);
    }
  }
}

function capacityExceeded(shuttle: Shuttle, seats: number): BookingError {
  return new BookingError(
    'CAPACITY_EXCEEDED',
    `Shuttle ${shuttle.identifier} cannot take ${seats} more seat(s)`,
    {
      shuttle: shuttle.identifier,
      capacity: shuttle.capacity,
      occupancy: shuttle.occupancy,
      requestedSeats: seats,
    },
  );
}

function invalidSeats(seats: number): BookingError {
  return new BookingError(
    'INVALID_REQUEST',
    `Seats must be a whole number between ${MIN_SEATS_PER_BOOKING} and ${MAX_SEATS_PER_BOOKING}`,
    { seats },
  );
}
