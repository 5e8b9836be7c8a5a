import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { BookingError, MIN_SEATS_PER_BOOKING, type Booking } from '@campus-shuttle/domain';
import type { ApiDependencies } from '../container.js';

// Timestamps without an offset are read as UTC.
const LOCAL_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,6})?)?$/;

const scheduledTimeSchema = z
  .union([
    z.string().datetime({ offset: true }),
    z.string().regex(LOCAL_DATETIME).transform((value) => `${value}Z`),
  ])
  .transform((value) => new Date(value))
  .refine((date) => !Number.isNaN(date.getTime()), { message: 'Invalid datetime' });

const createBodySchema = z.object({
  name: z.string().trim().min(1).max(120),
  email: z.string().trim().email(),
  campus: z.string().trim().min(1),
  pickup_code: z.string().trim().min(1),
  dropoff_code: z.string().trim().min(1),
  scheduled_time: scheduledTimeSchema.optional(),
  // The per-booking cap is the allocator's call, after capacity.
  seats: z.number().int().min(MIN_SEATS_PER_BOOKING).default(MIN_SEATS_PER_BOOKING),
});

const listQuerySchema = z.object({
  email: z.string().trim().email().optional(),
  campus: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

const bookingIdSchema = z.string().trim().min(1);

export function createBookingsRouter(deps: ApiDependencies): Router {
  const router = Router();

  /** POST /api/bookings */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createBodySchema.parse(req.body);
      const result = await deps.allocator.createBooking({
        name: body.name,
        email: body.email,
        campus: body.campus,
        pickupCode: body.pickup_code,
        dropoffCode: body.dropoff_code,
        scheduledTime: body.scheduled_time,
        seats: body.seats,
      });
      res.status(201).json({
        id: result.bookingId,
        eta_minutes: result.etaMinutes,
        status: result.status,
        qr_token: result.qrToken,
        assigned_shuttle: result.assignedShuttle,
      });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/bookings */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const bookings = await deps.bookings.list(query);
      res.json({ data: bookings.map(toBookingResponse), total: bookings.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/bookings/:bookingId */
  router.get('/:bookingId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const bookingId = bookingIdSchema.parse(req.params['bookingId']);
      const booking = await deps.bookings.findById(bookingId);
      if (!booking) throw new BookingError('NOT_FOUND', 'Booking not found', { bookingId });
      res.json(toBookingResponse(booking));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/bookings/:bookingId/cancel */
  router.post('/:bookingId/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const bookingId = bookingIdSchema.parse(req.params['bookingId']);
      const result = await deps.allocator.cancelBooking(bookingId);
      res.json({ status: result.status });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

function toBookingResponse(booking: Booking) {
  return {
    id: booking.id,
    name: booking.name,
    email: booking.email,
    campus: booking.campus,
    pickup_code: booking.pickupCode,
    dropoff_code: booking.dropoffCode,
    scheduled_time: booking.scheduledTime ?? null,
    status: booking.status,
    eta_minutes: booking.etaMinutes,
    seats: booking.seats,
    assigned_shuttle_id: booking.assignedShuttleId ?? null,
    assigned_shuttle_identifier: booking.assignedShuttleIdentifier ?? null,
    qr_token: booking.qrToken ?? null,
    created_at: booking.createdAt,
    updated_at: booking.updatedAt,
    canceled_at: booking.canceledAt ?? null,
  };
}
