import type {
  Booking,
  BookingListFilters,
  BookingRepositoryPort,
  BookingStatus,
  NewBooking,
} from '@campus-shuttle/domain';
import { firstRow, isUuid, runQuery, type Queryable } from './pool.js';

type BookingRow = {
  id: string;
  name: string;
  email: string;
  campus: string;
  pickup_code: string;
  dropoff_code: string;
  scheduled_time: Date | null;
  status: BookingStatus;
  eta_minutes: number;
  seats: number;
  assigned_shuttle_id: string | null;
  assigned_shuttle_identifier: string | null;
  qr_token: string | null;
  created_at: Date;
  updated_at: Date;
  canceled_at: Date | null;
};

export class PgBookingRepository implements BookingRepositoryPort {
  constructor(private readonly db: Queryable) {}

  async create(booking: NewBooking): Promise<Booking> {
    const rows = await runQuery<BookingRow>(
      this.db,
      `INSERT INTO shuttle.bookings
         (name, email, campus, pickup_code, dropoff_code, scheduled_time,
          status, eta_minutes, seats, assigned_shuttle_id,
          assigned_shuttle_identifier, qr_token)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12)
       RETURNING *`,
      [
        booking.name,
        booking.email,
        booking.campus,
        booking.pickupCode,
        booking.dropoffCode,
        booking.scheduledTime ?? null,
        booking.status,
        booking.etaMinutes,
        booking.seats,
        booking.assignedShuttleId ?? null,
        booking.assignedShuttleIdentifier ?? null,
        booking.qrToken ?? null,
      ],
    );
    return mapBookingRow(firstRow(rows, 'booking insert'));
  }

  async findById(bookingId: string): Promise<Booking | null> {
    if (!isUuid(bookingId)) return null;
    const rows = await runQuery<BookingRow>(
      this.db,
      `SELECT * FROM shuttle.bookings WHERE id = $1`,
      [bookingId],
    );
    return rows[0] ? mapBookingRow(rows[0]) : null;
  }

  async list(filters: BookingListFilters = {}): Promise<Booking[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.email) {
      conditions.push(`email = $${idx++}`);
      params.push(filters.email);
    }
    if (filters.campus) {
      conditions.push(`campus = $${idx++}`);
      params.push(filters.campus);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = filters.limit ?? 100;
    const offset = filters.offset ?? 0;

    const rows = await runQuery<BookingRow>(
      this.db,
      `SELECT * FROM shuttle.bookings ${where}
       ORDER BY created_at DESC, id
       LIMIT $${idx++} OFFSET $${idx++}`,
      [...params, limit, offset],
    );
    return rows.map(mapBookingRow);
  }

  async markCanceled(bookingId: string, canceledAt: Date): Promise<Booking | null> {
    if (!isUuid(bookingId)) return null;
    const rows = await runQuery<BookingRow>(
      this.db,
      `UPDATE shuttle.bookings
       SET status = 'canceled', canceled_at = $2, updated_at = NOW()
       WHERE id = $1 AND status = 'confirmed'
       RETURNING *`,
      [bookingId, canceledAt],
    );
    return rows[0] ? mapBookingRow(rows[0]) : null;
  }
}

function mapBookingRow(row: BookingRow): Booking {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    campus: row.campus,
    pickupCode: row.pickup_code,
    dropoffCode: row.dropoff_code,
    scheduledTime: row.scheduled_time ?? undefined,
    status: row.status,
    etaMinutes: row.eta_minutes,
    seats: row.seats,
    assignedShuttleId: row.assigned_shuttle_id ?? undefined,
    assignedShuttleIdentifier: row.assigned_shuttle_identifier ?? undefined,
    qrToken: row.qr_token ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    canceledAt: row.canceled_at ?? undefined,
  };
}
