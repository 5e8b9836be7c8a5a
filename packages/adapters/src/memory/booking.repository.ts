import type {
  Booking,
  BookingListFilters,
  BookingRepositoryPort,
  NewBooking,
} from '@campus-shuttle/domain';
import type { InMemoryStore } from './in-memory-store.js';

export class InMemoryBookingRepository implements BookingRepositoryPort {
  constructor(private readonly store: InMemoryStore) {}

  async create(booking: NewBooking): Promise<Booking> {
    const now = this.store.now();
    const created: Booking = { ...booking, id: this.store.nextId(), createdAt: now, updatedAt: now };
    this.store.bookings.set(created.id, created);
    return created;
  }

  async findById(bookingId: string): Promise<Booking | null> {
    return this.store.bookings.get(bookingId) ?? null;
  }

  async list(filters: BookingListFilters = {}): Promise<Booking[]> {
    const limit = filters.limit ?? 100;
    const offset = filters.offset ?? 0;
    return [...this.store.bookings.values()]
      .filter((b) => !filters.email || b.email === filters.email)
      .filter((b) => !filters.campus || b.campus === filters.campus)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(offset, offset + limit);
  }

  async markCanceled(bookingId: string, canceledAt: Date): Promise<Booking | null> {
    const current = this.store.bookings.get(bookingId);
    if (!current || current.status !== 'confirmed') return null;

    const updated: Booking = {
      ...current,
      status: 'canceled',
      canceledAt,
      updatedAt: this.store.now(),
    };
    this.store.bookings.set(updated.id, updated);
    return updated;
  }
}
