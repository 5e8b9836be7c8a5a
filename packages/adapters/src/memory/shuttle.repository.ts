import type {
  NewShuttle,
  ReserveSeatsCommand,
  Shuttle,
  ShuttleListFilters,
  ShuttleRepositoryPort,
} from '@campus-shuttle/domain';
import { isBookableStatus } from '@campus-shuttle/domain';
import type { InMemoryStore } from './in-memory-store.js';

export class InMemoryShuttleRepository implements ShuttleRepositoryPort {
  constructor(private readonly store: InMemoryStore) {}

  async register(shuttle: NewShuttle): Promise<Shuttle> {
    const now = this.store.now();
    const created: Shuttle = { ...shuttle, id: this.store.nextId(), createdAt: now, updatedAt: now };
    this.store.shuttles.set(created.id, created);
    return created;
  }

  async findById(shuttleId: string): Promise<Shuttle | null> {
    return this.store.shuttles.get(shuttleId) ?? null;
  }

  async list(filters: ShuttleListFilters = {}): Promise<Shuttle[]> {
    const { campus, status, statuses } = filters;
    return [...this.store.shuttles.values()]
      .filter((s) => !campus || s.campus === campus)
      .filter((s) => !status || s.status === status)
      .filter((s) => !statuses || statuses.includes(s.status))
      .sort(byIdentifierThenId);
  }

  async reserveSeats(cmd: ReserveSeatsCommand): Promise<Shuttle | null> {
    const current = this.store.shuttles.get(cmd.shuttleId);
    if (!current) return null;
    if (!isBookableStatus(current.status)) return null;
    if (current.occupancy + cmd.seats > current.capacity) return null;

    const updated: Shuttle = {
      ...current,
      occupancy: current.occupancy + cmd.seats,
      status: 'enroute',
      updatedAt: this.store.now(),
    };
    this.store.shuttles.set(updated.id, updated);
    return updated;
  }

  async releaseSeats(shuttleId: string, seats: number): Promise<Shuttle | null> {
    const current = this.store.shuttles.get(shuttleId);
    if (!current) return null;

    const updated: Shuttle = {
      ...current,
      occupancy: Math.max(current.occupancy - seats, 0),
      updatedAt: this.store.now(),
    };
    this.store.shuttles.set(updated.id, updated);
    return updated;
  }
}

// Mirrors ORDER BY identifier COLLATE "C", id in the Postgres adapter (byte order, not locale).
function byIdentifierThenId(a: Shuttle, b: Shuttle): number {
  if (a.identifier !== b.identifier) return a.identifier < b.identifier ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}
