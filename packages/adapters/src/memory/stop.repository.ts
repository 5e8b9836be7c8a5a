import type {
  NewStop,
  Stop,
  StopListFilters,
  StopRepositoryPort,
} from '@campus-shuttle/domain';
import type { InMemoryStore } from './in-memory-store.js';

export class InMemoryStopRepository implements StopRepositoryPort {
  constructor(private readonly store: InMemoryStore) {}

  async create(stop: NewStop): Promise<Stop> {
    const created: Stop = { ...stop, id: this.store.nextId(), createdAt: this.store.now() };
    this.store.stops.set(created.id, created);
    return created;
  }

  async list(filters: StopListFilters = {}): Promise<Stop[]> {
    return [...this.store.stops.values()]
      .filter((s) => !filters.campus || s.campus === filters.campus)
      .sort((a, b) => a.code.localeCompare(b.code));
  }
}
