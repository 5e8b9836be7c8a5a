import type {
  NewRoute,
  Route,
  RouteListFilters,
  RouteRepositoryPort,
} from '@campus-shuttle/domain';
import type { InMemoryStore } from './in-memory-store.js';

export class InMemoryRouteRepository implements RouteRepositoryPort {
  constructor(private readonly store: InMemoryStore) {}

  async create(route: NewRoute): Promise<Route> {
    const created: Route = {
      ...route,
      stopCodes: [...route.stopCodes],
      id: this.store.nextId(),
      createdAt: this.store.now(),
    };
    this.store.routes.set(created.id, created);
    return created;
  }

  async list(filters: RouteListFilters = {}): Promise<Route[]> {
    return [...this.store.routes.values()]
      .filter((r) => !filters.campus || r.campus === filters.campus)
      .sort((a, b) => a.name.localeCompare(b.name));
  }
}
