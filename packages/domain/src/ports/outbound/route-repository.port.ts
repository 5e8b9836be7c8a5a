import type { Route } from '../../entities/route.js';

export type NewRoute = Omit<Route, 'id' | 'createdAt'>;

export interface RouteListFilters {
  campus?: string;
}

export interface RouteRepositoryPort {
  create(route: NewRoute): Promise<Route>;
  list(filters?: RouteListFilters): Promise<Route[]>;
}
