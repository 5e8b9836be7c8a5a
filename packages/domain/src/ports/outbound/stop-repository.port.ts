import type { Stop } from '../../entities/stop.js';

export type NewStop = Omit<Stop, 'id' | 'createdAt'>;

export interface StopListFilters {
  campus?: string;
}

export interface StopRepositoryPort {
  create(stop: NewStop): Promise<Stop>;
  list(filters?: StopListFilters): Promise<Stop[]>;
}
