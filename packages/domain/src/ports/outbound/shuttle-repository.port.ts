import type { Shuttle, ShuttleStatus } from '../../entities/shuttle.js';

export type NewShuttle = Omit<Shuttle, 'id' | 'createdAt' | 'updatedAt'>;

export interface ShuttleListFilters {
  campus?: string;
  status?: ShuttleStatus;
  /** Matches any of the given statuses; combined with `status` by AND. */
  statuses?: readonly ShuttleStatus[];
}

export interface ReserveSeatsCommand {
  shuttleId: string;
  seats: number;
}

export interface ShuttleRepositoryPort {
  register(shuttle: NewShuttle): Promise<Shuttle>;
  findById(shuttleId: string): Promise<Shuttle | null>;
  /** Ordered by identifier, then id. */
  list(filters?: ShuttleListFilters): Promise<Shuttle[]>;
  /**
   * Single conditional write: adds `seats` to occupancy and marks the shuttle
   * `enroute`, only while it is bookable and the seats still fit.
   * Resolves null when the guard rejects the write.
   */
  reserveSeats(cmd: ReserveSeatsCommand): Promise<Shuttle | null>;
  /** Subtracts `seats` from occupancy, floored at 0. Null if the shuttle is gone. */
  releaseSeats(shuttleId: string, seats: number): Promise<Shuttle | null>;
}
