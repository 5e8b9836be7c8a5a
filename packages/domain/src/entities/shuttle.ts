// Shuttle status values and seat accounting

/**
 * Known shuttle states. The store accepts any non-empty string, so the
 * `string & {}` arm keeps unknown values assignable without widening the
 * literals away in editors.
 */
export type KnownShuttleStatus = 'idle' | 'enroute' | 'charging' | 'maintenance';
export type ShuttleStatus = KnownShuttleStatus | (string & {});

/** Statuses a booking may be assigned to. */
export const BOOKABLE_SHUTTLE_STATUSES: readonly KnownShuttleStatus[] = ['idle', 'enroute'];

export const DEFAULT_SHUTTLE_CAPACITY = 12;
export const MAX_SHUTTLE_CAPACITY = 60;

export interface Shuttle {
  readonly id: string;
  readonly identifier: string;  // fleet number painted on the vehicle, e.g. "GCTU-01"
  readonly campus: string;
  readonly routeName?: string;
  readonly batteryLevel: number; // 0–100
  readonly latitude?: number;
  readonly longitude?: number;
  readonly status: ShuttleStatus;
  readonly capacity: number;
  readonly occupancy: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export function isBookableStatus(status: ShuttleStatus): boolean {
  return BOOKABLE_SHUTTLE_STATUSES.some((s) => s === status);
}
