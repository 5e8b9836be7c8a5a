import type {
  NewShuttle,
  ReserveSeatsCommand,
  Shuttle,
  ShuttleListFilters,
  ShuttleRepositoryPort,
} from '@campus-shuttle/domain';
import { BOOKABLE_SHUTTLE_STATUSES } from '@campus-shuttle/domain';
import { firstRow, isUuid, runQuery, type Queryable } from './pool.js';

type ShuttleRow = {
  id: string;
  identifier: string;
  campus: string;
  route_name: string | null;
  battery_level: number;
  latitude: number | null;
  longitude: number | null;
  status: string;
  capacity: number;
  occupancy: number;
  created_at: Date;
  updated_at: Date;
};

export class PgShuttleRepository implements ShuttleRepositoryPort {
  constructor(private readonly db: Queryable) {}

  async register(shuttle: NewShuttle): Promise<Shuttle> {
    const rows = await runQuery<ShuttleRow>(
      this.db,
      `INSERT INTO shuttle.shuttles
         (identifier, campus, route_name, battery_level, latitude, longitude,
          status, capacity, occupancy)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
       RETURNING *`,
      [
        shuttle.identifier,
        shuttle.campus,
        shuttle.routeName ?? null,
        shuttle.batteryLevel,
        shuttle.latitude ?? null,
        shuttle.longitude ?? null,
        shuttle.status,
        shuttle.capacity,
        shuttle.occupancy,
      ],
    );
    return mapShuttleRow(firstRow(rows, 'shuttle insert'));
  }

  async findById(shuttleId: string): Promise<Shuttle | null> {
    if (!isUuid(shuttleId)) return null;
    const rows = await runQuery<ShuttleRow>(
      this.db,
      `SELECT * FROM shuttle.shuttles WHERE id = $1`,
      [shuttleId],
    );
    return rows[0] ? mapShuttleRow(rows[0]) : null;
  }

  async list(filters: ShuttleListFilters = {}): Promise<Shuttle[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.campus) {
      conditions.push(`campus = $${idx++}`);
      params.push(filters.campus);
    }
    if (filters.status) {
      conditions.push(`status = $${idx++}`);
      params.push(filters.status);
    }
    if (filters.statuses) {
      conditions.push(`status = ANY($${idx++})`);
      params.push([...filters.statuses]);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await runQuery<ShuttleRow>(
      this.db,
      `SELECT * FROM shuttle.shuttles ${where} ORDER BY identifier COLLATE "C", id`,
      params,
    );
    return rows.map(mapShuttleRow);
  }

  async reserveSeats(cmd: ReserveSeatsCommand): Promise<Shuttle | null> {
    // Check-and-increment in one statement; concurrent bookings serialise on the row lock.
    const rows = await runQuery<ShuttleRow>(
      this.db,
      `UPDATE shuttle.shuttles
       SET occupancy = occupancy + $2, status = 'enroute', updated_at = NOW()
       WHERE id = $1
         AND status = ANY($3)
         AND occupancy + $2 <= capacity
       RETURNING *`,
      [cmd.shuttleId, cmd.seats, [...BOOKABLE_SHUTTLE_STATUSES]],
    );
    return rows[0] ? mapShuttleRow(rows[0]) : null;
  }

  async releaseSeats(shuttleId: string, seats: number): Promise<Shuttle | null> {
    const rows = await runQuery<ShuttleRow>(
      this.db,
      `UPDATE shuttle.shuttles
       SET occupancy = GREATEST(occupancy - $2, 0), updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [shuttleId, seats],
    );
    return rows[0] ? mapShuttleRow(rows[0]) : null;
  }
}

function mapShuttleRow(row: ShuttleRow): Shuttle {
  return {
    id: row.id,
    identifier: row.identifier,
    campus: row.campus,
    routeName: row.route_name ?? undefined,
    batteryLevel: row.battery_level,
    latitude: row.latitude ?? undefined,
    longitude: row.longitude ?? undefined,
    status: row.status,
    capacity: row.capacity,
    occupancy: row.occupancy,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
