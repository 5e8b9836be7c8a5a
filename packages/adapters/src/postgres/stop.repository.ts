import type {
  NewStop,
  Stop,
  StopListFilters,
  StopRepositoryPort,
} from '@campus-shuttle/domain';
import { firstRow, runQuery, type Queryable } from './pool.js';

type StopRow = {
  id: string;
  campus: string;
  name: string;
  code: string;
  latitude: number;
  longitude: number;
  is_active: boolean;
  created_at: Date;
};

export class PgStopRepository implements StopRepositoryPort {
  constructor(private readonly db: Queryable) {}

  async create(stop: NewStop): Promise<Stop> {
    const rows = await runQuery<StopRow>(
      this.db,
      `INSERT INTO shuttle.stops (campus, name, code, latitude, longitude, is_active)
       VALUES ($1,$2,$3,$4,$5,$6)
       RETURNING *`,
      [stop.campus, stop.name, stop.code, stop.latitude, stop.longitude, stop.isActive],
    );
    return mapStopRow(firstRow(rows, 'stop insert'));
  }

  async list(filters: StopListFilters = {}): Promise<Stop[]> {
    const rows = filters.campus
      ? await runQuery<StopRow>(
          this.db,
          `SELECT * FROM shuttle.stops WHERE campus = $1 ORDER BY code`,
          [filters.campus],
        )
      : await runQuery<StopRow>(this.db, `SELECT * FROM shuttle.stops ORDER BY code`);
    return rows.map(mapStopRow);
  }
}

function mapStopRow(row: StopRow): Stop {
  return {
    id: row.id,
    campus: row.campus,
    name: row.name,
    code: row.code,
    latitude: row.latitude,
    longitude: row.longitude,
    isActive: row.is_active,
    createdAt: row.created_at,
  };
}
