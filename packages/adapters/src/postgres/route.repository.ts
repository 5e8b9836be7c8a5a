import type {
  NewRoute,
  Route,
  RouteListFilters,
  RouteRepositoryPort,
} from '@campus-shuttle/domain';
import { firstRow, runQuery, type Queryable } from './pool.js';

type RouteRow = {
  id: string;
  campus: string;
  name: string;
  stop_codes: string[];
  is_active: boolean;
  created_at: Date;
};

export class PgRouteRepository implements RouteRepositoryPort {
  constructor(private readonly db: Queryable) {}

  async create(route: NewRoute): Promise<Route> {
    const rows = await runQuery<RouteRow>(
      this.db,
      `INSERT INTO shuttle.routes (campus, name, stop_codes, is_active)
       VALUES ($1,$2,$3,$4)
       RETURNING *`,
      [route.campus, route.name, route.stopCodes, route.isActive],
    );
    return mapRouteRow(firstRow(rows, 'route insert'));
  }

  async list(filters: RouteListFilters = {}): Promise<Route[]> {
    const rows = filters.campus
      ? await runQuery<RouteRow>(
          this.db,
          `SELECT * FROM shuttle.routes WHERE campus = $1 ORDER BY name`,
          [filters.campus],
        )
      : await runQuery<RouteRow>(this.db, `SELECT * FROM shuttle.routes ORDER BY name`);
    return rows.map(mapRouteRow);
  }
}

function mapRouteRow(row: RouteRow): Route {
  return {
    id: row.id,
    campus: row.campus,
    name: row.name,
    stopCodes: row.stop_codes,
    isActive: row.is_active,
    createdAt: row.created_at,
  };
}
