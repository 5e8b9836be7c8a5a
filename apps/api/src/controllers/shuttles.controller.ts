import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import {
  DEFAULT_SHUTTLE_CAPACITY,
  MAX_SHUTTLE_CAPACITY,
  type Shuttle,
} from '@campus-shuttle/domain';
import type { ApiDependencies } from '../container.js';

// Status is free-form; idle | enroute | charging | maintenance are the ones the allocator knows.
const createBodySchema = z.object({
  identifier: z.string().trim().min(1),
  campus: z.string().trim().min(1),
  route_name: z.string().trim().min(1).optional(),
  battery_level: z.number().int().min(0).max(100).default(100),
  latitude: z.number().min(-90).max(90).optional(),
  longitude: z.number().min(-180).max(180).optional(),
  status: z.string().trim().min(1).default('idle'),
  capacity: z.number().int().min(1).max(MAX_SHUTTLE_CAPACITY).default(DEFAULT_SHUTTLE_CAPACITY),
  occupancy: z.number().int().min(0).default(0),
});

const listQuerySchema = z.object({
  campus: z.string().trim().min(1).optional(),
  status: z.string().trim().min(1).optional(),
});

export function createShuttlesRouter(deps: ApiDependencies): Router {
  const router = Router();

  /** POST /api/shuttles */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createBodySchema.parse(req.body);
      const shuttle = await deps.shuttles.register({
        identifier: body.identifier,
        campus: body.campus,
        routeName: body.route_name,
        batteryLevel: body.battery_level,
        latitude: body.latitude,
        longitude: body.longitude,
        status: body.status,
        capacity: body.capacity,
        occupancy: body.occupancy,
      });
      res.status(201).json({ id: shuttle.id });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/shuttles */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const shuttles = await deps.shuttles.list(query);
      res.json({ data: shuttles.map(toShuttleResponse), total: shuttles.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

function toShuttleResponse(shuttle: Shuttle) {
  return {
    id: shuttle.id,
    identifier: shuttle.identifier,
    campus: shuttle.campus,
    route_name: shuttle.routeName ?? null,
    battery_level: shuttle.batteryLevel,
    latitude: shuttle.latitude ?? null,
    longitude: shuttle.longitude ?? null,
    status: shuttle.status,
    capacity: shuttle.capacity,
    occupancy: shuttle.occupancy,
    created_at: shuttle.createdAt,
    updated_at: shuttle.updatedAt,
  };
}
