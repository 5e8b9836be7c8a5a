import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { Stop } from '@campus-shuttle/domain';
import type { ApiDependencies } from '../container.js';

const createBodySchema = z.object({
  campus: z.string().trim().min(1),
  name: z.string().trim().min(1),
  code: z.string().trim().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  is_active: z.boolean().default(true),
});

const listQuerySchema = z.object({
  campus: z.string().trim().min(1).optional(),
});

export function createStopsRouter(deps: ApiDependencies): Router {
  const router = Router();

  /** POST /api/stops */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createBodySchema.parse(req.body);
      const stop = await deps.stops.create({
        campus: body.campus,
        name: body.name,
        code: body.code,
        latitude: body.latitude,
        longitude: body.longitude,
        isActive: body.is_active,
      });
      res.status(201).json({ id: stop.id });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/stops */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const stops = await deps.stops.list(query);
      res.json({ data: stops.map(toStopResponse), total: stops.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

function toStopResponse(stop: Stop) {
  return {
    id: stop.id,
    campus: stop.campus,
    name: stop.name,
    code: stop.code,
    latitude: stop.latitude,
    longitude: stop.longitude,
    is_active: stop.isActive,
    created_at: stop.createdAt,
  };
}
