import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { Route } from '@campus-shuttle/domain';
import type { ApiDependencies } from '../container.js';

const createBodySchema = z.object({
  campus: z.string().trim().min(1),
  name: z.string().trim().min(1),
  stop_codes: z.array(z.string().trim().min(1)).min(1),
  is_active: z.boolean().default(true),
});

const listQuerySchema = z.object({
  campus: z.string().trim().min(1).optional(),
});

export function createRoutesRouter(deps: ApiDependencies): Router {
  const router = Router();

  /** POST /api/routes */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createBodySchema.parse(req.body);
      const route = await deps.routes.create({
        campus: body.campus,
        name: body.name,
        stopCodes: body.stop_codes,
        isActive: body.is_active,
      });
      res.status(201).json({ id: route.id });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/routes */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const routes = await deps.routes.list(query);
      res.json({ data: routes.map(toRouteResponse), total: routes.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

function toRouteResponse(route: Route) {
  return {
    id: route.id,
    campus: route.campus,
    name: route.name,
    stop_codes: route.stopCodes,
    is_active: route.isActive,
    created_at: route.createdAt,
  };
}
