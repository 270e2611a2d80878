import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { AppContext } from '../context.js';

export function createPotholesRouter(ctx: AppContext): Router {
  const router = Router();

  /** GET /api/v1/potholes — clustered potholes as a GeoJSON FeatureCollection */
  router.get('/potholes', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const collection = await ctx.potholes.getPotholes();
      res.type('application/geo+json').send(JSON.stringify(collection));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
