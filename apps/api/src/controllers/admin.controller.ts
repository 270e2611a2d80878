import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AppContext } from '../context.js';

const listHitsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

const deleteHitsBodySchema = z.object({
  record_ids: z.array(z.number().int().positive()).max(10_000),
});

export function createAdminRouter(ctx: AppContext): Router {
  const router = Router();
  router.use(express.json({ limit: '1mb' }));

  /** GET /api/v1/admin/hits — most recently received hits first */
  router.get('/hits', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = listHitsQuerySchema.parse(req.query);
      const data = await ctx.potholes.listRecentHits(limit);
      res.json({ data, total: data.length });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/v1/admin/hits/delete — unknown ids are ignored */
  router.post('/hits/delete', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = deleteHitsBodySchema.parse(req.body);
      const deleted = await ctx.potholes.deleteHits(new Set(body.record_ids));
      res.json({ deleted });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
