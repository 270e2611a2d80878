import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import type { AppContext } from './context.js';
import { createHitsRouter } from './controllers/hits.controller.js';
import { createMonitoringRouter } from './controllers/monitoring.controller.js';
import { createPotholesRouter } from './controllers/potholes.controller.js';
import { createAdminRouter } from './controllers/admin.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export function buildApp(ctx: AppContext): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: ctx.config.server.corsOrigin }));
  if (ctx.config.server.env !== 'test') app.use(morgan(ctx.config.server.logFormat));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  // Body parsing is per router: /hits needs the raw bytes to measure payload size.
  app.use('/api/v1', createHitsRouter(ctx));
  app.use('/api/v1', createMonitoringRouter(ctx));
  app.use('/api/v1', createPotholesRouter(ctx));
  app.use('/api/v1/admin', createAdminRouter(ctx));

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
