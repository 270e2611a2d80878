import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { MIN_PROTOCOL_VERSION } from '../services/ingestion/hit-processor.js';
import { diskFreeGb } from '../services/stats/disk-usage.js';
import type { AppContext } from '../context.js';

export const APP_VERSION = '0.1.0';

export function createMonitoringRouter(ctx: AppContext): Router {
  const router = Router();

  /** GET /api/v1/health */
  router.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = ctx.tracker.snapshot();
      const { backend, baseDir } = ctx.config.storage;
      // isWritable creates the file store's base dir, so it runs before statfs
      const storageWritable = await ctx.storage.isWritable();
      res.json({
        status: 'ok',
        version: APP_VERSION,
        uptime_seconds: snapshot.uptimeSeconds,
        queue_depth: ctx.queue.size(),
        storage_backend: backend,
        storage_writable: storageWritable,
        disk_free_gb: backend === 'file' ? await diskFreeGb(baseDir) : -1,
      });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/v1/stats — counters plus active devices in the sliding window */
  router.get('/stats', (_req: Request, res: Response) => {
    const s = ctx.tracker.snapshot();
    res.json({
      uptime_seconds: s.uptimeSeconds,
      hits_received: s.hitsReceived,
      hits_stored: s.hitsStored,
      hits_rejected: s.hitsRejected,
      bytes_received: s.bytesReceived,
      bytes_stored: s.bytesStored,
      batches_received: s.batchesReceived,
      heartbeats_received: s.heartbeatsReceived,
      storage_errors: s.storageErrors,
      queue_depth: s.queueDepth,
      queue_max_depth_ever: s.queueMaxDepth,
      active_devices: {
        total: s.activeDevices.total,
        realtime: s.activeDevices.realtime,
        batch: s.activeDevices.batch,
        window_seconds: s.activeDevices.windowSeconds,
      },
    });
  });

  /** GET /api/v1/config — server-controlled parameters fetched by the app on startup */
  router.get('/config', (_req: Request, res: Response) => {
    const { limits } = ctx.config;
    res.json({
      min_app_version: 1,
      latest_app_version: 1,
      min_protocol_version: MIN_PROTOCOL_VERSION,
      update_urgency: 'none',
      max_waveform_samples: limits.maxWaveformSamples,
      max_hits_per_hour: limits.maxHitsPerDevicePerHour,
      max_batch_size: limits.maxBatchSize,
    });
  });

  return router;
}
