import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { buildHitWireSchema } from '@pothole-radar/adapters';
import { PROTOCOL_TOO_OLD_MARKER } from '@pothole-radar/domain';
import type { ClientMessage } from '@pothole-radar/domain';
import type { AppContext } from '../context.js';

export interface MessageLimits {
  maxWaveformSamples: number;
  maxBatchSize: number;
}

/** snake_case JSON ClientMessage → domain ClientMessage. */
export function buildClientMessageSchema(limits: MessageLimits) {
  const hit = buildHitWireSchema({ maxWaveformSamples: limits.maxWaveformSamples });
  return z
    .object({
      protocol_version: z.number().int().default(1),
      device_id: z.string().default(''),
      app_version: z.number().int().default(0),
      hit: hit.optional(),
      batch: z.object({ hits: z.array(hit).max(limits.maxBatchSize).default([]) }).optional(),
      heartbeat: z
        .object({
          timestamp_ms: z.number().int().default(0),
          pending_hits: z.number().int().min(0).default(0),
        })
        .optional(),
    })
    .transform(
      (w): ClientMessage => ({
        protocolVersion: w.protocol_version,
        deviceId: w.device_id,
        appVersion: w.app_version,
        hit: w.hit,
        hits: w.batch?.hits,
        heartbeat: w.heartbeat && { timestampMs: w.heartbeat.timestamp_ms, pendingHits: w.heartbeat.pending_hits },
      }),
    );
}

export function createHitsRouter(ctx: AppContext): Router {
  const router = Router();
  const messageSchema = buildClientMessageSchema(ctx.config.limits);

  /** POST /api/v1/hits — single hit, batch or heartbeat from the mobile app */
  router.post(
    '/hits',
    express.raw({ type: () => true, limit: '1mb' }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const contentType = req.get('content-type') ?? 'application/json';
        if (contentType.includes('protobuf')) {
          res.status(415).json({ accepted: false, error: 'protobuf not yet supported, use application/json', hits_stored: 0 });
          return;
        }

        const body: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
        let json: unknown;
        try {
          json = JSON.parse(body.toString('utf8'));
        } catch {
          res.status(400).json({ accepted: false, error: 'invalid JSON', hits_stored: 0 });
          return;
        }

        const message = messageSchema.parse(json);
        const result = await ctx.processor.process(message, body.length);

        let status = result.accepted ? 200 : 422;
        if (result.error.includes(PROTOCOL_TOO_OLD_MARKER)) status = 426;

        res.status(status).json({ accepted: result.accepted, error: result.error, hits_stored: result.storedCount });
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
