/**
 * Application configuration.
 * Read once at startup from the environment (.env is loaded by dotenv).
 */

import { z } from 'zod';

export type StorageBackend = 'file' | 'postgres' | 'memory';

const envSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  NODE_ENV: z.string().default('development'),
  CORS_ORIGIN: z.string().default('*'),
  LOG_FORMAT: z.string().default('combined'),

  QUEUE_MAX_SIZE: z.coerce.number().int().min(1).default(10_000),
  QUEUE_PUT_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),

  STORAGE_BACKEND: z.enum(['file', 'postgres', 'memory']).default('file'),
  STORAGE_BASE_DIR: z.string().default('data/incoming'),
  DATABASE_URL: z.string().optional(),

  ACTIVE_WINDOW_SECONDS: z.coerce.number().positive().default(120),
  MAX_WAVEFORM_SAMPLES: z.coerce.number().int().min(1).default(150),
  MAX_BATCH_SIZE: z.coerce.number().int().min(1).default(100),
  MAX_HITS_PER_DEVICE_PER_HOUR: z.coerce.number().int().min(0).default(600),
  CLUSTER_RADIUS_M: z.coerce.number().positive().default(15),
});

export interface AppConfig {
  server: { host: string; port: number; env: string; corsOrigin: string; logFormat: string };
  queue: { maxSize: number; putTimeoutMs: number };
  storage: { backend: StorageBackend; baseDir: string; databaseUrl?: string };
  limits: {
    activeWindowSeconds: number;
    maxWaveformSamples: number;
    maxBatchSize: number;
    /** 0 disables the per-device budget. */
    maxHitsPerDevicePerHour: number;
  };
  clustering: { radiusM: number };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = envSchema.parse(env);
  if (e.STORAGE_BACKEND === 'postgres' && !e.DATABASE_URL) {
    throw new Error('DATABASE_URL is required when STORAGE_BACKEND=postgres');
  }
  return {
    server: { host: e.HOST, port: e.PORT, env: e.NODE_ENV, corsOrigin: e.CORS_ORIGIN, logFormat: e.LOG_FORMAT },
    queue: { maxSize: e.QUEUE_MAX_SIZE, putTimeoutMs: e.QUEUE_PUT_TIMEOUT_MS },
    storage: { backend: e.STORAGE_BACKEND, baseDir: e.STORAGE_BASE_DIR, databaseUrl: e.DATABASE_URL },
    limits: {
      activeWindowSeconds: e.ACTIVE_WINDOW_SECONDS,
      maxWaveformSamples: e.MAX_WAVEFORM_SAMPLES,
      maxBatchSize: e.MAX_BATCH_SIZE,
      maxHitsPerDevicePerHour: e.MAX_HITS_PER_DEVICE_PER_HOUR,
    },
    clustering: { radiusM: e.CLUSTER_RADIUS_M },
  };
}
