import 'dotenv/config';
import { createServer } from 'http';
import { closePool } from '@pothole-radar/adapters';
import { loadConfig } from './config/app-config.js';
import { createAppContext, nextRecordId, openStorage } from './context.js';
import { buildApp } from './app.js';

async function main() {
  const config = loadConfig();
  console.log(
    `[server] starting env=${config.server.env} storage=${config.storage.backend} queue_max_size=${config.queue.maxSize}`,
  );

  const storage = await openStorage(config);
  const firstRecordId = await nextRecordId(storage);
  const ctx = createAppContext(config, storage, { firstRecordId });
  console.log(`[server] storage ready, next record id ${firstRecordId}`);

  ctx.consumer.start();

  const httpServer = createServer(buildApp(ctx));
  httpServer.listen(config.server.port, config.server.host, () => {
    console.log(`[server] listening on http://${config.server.host}:${config.server.port}`);
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('[server] shutting down...');
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    await ctx.consumer.stop();
    const flushed = await ctx.consumer.drain();
    if (flushed > 0) console.log(`[server] flushed ${flushed} queued record(s)`);
    if (config.storage.backend === 'postgres') await closePool();
    console.log('[server] stopped');
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
