/**
 * reelgen: prompt-to-video task orchestration.
 *
 * Entry point for the API server. Importing this module exposes the library
 * surface without starting anything; running it directly starts the server.
 */

import 'dotenv/config';
import { Server } from 'http';
import { loadConfig } from './config';
import { createApp, createAppContext } from './server';
import { logger, setLogLevel, errorContext } from './logger';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const context = createAppContext(config);
  const app = createApp(context);

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => resolve(listening));
  });
  logger.info('Server listening', { port: config.port, callbackUrl: config.provider.callbackUrl });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close((err) => {
      if (err) logger.error('HTTP server close failed', errorContext(err));
      context.queue
        .close()
        .catch((closeErr: unknown) => logger.error('Queue close failed', errorContext(closeErr)))
        .finally(() => process.exit(0));
    });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Startup failed', errorContext(err));
    process.exit(1);
  });
}

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOverrides } from './server';
export { loadConfig } from './config';
export type { AppConfig } from './config';
export * from './domain';
export { TaskRegistry } from './registry/task-registry';
export { ProviderClient } from './provider/client';
export { CallbackIngestor } from './ingest/callback-ingestor';
export type { IngestOutcome } from './ingest/callback-ingestor';
export { JobFanoutProducer } from './queue/producer';
export { RedisJobQueue } from './queue/redis-queue';
export { MemoryJobQueue } from './queue/memory-queue';
export { StatusReconciler } from './status/reconciler';
export { DeliveryService } from './delivery/delivery';
export { S3ObjectStorage } from './storage/s3-storage';
export { MemoryObjectStorage } from './storage/memory-storage';
