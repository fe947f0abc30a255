/**
 * Express server configuration.
 *
 * Builds the application context (registry, storage, queue and the services
 * over them) and mounts the video API. Every collaborator can be overridden,
 * which is how tests swap in the in-memory storage and queue.
 */

import express from 'express';
import { AppConfig } from './config';
import { TaskRegistry } from './registry/task-registry';
import { ObjectStorage } from './storage/object-storage';
import { S3ObjectStorage, createS3Client } from './storage/s3-storage';
import { JobQueue } from './queue/job-queue';
import { RedisJobQueue } from './queue/redis-queue';
import { JobFanoutProducer } from './queue/producer';
import { FetchFn, ProviderClient } from './provider/client';
import { CallbackIngestor } from './ingest/callback-ingestor';
import { StatusReconciler } from './status/reconciler';
import { DeliveryService } from './delivery/delivery';
import { FfmpegFrameExtractor, FrameExtractor } from './delivery/frame-extractor';
import { createVideoRoutes } from './api/videos';
import { errorHandler } from './api/middleware';
import { logger } from './logger';

export const VERSION = '0.1.0';

const startTime = Date.now();

export interface AppContext {
  config: AppConfig;
  registry: TaskRegistry;
  storage: ObjectStorage;
  queue: JobQueue;
  producer: JobFanoutProducer;
  providerClient: ProviderClient;
  ingestor: CallbackIngestor;
  reconciler: StatusReconciler;
  delivery: DeliveryService;
}

export interface AppContextOverrides {
  registry?: TaskRegistry;
  storage?: ObjectStorage;
  queue?: JobQueue;
  fetchFn?: FetchFn;
  frameExtractor?: FrameExtractor;
}

export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const registry = overrides.registry ?? new TaskRegistry();
  const storage =
    overrides.storage ?? new S3ObjectStorage(createS3Client(config.storage), config.storage.bucket);
  const queue = overrides.queue ?? RedisJobQueue.fromUrl(config.queue.redisUrl, config.queue.name);
  const frameExtractor =
    overrides.frameExtractor ??
    new FfmpegFrameExtractor(config.thumbnails.ffmpegPath, config.thumbnails.offset);

  const producer = new JobFanoutProducer(queue);
  const providerClient = new ProviderClient(config.provider, registry, overrides.fetchFn);
  const ingestor = new CallbackIngestor({
    registry,
    storage,
    producer,
    downloadTimeoutMs: config.provider.downloadTimeoutMs,
    fetchFn: overrides.fetchFn,
  });

  return {
    config,
    registry,
    storage,
    queue,
    producer,
    providerClient,
    ingestor,
    reconciler: new StatusReconciler(storage, registry),
    delivery: new DeliveryService(storage, frameExtractor),
  };
}

export function createApp(ctx: AppContext): express.Application {
  const app = express();
  app.disable('x-powered-by');

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      trackedTasks: ctx.registry.size,
    });
  });

  app.use(
    '/api/video',
    createVideoRoutes({
      auth: ctx.config.auth,
      providerClient: ctx.providerClient,
      ingestor: ctx.ingestor,
      reconciler: ctx.reconciler,
      delivery: ctx.delivery,
      statusRateLimitPerMinute: ctx.config.statusRateLimitPerMinute,
    }),
  );

  app.use(errorHandler);

  logger.debug('Application assembled', { callbackUrl: ctx.config.provider.callbackUrl });
  return app;
}
