/**
 * Video API routes.
 *
 * POST /generate            Submit a prompt to the provider
 * POST /callback            Provider result webhook (unauthenticated, always 200)
 * GET  /list                The caller's stored videos grouped by task
 * GET  /status/:taskId      Reconciled task status
 * GET  /stream/:taskId      Stream a video (?type=original|processed|processed_v2)
 * GET  /thumb/:taskId.jpg   Stream the thumbnail, deriving it on first request
 */

import express, { Router, Response, NextFunction } from 'express';
import { pipeline } from 'stream/promises';
import { z } from 'zod';
import { AuthConfig } from '../config';
import { ProviderClient } from '../provider/client';
import { CallbackIngestor } from '../ingest/callback-ingestor';
import { StatusReconciler } from '../status/reconciler';
import { ArtifactStream, DeliveryService } from '../delivery/delivery';
import { ArtifactKind, VideoKind, VideoSummary, isVideoKind } from '../domain/artifact';
import { TaskStatus, TaskStatusReport } from '../domain/task';
import { ServiceError, validationError } from '../domain/errors';
import { AuthenticatedRequest, callerId, lenientJson, requireIdentity } from './middleware';
import { rateLimit } from './rate-limit';
import { logger, errorContext } from '../logger';

const log = logger.child({ module: 'api' });

const TASK_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;
const MAX_PROMPT_CHARS = 4000;

const generateBody = z.object({
  prompt: z.string().trim().min(1, 'prompt must not be empty').max(MAX_PROMPT_CHARS),
});

export interface VideoRouteDeps {
  auth: AuthConfig;
  providerClient: ProviderClient;
  ingestor: CallbackIngestor;
  reconciler: StatusReconciler;
  delivery: DeliveryService;
  statusRateLimitPerMinute: number;
}

export type StatusResponse =
  | { task_id: string; status: Exclude<TaskStatus, TaskStatus.Partial> }
  | { task_id: string; status: TaskStatus.Partial; done: { v1: boolean; v2: boolean } };

export function toStatusResponse(report: TaskStatusReport): StatusResponse {
  if (report.status === TaskStatus.Partial) {
    return { task_id: report.taskId, status: report.status, done: { ...report.done } };
  }
  return { task_id: report.taskId, status: report.status };
}

function toVideoRow(summary: VideoSummary) {
  return {
    task_id: summary.taskId,
    has_original: summary.hasOriginal,
    has_processed: summary.hasProcessed,
    has_processed_v2: summary.hasProcessedV2,
  };
}

function taskIdParam(value: string): string {
  if (!TASK_ID_PATTERN.test(value)) {
    throw new ServiceError(validationError('Invalid task id', { taskId: value }));
  }
  return value;
}

function videoKindParam(value: unknown): VideoKind {
  if (value === undefined) return 'original';
  if (!isVideoKind(value)) {
    throw new ServiceError(
      validationError('type must be one of original, processed, processed_v2', { type: String(value) }),
    );
  }
  return value;
}

/** Pipe an artifact to the response in chunks. */
async function sendStream(res: Response, stream: ArtifactStream): Promise<void> {
  res.status(200);
  res.set('Content-Type', stream.contentType);
  if (stream.contentLength !== undefined) {
    res.set('Content-Length', String(stream.contentLength));
  }
  try {
    await pipeline(stream.body, res);
  } catch (err) {
    // Headers are gone; the only option left is to cut the connection.
    log.warn('Artifact stream interrupted', { key: stream.key, ...errorContext(err) });
    res.destroy();
  }
}

export function createVideoRoutes(deps: VideoRouteDeps): Router {
  const router = Router();
  const authenticate = requireIdentity(deps.auth);
  const statusLimiter = rateLimit({ maxRequests: deps.statusRateLimitPerMinute, windowMs: 60_000 });

  /**
   * POST /callback
   * Registered before the JSON parser so a malformed body is still acknowledged.
   */
  router.post('/callback', lenientJson(), async (req, res) => {
    try {
      await deps.ingestor.ingest(req.body);
    } catch (err) {
      log.error('Callback handler failed', errorContext(err));
    }
    res.status(200).json({ code: 200 });
  });

  router.use(express.json({ limit: '1mb' }));

  /**
   * POST /generate
   * Submit a prompt; the task starts QUEUED.
   */
  router.post('/generate', authenticate, async (req: AuthenticatedRequest, res, next: NextFunction) => {
    try {
      const parsed = generateBody.safeParse(req.body);
      if (!parsed.success) {
        throw new ServiceError(
          validationError('Invalid generate request', {
            issues: parsed.error.issues.map((issue) => issue.message),
          }),
        );
      }
      const taskId = await deps.providerClient.submit(parsed.data.prompt, callerId(req));
      res.status(201).json({ task_id: taskId, status: TaskStatus.Queued });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /list
   * Stored videos grouped by task, with per-variant availability.
   */
  router.get('/list', authenticate, async (req: AuthenticatedRequest, res, next: NextFunction) => {
    try {
      const videos = await deps.reconciler.listVideos(callerId(req));
      res.json({ videos: videos.map(toVideoRow) });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /status/:taskId
   * Storage evidence first, then the registry hint.
   */
  router.get('/status/:taskId', authenticate, statusLimiter, async (req: AuthenticatedRequest, res, next: NextFunction) => {
    try {
      const taskId = taskIdParam(req.params.taskId);
      const report = await deps.reconciler.status(taskId, callerId(req));
      res.json(toStatusResponse(report));
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /stream/:taskId?type=original|processed|processed_v2
   */
  router.get('/stream/:taskId', authenticate, async (req: AuthenticatedRequest, res, next: NextFunction) => {
    let stream: ArtifactStream;
    try {
      const taskId = taskIdParam(req.params.taskId);
      const kind: ArtifactKind = videoKindParam(req.query.type);
      stream = await deps.delivery.openStream(callerId(req), taskId, kind);
    } catch (err) {
      next(err);
      return;
    }
    await sendStream(res, stream);
  });

  /**
   * GET /thumb/:taskId.jpg
   */
  router.get('/thumb/:taskId.jpg', authenticate, async (req: AuthenticatedRequest, res, next: NextFunction) => {
    let stream: ArtifactStream;
    try {
      const taskId = taskIdParam(req.params.taskId);
      stream = await deps.delivery.openStream(callerId(req), taskId, 'thumbnail');
    } catch (err) {
      next(err);
      return;
    }
    await sendStream(res, stream);
  });

  return router;
}
