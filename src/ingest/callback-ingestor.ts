/**
 * Callback Ingestor.
 *
 * Handles the provider's result webhook:
 *
 *   1. decode the payload; unknown or missing task ids are ignored
 *   2. provider failure or empty result -> FAILED
 *   3. download the first result URL into a scoped temp directory
 *   4. upload it as the original artifact
 *   5-6. build and publish the v1/v2 job descriptors
 *   7. QUEUED -> QUEUED_FOR_AI
 *
 * Any error in 3-6 marks the task FAILED. The ingestor never throws: the
 * route acknowledges every delivery with `{ code: 200 }` because the
 * provider retries non-2xx answers and a retry cannot fix a broken download
 * or an unreachable queue. Operators find failures in the log by `taskId`
 * and `stage`.
 *
 * A redelivered callback is processed again in full. Uploads overwrite the
 * same key but jobs are enqueued twice. Callbacks for a task that is already
 * FAILED are ignored, so a FAILED registry entry never has jobs in flight
 * from a later delivery.
 */

import path from 'path';
import { v4 as uuid } from 'uuid';
import { TaskRegistry } from '../registry/task-registry';
import { ObjectStorage } from '../storage/object-storage';
import { withTempDir } from '../storage/temp-dir';
import { JobFanoutProducer } from '../queue/producer';
import { downloadAsset } from '../provider/download';
import { FetchFn } from '../provider/client';
import { parseCallbackPayload, judgeCallback } from '../domain/callback-payload';
import { CONTENT_TYPES, artifactKey } from '../domain/artifact';
import { JobDescriptor, buildJobDescriptors } from '../domain/job';
import { RegistryStatus, TaskStatus } from '../domain/task';
import { Logger, logger as rootLogger, errorContext } from '../logger';

export type IngestStage = 'download' | 'persist' | 'publish';

export type IngestOutcome =
  | { kind: 'ignored'; reason: 'missing-task-id' | 'unknown-task' | 'already-failed'; taskId: string | null }
  | { kind: 'failed'; taskId: string; stage: IngestStage | 'callback'; reason: string }
  | { kind: 'queued'; taskId: string; inputKey: string; jobs: JobDescriptor[] };

export interface CallbackIngestorOptions {
  registry: TaskRegistry;
  storage: ObjectStorage;
  producer: JobFanoutProducer;
  downloadTimeoutMs: number;
  fetchFn?: FetchFn;
  logger?: Logger;
}

export class CallbackIngestor {
  private log: Logger;

  constructor(private options: CallbackIngestorOptions) {
    this.log = (options.logger ?? rootLogger).child({ module: 'callback' });
  }

  async ingest(payload: unknown): Promise<IngestOutcome> {
    const deliveryId = `cb_${uuid()}`;
    const parsed = parseCallbackPayload(payload);

    if (!parsed.taskId) {
      this.log.warn('Callback without task id ignored', { deliveryId });
      return { kind: 'ignored', reason: 'missing-task-id', taskId: null };
    }

    const task = this.options.registry.get(parsed.taskId);
    if (!task) {
      this.log.info('Callback for unknown task ignored', { deliveryId, taskId: parsed.taskId });
      return { kind: 'ignored', reason: 'unknown-task', taskId: parsed.taskId };
    }

    const { taskId, userId } = task;
    const log = this.log.child({ deliveryId, taskId, userId });

    if (task.status === TaskStatus.Failed) {
      log.warn('Callback for failed task ignored', { failureReason: task.failureReason });
      return { kind: 'ignored', reason: 'already-failed', taskId };
    }

    const verdict = judgeCallback(parsed);
    if (verdict.kind === 'failed') {
      log.warn('Generation reported no usable result', { reason: verdict.reason, code: parsed.code });
      await this.settle(taskId, TaskStatus.Failed, log, verdict.reason);
      return { kind: 'failed', taskId, stage: 'callback', reason: verdict.reason };
    }

    const progress: { stage: IngestStage } = { stage: 'download' };
    try {
      const inputKey = artifactKey(userId, taskId, 'original');
      const jobs = await withTempDir('callback', async (dir) => {
        const localPath = path.join(dir, 'original.mp4');
        const bytes = await downloadAsset(verdict.resultUrl, localPath, {
          timeoutMs: this.options.downloadTimeoutMs,
          fetchFn: this.options.fetchFn,
        });
        log.info('Result downloaded', { bytes, encoding: verdict.encoding });

        progress.stage = 'persist';
        await this.options.storage.putFile(inputKey, localPath, CONTENT_TYPES.original);

        progress.stage = 'publish';
        const descriptors = buildJobDescriptors(userId, taskId);
        await this.options.producer.publishAll(descriptors);
        return descriptors;
      });

      await this.settle(taskId, TaskStatus.QueuedForAi, log);
      log.info('Derived jobs queued', { inputKey, variants: jobs.map((job) => job.variant) });
      return { kind: 'queued', taskId, inputKey, jobs };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.error('Callback ingestion failed', { stage: progress.stage, ...errorContext(err) });
      await this.settle(taskId, TaskStatus.Failed, log, `${progress.stage}: ${reason}`);
      return { kind: 'failed', taskId, stage: progress.stage, reason };
    }
  }

  /** Apply a state-machine transition; a refused one is logged and ignored. */
  private async settle(taskId: string, target: RegistryStatus, log: Logger, reason?: string): Promise<void> {
    const outcome = await this.options.registry.transition(taskId, target, reason);
    if (outcome.applied) return;
    if (outcome.reason === 'invalid-transition') {
      log.warn('Task already settled; status kept', { status: outcome.task.status, requested: target });
    } else {
      log.warn('Task vanished before status update', { requested: target });
    }
  }
}
