/**
 * Job Fan-out Producer.
 *
 * Publishes derived-job descriptors for the external worker pool. Publishing
 * a batch is not transactional: descriptors go out one at a time and the
 * first failure stops the batch with the earlier ones already enqueued. The
 * status reconciler reports each variant independently, so a half-published
 * batch shows up as PARTIAL or never completes rather than being hidden.
 */

import { JobDescriptor, toJobMessage } from '../domain/job';
import { ServiceError, isServiceError, queueUnavailableError } from '../domain/errors';
import { JobQueue } from './job-queue';
import { Logger, logger as rootLogger, errorContext } from '../logger';

export class JobFanoutProducer {
  private log: Logger;

  constructor(private queue: JobQueue, log: Logger = rootLogger) {
    this.log = log.child({ module: 'fanout' });
  }

  async publish(job: JobDescriptor): Promise<void> {
    const message = JSON.stringify(toJobMessage(job));
    try {
      await this.queue.push(message);
    } catch (err) {
      this.log.error('Job publish failed', {
        taskId: job.taskId,
        variant: job.variant,
        ...errorContext(err),
      });
      const reason = err instanceof Error ? err.message : 'queue rejected the write';
      throw new ServiceError(
        queueUnavailableError(`Could not enqueue ${job.variant} job: ${reason}`, job.taskId),
        { cause: err },
      );
    }
    this.log.debug('Job published', { taskId: job.taskId, variant: job.variant, outputKey: job.outputKey });
  }

  /**
   * Publish in order. On failure the thrown error records how many
   * descriptors were already enqueued in `details.published`.
   */
  async publishAll(jobs: JobDescriptor[]): Promise<void> {
    let published = 0;
    for (const job of jobs) {
      try {
        await this.publish(job);
      } catch (err) {
        if (isServiceError(err, 'QUEUE.')) {
          err.typedError.details = { ...err.typedError.details, published, total: jobs.length };
        }
        throw err;
      }
      published++;
    }
  }
}
