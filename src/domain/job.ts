/**
 * Derived-job descriptors.
 *
 * One successfully ingested callback yields exactly one descriptor per
 * variant, all reading the same original. The external worker pool consumes
 * them as snake_case JSON from a Redis list.
 */

import { Variant, VARIANTS, VARIANT_KIND, artifactKey } from './artifact';

export interface JobDescriptor {
  taskId: string;
  userId: string;
  inputKey: string;
  outputKey: string;
  variant: Variant;
}

/** Wire shape consumed by the workers. */
export interface JobMessage {
  task_id: string;
  user_id: string;
  input_key: string;
  output_key: string;
  variant: Variant;
}

export function buildJobDescriptors(userId: string, taskId: string): JobDescriptor[] {
  const inputKey = artifactKey(userId, taskId, 'original');
  return VARIANTS.map((variant) => ({
    taskId,
    userId,
    inputKey,
    outputKey: artifactKey(userId, taskId, VARIANT_KIND[variant]),
    variant,
  }));
}

export function toJobMessage(job: JobDescriptor): JobMessage {
  return {
    task_id: job.taskId,
    user_id: job.userId,
    input_key: job.inputKey,
    output_key: job.outputKey,
    variant: job.variant,
  };
}
