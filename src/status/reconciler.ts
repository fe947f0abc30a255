/**
 * Status Reconciler.
 *
 * Two independent sources answer "what is the state of task T":
 *
 *   - object storage: durable, eventually consistent, the only evidence
 *     that the external workers finished a variant;
 *   - the task registry: volatile, the only evidence that a request started
 *     or that the provider reported failure before any artifact existed.
 *
 * Precedence, highest first: both processed variants -> DONE; one -> PARTIAL;
 * then the registry (absent -> PENDING, otherwise its status).
 *
 * Each call lists the user's whole prefix once, so cost grows with the number
 * of objects a user owns. Clients should poll every few seconds at most.
 */

import { ObjectStorage } from '../storage/object-storage';
import { TaskRegistry } from '../registry/task-registry';
import { TaskStatus, TaskStatusReport } from '../domain/task';
import { VideoSummary, groupVideoNames, hasVideoArtifact, userPrefix } from '../domain/artifact';

export class StatusReconciler {
  constructor(private storage: ObjectStorage, private registry: TaskRegistry) {}

  async status(taskId: string, userId: string): Promise<TaskStatusReport> {
    const names = new Set(await this.storage.list(userPrefix(userId)));
    const v1 = hasVideoArtifact(names, taskId, 'processed');
    const v2 = hasVideoArtifact(names, taskId, 'processed_v2');

    if (v1 && v2) {
      return { taskId, status: TaskStatus.Done };
    }
    if (v1 || v2) {
      return { taskId, status: TaskStatus.Partial, done: { v1, v2 } };
    }

    const task = this.registry.get(taskId);
    if (!task || task.userId !== userId) {
      return { taskId, status: TaskStatus.Pending };
    }
    return { taskId, status: task.status };
  }

  /** Every task the user has stored artifacts for. */
  async listVideos(userId: string): Promise<VideoSummary[]> {
    const names = await this.storage.list(userPrefix(userId));
    return groupVideoNames(names);
  }
}
