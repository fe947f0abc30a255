/**
 * Task Registry.
 *
 * Volatile map from provider task id to in-flight task state. It is an
 * advisory hint for the status reconciler, not the system of record: it is
 * empty after every restart and never evicts. Construct one per process and
 * inject it.
 *
 * Reads return copies and never wait. Every read-modify-write runs under a
 * per-task lock so a callback and a concurrent status change cannot lose
 * each other's update.
 */

import { CreateTaskInput, RegistryStatus, Task, TaskStatus } from '../domain/task';
import { ServiceError, TypedError, invalidTransitionError, taskConflictError } from '../domain/errors';
import { transitionTaskStatus } from '../engine/state-machine';
import { KeyedLock } from './keyed-lock';

export type TransitionOutcome =
  | { applied: true; changed: boolean; task: Task }
  | { applied: false; reason: 'unknown-task' }
  | { applied: false; reason: 'invalid-transition'; task: Task; error: TypedError };

export class TaskRegistry {
  private tasks = new Map<string, Task>();
  private lock = new KeyedLock();

  constructor(private now: () => Date = () => new Date()) {}

  /** Register a freshly submitted task as QUEUED. */
  async create(input: CreateTaskInput): Promise<Task> {
    return this.lock.run(input.taskId, () => {
      if (this.tasks.has(input.taskId)) {
        throw new ServiceError(taskConflictError(input.taskId));
      }
      const timestamp = this.now().toISOString();
      const task: Task = {
        taskId: input.taskId,
        userId: input.userId,
        prompt: input.prompt,
        status: TaskStatus.Queued,
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      this.tasks.set(task.taskId, task);
      return { ...task };
    });
  }

  get(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : undefined;
  }

  /**
   * Overwrite a task's status without consulting the state machine.
   * Returns null for an unknown task.
   */
  async updateStatus(taskId: string, status: RegistryStatus, reason?: string): Promise<Task | null> {
    return this.lock.run(taskId, () => {
      const task = this.tasks.get(taskId);
      if (!task) return null;
      this.apply(task, status, reason);
      return { ...task };
    });
  }

  /** Move a task to `target` if the state machine allows it. */
  async transition(taskId: string, target: RegistryStatus, reason?: string): Promise<TransitionOutcome> {
    return this.lock.run(taskId, (): TransitionOutcome => {
      const task = this.tasks.get(taskId);
      if (!task) return { applied: false, reason: 'unknown-task' };

      const result = transitionTaskStatus(taskId, task.status, target);
      if (!result.success) {
        return {
          applied: false,
          reason: 'invalid-transition',
          task: { ...task },
          error: result.error ?? invalidTransitionError(taskId, task.status, target),
        };
      }
      if (result.changed) {
        this.apply(task, target, reason);
      }
      return { applied: true, changed: result.changed, task: { ...task } };
    });
  }

  get size(): number {
    return this.tasks.size;
  }

  private apply(task: Task, status: RegistryStatus, reason?: string): void {
    task.status = status;
    task.updatedAt = this.now().toISOString();
    if (status === TaskStatus.Failed) {
      task.failureReason = reason;
    } else {
      delete task.failureReason;
    }
  }
}
