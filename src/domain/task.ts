/**
 * Task domain model.
 *
 * One prompt-to-video request, keyed by the identifier the provider assigned
 * at submission. Tasks live only in the in-memory registry; after a restart
 * their progress is recovered from object storage alone.
 */

/** Every status a client can observe. */
export enum TaskStatus {
  Queued = 'QUEUED',
  QueuedForAi = 'QUEUED_FOR_AI',
  Partial = 'PARTIAL',
  Done = 'DONE',
  Failed = 'FAILED',
  Pending = 'PENDING',
}

/** The subset the registry ever stores. The rest are derived at read time. */
export type RegistryStatus = TaskStatus.Queued | TaskStatus.QueuedForAi | TaskStatus.Failed;

/** Valid registry transitions. Re-entering the current state is handled separately. */
export const VALID_TASK_TRANSITIONS: Record<RegistryStatus, RegistryStatus[]> = {
  [TaskStatus.Queued]: [TaskStatus.QueuedForAi, TaskStatus.Failed],
  [TaskStatus.QueuedForAi]: [],
  [TaskStatus.Failed]: [],
};

export interface Task {
  taskId: string;
  userId: string;
  prompt: string;
  status: RegistryStatus;
  createdAt: string;
  updatedAt: string;
  /** Set when the task moved to FAILED. */
  failureReason?: string;
}

export interface CreateTaskInput {
  taskId: string;
  userId: string;
  prompt: string;
}

/** Per-variant completion flags reported alongside PARTIAL. */
export interface VariantProgress {
  v1: boolean;
  v2: boolean;
}

/** Reconciled answer to "what is the state of task T". */
export type TaskStatusReport =
  | {
      taskId: string;
      status: Exclude<TaskStatus, TaskStatus.Partial>;
    }
  | {
      taskId: string;
      status: TaskStatus.Partial;
      done: VariantProgress;
    };
