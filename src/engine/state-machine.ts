/**
 * Task state machine.
 *
 * QUEUED --(result present)--> QUEUED_FOR_AI
 * QUEUED --(failure / empty result)--> FAILED
 *
 * Both targets are terminal. Asking for the state a task is already in is
 * accepted and reported as unchanged, so redelivered callbacks stay quiet.
 */

import { RegistryStatus, TaskStatus, VALID_TASK_TRANSITIONS } from '../domain/task';
import { TypedError, invalidTransitionError } from '../domain/errors';

export interface TransitionResult {
  success: boolean;
  /** False when the task was already in the target state. */
  changed: boolean;
  newStatus?: RegistryStatus;
  error?: TypedError;
}

export function transitionTaskStatus(
  taskId: string,
  current: RegistryStatus,
  target: RegistryStatus,
): TransitionResult {
  if (current === target) {
    return { success: true, changed: false, newStatus: current };
  }
  if (!VALID_TASK_TRANSITIONS[current].includes(target)) {
    return {
      success: false,
      changed: false,
      error: invalidTransitionError(taskId, current, target),
    };
  }
  return { success: true, changed: true, newStatus: target };
}

export function isTerminalTaskStatus(status: RegistryStatus): boolean {
  return status === TaskStatus.QueuedForAi || status === TaskStatus.Failed;
}
