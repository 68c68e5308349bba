import type { Result, TaskStatus } from '../core/types.js';
import { fail, ok } from '../core/types.js';

/**
 * Allowed forward moves. Pending may jump straight to a terminal state: a
 * delegate can complete or reject work it never formally accepted.
 */
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  Pending: ['InProgress', 'Completed', 'Failed', 'Cancelled'],
  InProgress: ['Completed', 'Failed', 'Cancelled'],
  Completed: [],
  Failed: [],
  Cancelled: [],
};

export function isTerminal(status: TaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function checkTransition(taskId: string, from: TaskStatus, to: TaskStatus): Result<void> {
  if (!canTransition(from, to)) {
    return fail('InvalidTransition', `Task ${taskId} cannot move from ${from} to ${to}`);
  }
  return ok(undefined);
}
