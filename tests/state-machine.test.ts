import { describe, it, expect } from 'vitest';
import { canTransition, checkTransition, isTerminal } from '../src/tasks/state-machine.js';
import type { TaskStatus } from '../src/core/types.js';

const ALL: TaskStatus[] = ['Pending', 'InProgress', 'Completed', 'Failed', 'Cancelled'];

describe('task state machine', () => {
  it('marks exactly Completed, Failed and Cancelled as terminal', () => {
    expect(ALL.filter(isTerminal)).toEqual(['Completed', 'Failed', 'Cancelled']);
  });

  it('allows Pending to move anywhere forward', () => {
    expect(ALL.filter(to => canTransition('Pending', to))).toEqual(['InProgress', 'Completed', 'Failed', 'Cancelled']);
  });

  it('never moves back to Pending', () => {
    expect(ALL.some(from => canTransition(from, 'Pending'))).toBe(false);
  });

  it('has no way out of a terminal state', () => {
    for (const from of ['Completed', 'Failed', 'Cancelled'] as const) {
      expect(ALL.some(to => canTransition(from, to))).toBe(false);
    }
  });

  it('explains a refused transition', () => {
    const result = checkTransition('task_1', 'Completed', 'Failed');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('InvalidTransition');
    expect(result.error.message).toBe('Task task_1 cannot move from Completed to Failed');
  });
});
