/**
 * Task Ledger — lifecycle bookkeeping for delegated work.
 *
 * A task is committed as soon as its TaskDelegation envelope is in the
 * delegate's mailbox, before the delivery notification goes out. Later transitions are authoritative locally: the
 * envelopes they send back and the reputation calls they make are
 * best-effort and never undo a transition.
 */

import type {
  DelegateParams,
  EnvelopeDraft,
  Result,
  Task,
  TaskStatus,
} from '../core/types.js';
import { fail, ok } from '../core/types.js';
import type { ReputationCollaborator } from '../collaborators/types.js';
import type { MessageBus } from '../bus/message-bus.js';
import type { Logger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import type { SideEffectGuard } from '../core/side-effects.js';
import { generateMessageId, generateTaskId } from '../core/ids.js';
import { checkTransition } from './state-machine.js';

export interface TaskLedgerDeps {
  bus: MessageBus;
  reputation?: ReputationCollaborator;
  sideEffects: SideEffectGuard;
  logger: Logger;
  metrics: MetricsCollector;
  completionReward?: number;
  failurePenalty?: number;
  now?: () => number;
}

export class TaskLedger {
  private tasks = new Map<string, Task>();
  private bus: MessageBus;
  private reputation?: ReputationCollaborator;
  private sideEffects: SideEffectGuard;
  private logger: Logger;
  private metrics: MetricsCollector;
  private completionReward: number;
  private failurePenalty: number;
  private now: () => number;

  constructor(deps: TaskLedgerDeps) {
    this.bus = deps.bus;
    this.reputation = deps.reputation;
    this.sideEffects = deps.sideEffects;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.completionReward = deps.completionReward ?? 10;
    this.failurePenalty = deps.failurePenalty ?? 5;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Create a Pending task and send its TaskDelegation envelope. If the bus
   * rejects the envelope the task is not recorded.
   */
  async delegate(params: DelegateParams): Promise<Result<Task>> {
    if (!params.name || params.name.trim().length === 0) {
      return fail('InvalidArgument', 'Task name is required');
    }

    const createdAt = this.timestamp();
    const task: Task = {
      taskId: generateTaskId(),
      fromAgent: params.from,
      toAgent: params.to,
      linkedMessageId: generateMessageId(),
      name: params.name,
      description: params.description,
      parameters: { ...params.parameters },
      requiredCapabilities: dedupe(params.requiredCapabilities ?? []),
      status: 'Pending',
      createdAt,
      updatedAt: createdAt,
      resultData: {},
    };

    const sent = await this.bus.send({
      id: task.linkedMessageId,
      from: task.fromAgent,
      to: task.toAgent,
      kind: 'TaskDelegation',
      content: task.description,
      payload: {
        task_id: task.taskId,
        task_name: task.name,
        task_description: task.description,
        task_parameters: task.parameters,
        required_capabilities: task.requiredCapabilities,
      },
      createdAt,
    }, {
      onEnqueued: () => {
        this.tasks.set(task.taskId, task);
        this.metrics.counter('tasks.transitions', { to: 'Pending' });
      },
    });
    if (!sent.ok) {
      this.logger.info('Delegation not committed', { taskId: task.taskId, reason: sent.error.code });
      return sent;
    }

    this.logger.info('Task delegated', { taskId: task.taskId, from: task.fromAgent, to: task.toAgent, name: task.name });
    return ok({ ...task });
  }

  /** Delegate takes the task on: Pending → InProgress. */
  async accept(taskId: string, agentId: string): Promise<Result<Task>> {
    const moved = this.transition(taskId, 'InProgress', task => {
      if (task.toAgent !== agentId) {
        return fail('Forbidden', `Agent ${agentId} is not the delegate of task ${taskId}`);
      }
      return ok(undefined);
    });
    if (!moved.ok) return moved;
    const task = moved.value;

    await this.notifyParty(task, {
      from: task.toAgent,
      to: task.fromAgent,
      kind: 'TaskAcceptance',
      content: `Task '${task.name}' accepted`,
      payload: { task_id: task.taskId, task_name: task.name },
    });
    return ok({ ...task });
  }

  /** Progress report from the delegate while the task is InProgress. */
  async update(taskId: string, agentId: string, progress: string): Promise<Result<Task>> {
    const task = this.tasks.get(taskId);
    if (!task) return fail('NotFound', `Task ${taskId} not found`);
    if (task.toAgent !== agentId) {
      return fail('Forbidden', `Agent ${agentId} is not the delegate of task ${taskId}`);
    }
    if (task.status !== 'InProgress') {
      return fail('InvalidTransition', `Task ${taskId} is ${task.status}; updates need InProgress`);
    }

    task.progress = progress;
    task.updatedAt = this.timestamp();

    await this.notifyParty(task, {
      from: task.toAgent,
      to: task.fromAgent,
      kind: 'TaskUpdate',
      content: progress,
      payload: { task_id: task.taskId, task_name: task.name, status: task.status, progress },
    });
    return ok({ ...task });
  }

  async complete(
    taskId: string,
    resultData: Record<string, unknown> = {},
    notes?: string,
  ): Promise<Result<Task>> {
    const moved = this.transition(taskId, 'Completed', task => {
      task.completedAt = this.timestamp();
      task.completionNotes = notes;
      task.resultData = { ...resultData };
      return ok(undefined);
    });
    if (!moved.ok) return moved;
    const task = moved.value;

    await this.notifyParty(task, {
      from: task.toAgent,
      to: task.fromAgent,
      kind: 'TaskCompletion',
      content: `Task '${task.name}' completed`,
      payload: {
        task_id: task.taskId,
        task_name: task.name,
        completion_notes: notes ?? '',
        result_data: task.resultData,
      },
    });
    await this.adjustReputation(task, this.completionReward, `Completed service: ${task.name} (Task: ${task.taskId})`);

    this.logger.info('Task completed', { taskId: task.taskId, agentId: task.toAgent });
    return ok({ ...task });
  }

  /** Delegate gives up. A Pending task is reported as rejected, an InProgress one as failed. */
  async fail(taskId: string, reason: string): Promise<Result<Task>> {
    const wasPending = this.tasks.get(taskId)?.status === 'Pending';
    const moved = this.transition(taskId, 'Failed', task => {
      task.failureReason = reason;
      task.completedAt = this.timestamp();
      return ok(undefined);
    });
    if (!moved.ok) return moved;
    const task = moved.value;

    await this.notifyParty(task, {
      from: task.toAgent,
      to: task.fromAgent,
      kind: wasPending ? 'TaskRejection' : 'TaskUpdate',
      content: `Task '${task.name}' failed: ${reason}`,
      payload: { task_id: task.taskId, task_name: task.name, status: task.status, reason },
    });
    await this.adjustReputation(task, -this.failurePenalty, `Service failure: ${reason} (Task: ${task.taskId})`);

    this.logger.warn('Task failed', { taskId: task.taskId, agentId: task.toAgent, reason });
    return ok({ ...task });
  }

  /** Delegator withdraws a task that has not reached a terminal state. */
  async cancel(taskId: string, agentId: string, reason = 'Cancelled by delegator'): Promise<Result<Task>> {
    const moved = this.transition(taskId, 'Cancelled', task => {
      if (task.fromAgent !== agentId) {
        return fail('Forbidden', `Agent ${agentId} did not delegate task ${taskId}`);
      }
      task.completedAt = this.timestamp();
      task.failureReason = reason;
      return ok(undefined);
    });
    if (!moved.ok) return moved;
    const task = moved.value;

    await this.notifyParty(task, {
      from: task.fromAgent,
      to: task.toAgent,
      kind: 'TaskUpdate',
      content: `Task '${task.name}' cancelled`,
      payload: { task_id: task.taskId, task_name: task.name, status: task.status, reason },
    });
    return ok({ ...task });
  }

  query(taskId: string): Result<Task> {
    const task = this.tasks.get(taskId);
    if (!task) return fail('NotFound', `Task ${taskId} not found`);
    return ok({ ...task });
  }

  /** Tasks where the agent is either party, in creation order. */
  queryByAgent(agentId: string, status?: TaskStatus): Task[] {
    const results: Task[] = [];
    for (const task of this.tasks.values()) {
      if (task.fromAgent !== agentId && task.toAgent !== agentId) continue;
      if (status !== undefined && task.status !== status) continue;
      results.push({ ...task });
    }
    return results;
  }

  /**
   * Check and apply a status change synchronously, so two concurrent calls
   * cannot both move the same task. `guard` runs before the status changes
   * and may veto or stamp extra fields.
   */
  private transition(
    taskId: string,
    to: TaskStatus,
    guard: (task: Task) => Result<void>,
  ): Result<Task> {
    const task = this.tasks.get(taskId);
    if (!task) return fail('NotFound', `Task ${taskId} not found`);

    const allowed = checkTransition(taskId, task.status, to);
    if (!allowed.ok) return allowed;

    const vetted = guard(task);
    if (!vetted.ok) return vetted;

    const from = task.status;
    task.status = to;
    task.updatedAt = this.timestamp();
    this.metrics.counter('tasks.transitions', { to });
    this.logger.debug('Task transition', { taskId, from, to });
    return ok(task);
  }

  private async notifyParty(task: Task, draft: Omit<EnvelopeDraft, 'inResponseTo'>): Promise<void> {
    const sent = await this.bus.send({ ...draft, inResponseTo: task.linkedMessageId });
    if (!sent.ok) {
      this.logger.warn('Task notification not delivered', {
        taskId: task.taskId,
        kind: draft.kind,
        reason: sent.error.code,
        error: sent.error.message,
      });
    }
  }

  private async adjustReputation(task: Task, amount: number, reason: string): Promise<void> {
    const reputation = this.reputation;
    if (!reputation || amount === 0) return;
    await this.sideEffects.attempt(
      'reputation',
      () => reputation.award(task.toAgent, amount, reason, task.taskId),
      { taskId: task.taskId, agentId: task.toAgent },
    );
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

function dedupe(values: string[]): string[] {
  return Array.from(new Set(values));
}
