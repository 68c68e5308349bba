/**
 * In-memory collaborators for tests and simple use.
 */

import type { AgentRanking } from '../core/types.js';
import type {
  IdentityResolution,
  IdentityValidator,
  NotificationSink,
  ReputationCollaborator,
} from './types.js';

/** Identities known to the directory; `isAgent: false` models a plain user account. */
export class InMemoryIdentityDirectory implements IdentityValidator {
  private identities = new Map<string, boolean>();

  constructor(agents: string[] = []) {
    for (const id of agents) this.identities.set(id, true);
  }

  addAgent(id: string): this {
    this.identities.set(id, true);
    return this;
  }

  addNonAgent(id: string): this {
    this.identities.set(id, false);
    return this;
  }

  remove(id: string): boolean {
    return this.identities.delete(id);
  }

  async resolve(id: string): Promise<IdentityResolution> {
    const isAgent = this.identities.get(id);
    if (isAgent === undefined) return { exists: false, isAgent: false };
    return { exists: true, isAgent };
  }
}

export interface RecordedNotification {
  from: string;
  to: string;
  summary: string;
}

/** Keeps every notification it receives. Set `failWith` to make `notify` reject. */
export class RecordingNotificationSink implements NotificationSink {
  readonly sent: RecordedNotification[] = [];
  failWith: Error | null = null;

  async notify(from: string, to: string, summary: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push({ from, to, summary });
  }
}

export interface ReputationEvent {
  agentId: string;
  amount: number;
  reason: string;
  refId: string;
}

/** Running totals per agent, starting at `initialScore`. */
export class InMemoryReputation implements ReputationCollaborator {
  readonly history: ReputationEvent[] = [];
  private scores = new Map<string, number>();

  constructor(private initialScore = 0) {}

  async award(agentId: string, amount: number, reason: string, refId: string): Promise<void> {
    this.history.push({ agentId, amount, reason, refId });
    this.scores.set(agentId, this.scoreOf(agentId) + amount);
  }

  scoreOf(agentId: string): number {
    return this.scores.get(agentId) ?? this.initialScore;
  }

  /** Highest score first; equal scores keep first-seen order. */
  async ranking(limit: number): Promise<AgentRanking[]> {
    return Array.from(this.scores)
      .sort(([, a], [, b]) => b - a)
      .slice(0, Math.max(0, limit))
      .map(([agentId, score], i) => ({ agentId, score, rank: i + 1 }));
  }
}
