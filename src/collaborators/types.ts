/**
 * Contracts for the external subsystems the bus calls out to.
 */

import type { AgentRanking, CapabilityRecord, Result } from '../core/types.js';

export interface IdentityResolution {
  exists: boolean;
  isAgent: boolean;
}

/** Confirms that an identifier denotes an agent-capable identity. */
export interface IdentityValidator {
  resolve(id: string): Promise<IdentityResolution>;
}

/** Real-time delivery hint. Best-effort: the mailbox is the contract. */
export interface NotificationSink {
  notify(from: string, to: string, summary: string): Promise<void>;
}

export interface CapabilityDirectory {
  lookup(agentId: string): Result<CapabilityRecord>;
  findByService(serviceName: string): string[];
}

export interface ReputationCollaborator {
  /** Negative amounts deduct. */
  award(agentId: string, amount: number, reason: string, refId: string): Promise<void>;
  /** Descending by score. Collaborators without a leaderboard omit this. */
  ranking?(limit: number): Promise<AgentRanking[]>;
}
