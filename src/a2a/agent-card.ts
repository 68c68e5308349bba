/**
 * Agent Cards — the public description an agent advertises to peers.
 */

import type { AgentStatus, CapabilityRecord } from '../core/types.js';

export const AGENT_CARD_VERSION = '1.0.0';

export interface AgentCard {
  agent_id: string;
  name: string;
  version: string;
  capabilities: {
    services: string[];
    skills: string[];
  };
  connection: {
    endpoint: string;
    protocol: 'jsonrpc2.0';
    auth: { scheme: 'bearer' };
  };
  metadata: {
    description: string;
    status: AgentStatus;
    reputation_score: number;
    max_concurrent_tasks: number;
    active_tasks: number;
    pricing: Record<string, number>;
  };
}

export interface AgentCardOptions {
  /** Display name; defaults to the agent id */
  name?: string;
  endpoint: string;
}

export function buildAgentCard(agentId: string, record: CapabilityRecord, opts: AgentCardOptions): AgentCard {
  return {
    agent_id: agentId,
    name: opts.name ?? agentId,
    version: AGENT_CARD_VERSION,
    capabilities: {
      services: [...record.services],
      skills: [...record.skills],
    },
    connection: {
      endpoint: opts.endpoint,
      protocol: 'jsonrpc2.0',
      auth: { scheme: 'bearer' },
    },
    metadata: {
      description: record.description ?? '',
      status: record.status,
      reputation_score: record.reputationScore ?? 0,
      max_concurrent_tasks: record.maxConcurrentTasks,
      active_tasks: record.activeTasks,
      pricing: { ...record.pricing },
    },
  };
}
