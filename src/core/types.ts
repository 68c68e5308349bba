/**
 * AgentBus Core Types
 * Single source of truth for envelopes, tasks, capabilities and results.
 */

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = BusError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ── Errors ──

export type BusErrorCode =
  | 'UnknownAgent'
  | 'NotAnAgent'
  | 'NotFound'
  | 'InvalidTransition'
  | 'ProtocolError'
  | 'InternalError'
  | 'DuplicateMessage'
  | 'MailboxFull'
  | 'Forbidden'
  | 'NotConfigured'
  | 'InvalidArgument';

/** Error carried in the failure branch of every bus, task and registry result. */
export class BusError extends Error {
  constructor(
    public readonly code: BusErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'BusError';
  }
}

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail(code: BusErrorCode, message: string): { ok: false; error: BusError } {
  return { ok: false, error: new BusError(code, message) };
}

// ── Message Kinds ──

export const MESSAGE_KINDS = [
  // Service discovery
  'CapabilityQuery',
  'CapabilityResponse',
  'ServiceRequest',
  'ServiceOffer',
  // Task management
  'TaskDelegation',
  'TaskAcceptance',
  'TaskRejection',
  'TaskUpdate',
  'TaskCompletion',
  // Payment
  'PaymentRequest',
  'PaymentConfirmation',
  'PaymentRejection',
  // Negotiation
  'NegotiationStart',
  'NegotiationOffer',
  'NegotiationAccept',
  'NegotiationReject',
  // Reputation
  'ReputationQuery',
  'ReputationUpdate',
  // General
  'Ping',
  'Pong',
  'Error',
] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

// ── Priority ──

/** Lower rank is served first. */
export const PRIORITY_RANK = {
  Urgent: 0,
  High: 1,
  Normal: 2,
  Low: 3,
} as const;

export type Priority = keyof typeof PRIORITY_RANK;

export const PRIORITIES: readonly Priority[] = ['Urgent', 'High', 'Normal', 'Low'];

// ── Envelope ──

/** One unit of agent-to-agent communication. Timestamps are ISO-8601 UTC. */
export interface Envelope {
  id: string;
  from: string;
  to: string;
  kind: MessageKind;
  content: string;
  payload: Record<string, unknown>;
  createdAt: string;
  expiresAt?: string;
  priority: Priority;
  inResponseTo?: string;
  /** External settlement reference, e.g. a transaction hash */
  transactionRef?: string;
  metadata: Record<string, unknown>;
}

/** What a caller hands to `send`; the bus fills in the rest. */
export interface EnvelopeDraft {
  id?: string;
  from: string;
  to: string;
  kind: MessageKind;
  content?: string;
  payload?: Record<string, unknown>;
  createdAt?: string;
  expiresAt?: string;
  priority?: Priority;
  inResponseTo?: string;
  transactionRef?: string;
  metadata?: Record<string, unknown>;
}

// ── Tasks ──

export type TaskStatus = 'Pending' | 'InProgress' | 'Completed' | 'Failed' | 'Cancelled';

export interface Task {
  taskId: string;
  fromAgent: string;
  toAgent: string;
  /** The TaskDelegation envelope created with this task */
  linkedMessageId: string;
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  requiredCapabilities: string[];
  status: TaskStatus;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
  completionNotes?: string;
  resultData: Record<string, unknown>;
  failureReason?: string;
  progress?: string;
}

export interface DelegateParams {
  from: string;
  to: string;
  name: string;
  description: string;
  parameters?: Record<string, unknown>;
  requiredCapabilities?: string[];
}

// ── Capabilities ──

export type AgentStatus = 'Available' | 'Busy' | 'Offline' | 'Maintenance';

export interface CapabilityRecord {
  services: string[];
  skills: string[];
  /** Price per service unit, keyed by service name */
  pricing: Record<string, number>;
  status: AgentStatus;
  maxConcurrentTasks: number;
  activeTasks: number;
  description?: string;
  reputationScore?: number;
}

/** A ranked entry returned by reputation leaderboards */
export interface AgentRanking {
  agentId: string;
  score: number;
  rank: number;
}
