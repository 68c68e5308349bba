/**
 * Envelope ⇄ JSON-RPC 2.0 transcoding.
 *
 * `toRequest` flattens an envelope into snake_case params; `fromRequest`
 * reads them back. Optional params that are absent or of the wrong shape are
 * left out of the result instead of failing the request.
 */

import type { Envelope, EnvelopeDraft, Priority } from '../core/types.js';
import { PRIORITY_RANK } from '../core/types.js';
import type { JsonRpcRequest } from './jsonrpc.js';
import { kindForMethod, methodForKind } from './methods.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Param keys on the wire */
export const PARAM = {
  From: 'from_agent_id',
  To: 'to_agent_id',
  MessageType: 'message_type',
  Content: 'content',
  Payload: 'payload',
  Timestamp: 'timestamp',
  Priority: 'priority',
  ExpiresAt: 'expires_at',
  TransactionHash: 'transaction_hash',
  ResponseTo: 'response_to_message_id',
  Metadata: 'metadata',
} as const;

export function toRequest(envelope: Envelope): JsonRpcRequest {
  const params: Record<string, unknown> = {
    [PARAM.From]: envelope.from,
    [PARAM.To]: envelope.to,
    [PARAM.MessageType]: envelope.kind,
    [PARAM.Content]: envelope.content,
    [PARAM.Payload]: { ...envelope.payload },
    [PARAM.Timestamp]: envelope.createdAt,
    [PARAM.Priority]: envelope.priority,
  };
  if (envelope.expiresAt !== undefined) params[PARAM.ExpiresAt] = envelope.expiresAt;
  if (envelope.transactionRef !== undefined) params[PARAM.TransactionHash] = envelope.transactionRef;
  if (envelope.inResponseTo !== undefined) params[PARAM.ResponseTo] = envelope.inResponseTo;
  if (Object.keys(envelope.metadata).length > 0) params[PARAM.Metadata] = { ...envelope.metadata };

  return {
    jsonrpc: '2.0',
    id: envelope.id,
    method: methodForKind(envelope.kind),
    params,
  };
}

/**
 * Decode a request into an envelope draft. The sender is always
 * `impliedFrom`, the authenticated caller; a `from_agent_id` param is
 * ignored. A request id is a per-client correlation token, so it becomes
 * the envelope id only when it is a UUID; otherwise `id` stays unset and
 * the bus assigns one. `createdAt` likewise stays unset when absent.
 */
export function fromRequest(request: JsonRpcRequest, impliedFrom: string): EnvelopeDraft {
  const params = asRecord(request.params) ?? {};

  const draft: EnvelopeDraft = {
    from: impliedFrom,
    to: readString(params[PARAM.To]) ?? '',
    kind: kindForMethod(request.method),
    content: readString(params[PARAM.Content]) ?? '',
    payload: asRecord(params[PARAM.Payload]) ?? {},
    priority: readPriority(params[PARAM.Priority]) ?? 'Normal',
    metadata: asRecord(params[PARAM.Metadata]) ?? {},
  };

  if (isMessageId(request.id)) draft.id = request.id;

  const createdAt = readTimestamp(params[PARAM.Timestamp]);
  if (createdAt !== undefined) draft.createdAt = createdAt;

  const expiresAt = readTimestamp(params[PARAM.ExpiresAt]);
  if (expiresAt !== undefined) draft.expiresAt = expiresAt;

  const transactionRef = readString(params[PARAM.TransactionHash]);
  if (transactionRef !== undefined) draft.transactionRef = transactionRef;

  const inResponseTo = readString(params[PARAM.ResponseTo]);
  if (inResponseTo) draft.inResponseTo = inResponseTo;

  return draft;
}

// ── Field readers ──

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  return { ...value };
}

export function isMessageId(value: unknown): value is string {
  return typeof value === 'string' && UUID_PATTERN.test(value);
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** Keeps the original string when it parses, so a round trip is exact. */
function readTimestamp(value: unknown): string | undefined {
  if (typeof value !== 'string' || Number.isNaN(Date.parse(value))) return undefined;
  return value;
}

function readPriority(value: unknown): Priority | undefined {
  if (typeof value !== 'string') return undefined;
  return isPriority(value) ? value : undefined;
}

function isPriority(value: string): value is Priority {
  return Object.prototype.hasOwnProperty.call(PRIORITY_RANK, value);
}
