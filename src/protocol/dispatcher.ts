/**
 * JSON-RPC dispatcher — answers query methods directly and forwards every
 * other known method through the bus as an envelope.
 *
 * `dispatch` never throws: malformed input, bus failures and unexpected
 * exceptions all come back as JSON-RPC error responses.
 */

import type { BusErrorCode } from '../core/types.js';
import type { CapabilityDirectory } from '../collaborators/types.js';
import type { MessageBus } from '../bus/message-bus.js';
import type { Logger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import { buildAgentCard } from '../a2a/agent-card.js';
import {
  JsonRpcErrorCode,
  checkRequest,
  errorResponse,
  extractId,
  successResponse,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './jsonrpc.js';
import { RPC_METHODS, isKnownMethod } from './methods.js';
import { asRecord, fromRequest } from './transcoder.js';

export const JSONRPC_VERSION = '2.0';

export interface RpcDispatcherDeps {
  bus: MessageBus;
  directory: CapabilityDirectory;
  logger: Logger;
  metrics: MetricsCollector;
  /** Connection endpoint advertised in agent cards */
  cardEndpoint: (agentId: string) => string;
  now?: () => number;
}

export class RpcDispatcher {
  private bus: MessageBus;
  private directory: CapabilityDirectory;
  private logger: Logger;
  private metrics: MetricsCollector;
  private cardEndpoint: (agentId: string) => string;
  private now: () => number;

  constructor(deps: RpcDispatcherDeps) {
    this.bus = deps.bus;
    this.directory = deps.directory;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.cardEndpoint = deps.cardEndpoint;
    this.now = deps.now ?? Date.now;
  }

  async dispatch(raw: unknown, fromAgent: string): Promise<JsonRpcResponse> {
    let response: JsonRpcResponse;
    try {
      response = await this.route(raw, fromAgent);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error('RPC handler threw', { fromAgent, error: message });
      response = errorResponse(extractId(raw), JsonRpcErrorCode.InternalError, `Internal error: ${message}`);
    }
    if ('error' in response) {
      this.metrics.counter('rpc.errors', { code: String(response.error.code) });
    }
    return response;
  }

  private async route(raw: unknown, fromAgent: string): Promise<JsonRpcResponse> {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      this.metrics.counter('rpc.requests', { method: 'invalid' });
      return invalidRequest(null, 'Invalid Request: expected a JSON object');
    }
    if (!('jsonrpc' in raw) || raw.jsonrpc !== JSONRPC_VERSION) {
      this.metrics.counter('rpc.requests', { method: 'invalid' });
      return invalidRequest(extractId(raw), "Invalid JSON-RPC version. Must be '2.0'");
    }

    const checked = checkRequest(raw);
    if (!checked.valid) {
      this.metrics.counter('rpc.requests', { method: 'invalid' });
      return invalidRequest(checked.id, `Invalid Request: ${checked.reason}`);
    }

    const request = checked.request;
    const id = request.id ?? null;
    this.metrics.counter('rpc.requests', { method: request.method });
    this.logger.debug('RPC request', { method: request.method, fromAgent, id });

    switch (request.method) {
      case RPC_METHODS.Ping:
        return successResponse(id, { status: 'pong', timestamp: this.timestamp() });
      case RPC_METHODS.CapabilityQuery:
        return this.capabilityQuery(id, request);
      case RPC_METHODS.FindAgentsByService:
        return this.findAgentsByService(id, request);
      case RPC_METHODS.GetAgentCard:
        return this.agentCard(id, request);
    }

    if (isKnownMethod(request.method)) {
      return this.forward(id, request, fromAgent);
    }
    return errorResponse(id, JsonRpcErrorCode.MethodNotFound, `Method '${request.method}' not found`);
  }

  private capabilityQuery(id: JsonRpcId, request: JsonRpcRequest): JsonRpcResponse {
    const agentId = stringParam(request, 'to_agent_id');
    if (agentId === undefined) {
      return errorResponse(id, JsonRpcErrorCode.InvalidParams, 'Missing required param: to_agent_id');
    }
    const found = this.directory.lookup(agentId);
    if (!found.ok) {
      return errorResponse(id, JsonRpcErrorCode.AgentNotFound, `Agent ${agentId} not found`);
    }
    const record = found.value;
    return successResponse(id, {
      agent_id: agentId,
      services: record.services,
      skills: record.skills,
      status: record.status,
      reputation: record.reputationScore ?? 0,
    });
  }

  private findAgentsByService(id: JsonRpcId, request: JsonRpcRequest): JsonRpcResponse {
    const service = stringParam(request, 'service_name');
    if (service === undefined) {
      return errorResponse(id, JsonRpcErrorCode.InvalidParams, 'Missing required param: service_name');
    }
    return successResponse(id, { service, agent_ids: this.directory.findByService(service) });
  }

  private agentCard(id: JsonRpcId, request: JsonRpcRequest): JsonRpcResponse {
    const agentId = stringParam(request, 'agent_id');
    if (agentId === undefined) {
      return errorResponse(id, JsonRpcErrorCode.InvalidParams, 'Missing required param: agent_id');
    }
    const found = this.directory.lookup(agentId);
    if (!found.ok) {
      return errorResponse(id, JsonRpcErrorCode.AgentNotFound, `Agent ${agentId} not found`);
    }
    return successResponse(id, buildAgentCard(agentId, found.value, { endpoint: this.cardEndpoint(agentId) }));
  }

  private async forward(id: JsonRpcId, request: JsonRpcRequest, fromAgent: string): Promise<JsonRpcResponse> {
    const sent = await this.bus.send(fromRequest(request, fromAgent));
    if (!sent.ok) {
      return errorResponse(id, JsonRpcErrorCode.InternalError, sent.error.message, { reason: sent.error.code });
    }
    return successResponse(id, {
      message_id: sent.value.id,
      status: 'sent',
      timestamp: sent.value.createdAt,
    });
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

/** Malformed or version-mismatched requests carry the `ProtocolError` reason. */
function invalidRequest(id: JsonRpcId, message: string): JsonRpcResponse {
  const reason: BusErrorCode = 'ProtocolError';
  return errorResponse(id, JsonRpcErrorCode.InvalidRequest, message, { reason });
}

function stringParam(request: JsonRpcRequest, key: string): string | undefined {
  const value = asRecord(request.params)?.[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
