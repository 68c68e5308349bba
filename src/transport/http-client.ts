/**
 * AgentBus HTTP Client — calls an AgentBusHttpServer as one agent.
 */

import type { Envelope } from '../core/types.js';
import { CircuitBreaker, type CircuitBreakerConfig } from '../core/circuit-breaker.js';
import { createLogger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import { isJsonRpcResponse, type JsonRpcRequest, type JsonRpcResponse } from '../protocol/jsonrpc.js';
import { RPC_METHODS } from '../protocol/methods.js';
import { asRecord, toRequest } from '../protocol/transcoder.js';

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

const DEFAULT_RETRY: RetryConfig = { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 5000 };

export interface AgentBusClientOptions {
  retry?: Partial<RetryConfig>;
  circuitBreaker?: CircuitBreakerConfig;
  metrics?: MetricsCollector;
}

/** A JSON-RPC error response, raised by `call`. */
export class RpcCallError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown,
  ) {
    super(message);
    this.name = 'RpcCallError';
  }
}

export interface SendReceipt {
  message_id: string;
  status: string;
  timestamp: string;
}

/**
 * Client for one agent. `baseUrl` includes the server's base path,
 * e.g. `http://127.0.0.1:8080/a2a`.
 */
export class AgentBusClient {
  private retryConfig: RetryConfig;
  private idCounter = 0;
  private circuitBreaker: CircuitBreaker;
  private metrics?: MetricsCollector;
  private logger = createLogger('AgentBusClient');

  constructor(
    private baseUrl: string,
    private agentId: string,
    opts: AgentBusClientOptions = {},
  ) {
    this.retryConfig = { ...DEFAULT_RETRY, ...opts.retry };
    this.circuitBreaker = new CircuitBreaker(
      'agentbus-client',
      opts.circuitBreaker ?? { failureThreshold: 5, resetTimeoutMs: 30_000 },
    );
    this.metrics = opts.metrics;
  }

  /** Get the circuit breaker for inspection/testing. */
  getCircuitBreaker(): CircuitBreaker {
    return this.circuitBreaker;
  }

  /** Send a request and return the response as-is, error responses included. */
  async rpc(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    return this.circuitBreaker.execute(async () => {
      const resp = await this.postWithRetry('/jsonrpc', request);
      const body: unknown = await resp.json();
      if (!isJsonRpcResponse(body)) {
        throw new Error(`Malformed JSON-RPC response (HTTP ${resp.status})`);
      }
      this.metrics?.counter('client.calls', { method: request.method });
      return body;
    });
  }

  /** Standard request/response call; error responses throw `RpcCallError`. */
  async call(method: string, params: Record<string, unknown> = {}): Promise<unknown> {
    const response = await this.rpc({ jsonrpc: '2.0', id: this.nextId(), method, params });
    if ('error' in response) {
      throw new RpcCallError(response.error.code, response.error.message, response.error.data);
    }
    return response.result;
  }

  /**
   * Forward an envelope under its own id. The server replaces `from` with
   * this client's agent.
   */
  async send(envelope: Envelope): Promise<SendReceipt> {
    const response = await this.rpc(toRequest(envelope));
    if ('error' in response) {
      throw new RpcCallError(response.error.code, response.error.message, response.error.data);
    }
    const result = asRecord(response.result);
    const messageId = result?.message_id;
    const status = result?.status;
    const timestamp = result?.timestamp;
    if (typeof messageId !== 'string' || typeof status !== 'string' || typeof timestamp !== 'string') {
      throw new Error('Malformed send receipt');
    }
    return { message_id: messageId, status, timestamp };
  }

  async ping(): Promise<unknown> {
    return this.call(RPC_METHODS.Ping);
  }

  async capabilityQuery(agentId: string): Promise<unknown> {
    return this.call(RPC_METHODS.CapabilityQuery, { to_agent_id: agentId });
  }

  async findAgentsByService(serviceName: string): Promise<unknown> {
    return this.call(RPC_METHODS.FindAgentsByService, { service_name: serviceName });
  }

  async agentCard(agentId: string): Promise<unknown> {
    return this.call(RPC_METHODS.GetAgentCard, { agent_id: agentId });
  }

  /** Pending envelopes for this client's agent. */
  async pending(): Promise<unknown[]> {
    return this.circuitBreaker.execute(async () => {
      const resp = await fetch(`${this.baseUrl}/messages`, { headers: this.headers() });
      if (!resp.ok) throw new Error(`Listing messages failed: ${resp.status}`);
      const messages = asRecord(await resp.json())?.messages;
      if (!Array.isArray(messages)) throw new Error('Malformed message listing');
      return messages;
    });
  }

  /** Resolves to false when the message was not in the mailbox. */
  async acknowledge(messageId: string): Promise<boolean> {
    return this.circuitBreaker.execute(async () => {
      const resp = await fetch(`${this.baseUrl}/messages/${encodeURIComponent(messageId)}/ack`, {
        method: 'POST',
        headers: this.headers(),
      });
      if (resp.status === 404) return false;
      if (!resp.ok) throw new Error(`Acknowledge failed: ${resp.status}`);
      return true;
    });
  }

  /**
   * Health check against the server root.
   */
  async healthCheck(): Promise<{ status: string; version: string }> {
    return this.circuitBreaker.execute(async () => {
      const resp = await fetch(new URL('/health', this.baseUrl));
      if (!resp.ok) throw new Error(`Health check failed: ${resp.status}`);
      const body = asRecord(await resp.json());
      const status = body?.status;
      const version = body?.version;
      if (typeof status !== 'string' || typeof version !== 'string') {
        throw new Error('Malformed health response');
      }
      return { status, version };
    });
  }

  // ── Internals ──

  private nextId(): string {
    return `${this.agentId}-${++this.idCounter}`;
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.agentId}`,
    };
  }

  private async postWithRetry(path: string, body: JsonRpcRequest): Promise<Response> {
    const url = `${this.baseUrl}${path}`;

    let lastError: Error | undefined;
    for (let attempt = 0; attempt <= this.retryConfig.maxRetries; attempt++) {
      try {
        return await fetch(url, {
          method: 'POST',
          headers: this.headers(),
          body: JSON.stringify(body),
        });
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        this.logger.debug('Request attempt failed', { url, attempt, error: lastError.message });
        if (attempt < this.retryConfig.maxRetries) {
          const delay = Math.min(
            this.retryConfig.baseDelayMs * 2 ** attempt,
            this.retryConfig.maxDelayMs,
          );
          await new Promise(r => setTimeout(r, delay));
        }
      }
    }
    throw lastError ?? new Error('Request failed');
  }
}
