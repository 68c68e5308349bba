/**
 * AgentBus HTTP Server — exposes the JSON-RPC endpoint plus a few REST
 * routes over mailboxes, discovery and tasks.
 * Uses Node.js built-in http module (no Express).
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Socket } from 'node:net';
import AjvModule from 'ajv';
import type { SchemaObject } from 'ajv';
import type { AgentBus } from '../context.js';
import type { BusError, BusErrorCode, TaskStatus } from '../core/types.js';
import { buildAgentCard } from '../a2a/agent-card.js';
import { JsonRpcErrorCode, errorResponse } from '../protocol/jsonrpc.js';
import type { Logger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import type { HttpConfig } from '../core/config.js';

const Ajv = AjvModule.default;

export const SERVER_VERSION = '0.1.0';

/** Maximum request body size in bytes (1 MB) */
const MAX_BODY_BYTES = 1_048_576;

/** Request timeout in milliseconds (30s) */
const REQUEST_TIMEOUT_MS = 30_000;

/**
 * Maps a request to the calling agent's id, or null when unauthenticated.
 * Verifying credentials is left to the host application.
 */
export type Authenticate = (req: IncomingMessage) => string | null | Promise<string | null>;

/** Treats the bearer token itself as the agent id. */
export const bearerAgentId: Authenticate = req => {
  const auth = req.headers.authorization;
  if (auth && auth.startsWith('Bearer ')) {
    const token = auth.slice(7).trim();
    return token.length > 0 ? token : null;
  }
  return null;
};

type BodyResult =
  | { ok: true; value: unknown }
  | { ok: false; reason: 'too_large' | 'invalid_json' | 'aborted' };

// ── Request bodies ──

interface CreateTaskBody {
  to: string;
  name: string;
  description?: string;
  parameters?: Record<string, unknown>;
  required_capabilities?: string[];
}

interface CompleteTaskBody {
  result_data?: Record<string, unknown>;
  notes?: string;
}

const TASK_STATUSES: readonly TaskStatus[] = ['Pending', 'InProgress', 'Completed', 'Failed', 'Cancelled'];

const createTaskSchema: SchemaObject = {
  type: 'object',
  properties: {
    to: { type: 'string', minLength: 1 },
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    parameters: { type: 'object' },
    required_capabilities: { type: 'array', items: { type: 'string' } },
  },
  required: ['to', 'name'],
};

const completeTaskSchema: SchemaObject = {
  type: 'object',
  properties: {
    result_data: { type: 'object' },
    notes: { type: 'string' },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateCreateTask = ajv.compile<CreateTaskBody>(createTaskSchema);
const validateCompleteTask = ajv.compile<CompleteTaskBody>(completeTaskSchema);

const STATUS_BY_CODE: Record<BusErrorCode, number> = {
  UnknownAgent: 400,
  NotAnAgent: 400,
  InvalidArgument: 400,
  ProtocolError: 400,
  Forbidden: 403,
  NotFound: 404,
  InvalidTransition: 409,
  DuplicateMessage: 409,
  MailboxFull: 503,
  NotConfigured: 501,
  InternalError: 500,
};

export interface AgentBusHttpServerOptions {
  authenticate?: Authenticate;
}

/**
 * HTTP server bound to one bus context.
 */
export class AgentBusHttpServer {
  private server: Server | null = null;
  private startedAt = 0;
  private connections = new Set<Socket>();
  private config: HttpConfig;
  private logger: Logger;
  private metrics: MetricsCollector;
  private authenticate: Authenticate;

  constructor(
    private context: AgentBus,
    opts: AgentBusHttpServerOptions = {},
  ) {
    this.config = context.config.http;
    this.logger = context.logger.child({ component: 'AgentBusHttpServer' });
    this.metrics = context.metrics;
    this.authenticate = opts.authenticate ?? bearerAgentId;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        void this.handleRequest(req, res);
      });
      this.server = server;
      server.on('connection', socket => {
        this.connections.add(socket);
        socket.on('close', () => this.connections.delete(socket));
      });
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        this.startedAt = Date.now();
        this.context.start();
        this.logger.info('Server started', { port: this.port, host: this.config.host });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    this.logger.info('Server stopping');
    this.context.stop();

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    return new Promise(resolve => {
      if (!this.server) { resolve(); return; }
      this.server.close(() => resolve());
      this.server = null;
    });
  }

  /** The actual port after listen (useful when port=0) */
  get port(): number {
    const addr = this.server?.address();
    if (addr && typeof addr === 'object') return addr.port;
    return this.config.port;
  }

  get url(): string {
    return `http://${this.config.host}:${this.port}${this.config.basePath}`;
  }

  // ── Request Router ──

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startTime = Date.now();

    this.setCors(req, res);
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const base = this.config.basePath;
    const route = routeName(path, base);

    this.metrics.counter('http.requests', { method: req.method ?? 'UNKNOWN', route });

    try {
      if (req.method === 'GET' && path === '/health') {
        return this.handleHealth(res);
      }
      if (req.method === 'GET' && path === '/metrics') {
        return this.sendJson(res, 200, this.metrics.getSnapshot());
      }
      if (req.method === 'GET' && path === `${base}/agents`) {
        return this.sendJson(res, 200, { agents: this.context.registry.listAvailable() });
      }
      if (req.method === 'GET' && path.startsWith(`${base}/agents/by-service/`)) {
        return this.handleFindByService(path.slice(`${base}/agents/by-service/`.length), res);
      }
      if (req.method === 'GET' && path.startsWith(`${base}/agent-card/`)) {
        return this.handleAgentCard(path.slice(`${base}/agent-card/`.length), res);
      }

      const isRpc = req.method === 'POST' && path === `${base}/jsonrpc`;
      const isMessages = path === `${base}/messages` || path.startsWith(`${base}/messages/`);
      const isTasks = path === `${base}/tasks` || path.startsWith(`${base}/tasks/`);
      if (!isRpc && !isMessages && !isTasks) {
        return this.sendJson(res, 404, { error: { code: 404, message: 'Not found' } });
      }

      const agentId = await this.authenticate(req);
      if (!agentId) {
        return this.sendJson(res, 401, { error: { code: 401, message: 'Missing bearer credentials' } });
      }

      if (isRpc) {
        return await this.handleJsonRpc(req, res, agentId);
      }
      if (req.method === 'GET' && path === `${base}/messages`) {
        return this.sendJson(res, 200, { agent_id: agentId, messages: this.context.mailboxes.listPending(agentId) });
      }
      const ack = /^\/messages\/([^/]+)\/ack$/.exec(path.slice(base.length));
      if (req.method === 'POST' && ack) {
        return await this.handleAcknowledge(ack[1], res, agentId);
      }
      if (req.method === 'POST' && path === `${base}/tasks`) {
        return await this.handleCreateTask(req, res, agentId);
      }
      if (req.method === 'GET' && path === `${base}/tasks`) {
        return this.handleListTasks(url.searchParams.get('status'), res, agentId);
      }
      const complete = /^\/tasks\/([^/]+)\/complete$/.exec(path.slice(base.length));
      if (req.method === 'POST' && complete) {
        return await this.handleCompleteTask(complete[1], req, res, agentId);
      }

      this.sendJson(res, 404, { error: { code: 404, message: 'Not found' } });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal server error';
      this.logger.error('Request error', { method: req.method, path: req.url, error: message });
      this.sendJson(res, 500, { error: { code: 500, message } });
    } finally {
      this.metrics.histogram('http.duration_ms', Date.now() - startTime, { route });
    }
  }

  // ── Route Handlers ──

  private handleHealth(res: ServerResponse): void {
    this.sendJson(res, 200, {
      status: 'ok',
      version: SERVER_VERSION,
      uptime: Date.now() - this.startedAt,
      mailboxes: this.context.mailboxes.stats(),
    });
  }

  private async handleJsonRpc(req: IncomingMessage, res: ServerResponse, agentId: string): Promise<void> {
    const contentType = req.headers['content-type'] ?? '';
    if (!contentType.includes('application/json')) {
      this.sendJson(res, 415, { error: { code: 415, message: 'Content-Type must be application/json' } });
      return;
    }

    const body = await this.readBody(req);
    if (!body.ok) {
      if (body.reason === 'too_large') {
        this.sendJson(res, 413, { error: { code: 413, message: 'Request body too large' } });
        return;
      }
      this.metrics.counter('rpc.errors', { code: String(JsonRpcErrorCode.ParseError) });
      this.sendJson(res, 200, errorResponse(null, JsonRpcErrorCode.ParseError, 'Parse error'));
      return;
    }

    const response = await this.context.dispatcher.dispatch(body.value, agentId);
    this.sendJson(res, 200, response);
  }

  private handleFindByService(rawName: string, res: ServerResponse): void {
    const service = decodeSegment(rawName);
    if (!service) {
      this.sendJson(res, 400, { error: { code: 400, message: 'Invalid service name' } });
      return;
    }
    this.sendJson(res, 200, { service, agent_ids: this.context.registry.findByService(service) });
  }

  private handleAgentCard(rawId: string, res: ServerResponse): void {
    const agentId = decodeSegment(rawId);
    if (!agentId) {
      this.sendJson(res, 400, { error: { code: 400, message: 'Invalid agent id' } });
      return;
    }
    const found = this.context.registry.lookup(agentId);
    if (!found.ok) {
      this.sendBusError(res, found.error);
      return;
    }
    this.sendJson(res, 200, buildAgentCard(agentId, found.value, { endpoint: `${this.url}/jsonrpc` }));
  }

  private async handleAcknowledge(rawId: string, res: ServerResponse, agentId: string): Promise<void> {
    const messageId = decodeSegment(rawId);
    if (!messageId) {
      this.sendJson(res, 400, { error: { code: 400, message: 'Invalid message id' } });
      return;
    }
    const acked = await this.context.bus.acknowledge(agentId, messageId);
    if (!acked.ok) {
      this.sendBusError(res, acked.error);
      return;
    }
    this.sendJson(res, 200, { acknowledged: acked.value.id });
  }

  private async handleCreateTask(req: IncomingMessage, res: ServerResponse, agentId: string): Promise<void> {
    const body = await this.readBody(req);
    if (!body.ok) {
      this.sendBodyError(res, body.reason);
      return;
    }
    if (!validateCreateTask(body.value)) {
      this.sendJson(res, 400, { error: { code: 400, message: ajv.errorsText(validateCreateTask.errors) } });
      return;
    }
    const input = body.value;
    const created = await this.context.tasks.delegate({
      from: agentId,
      to: input.to,
      name: input.name,
      description: input.description ?? '',
      parameters: input.parameters,
      requiredCapabilities: input.required_capabilities,
    });
    if (!created.ok) {
      this.sendBusError(res, created.error);
      return;
    }
    this.sendJson(res, 201, { task: created.value });
  }

  private handleListTasks(status: string | null, res: ServerResponse, agentId: string): void {
    if (status === null) {
      this.sendJson(res, 200, { tasks: this.context.tasks.queryByAgent(agentId) });
      return;
    }
    const wanted = TASK_STATUSES.find(s => s === status);
    if (!wanted) {
      this.sendJson(res, 400, { error: { code: 400, message: `Unknown task status: ${status}` } });
      return;
    }
    this.sendJson(res, 200, { tasks: this.context.tasks.queryByAgent(agentId, wanted) });
  }

  private async handleCompleteTask(
    rawId: string,
    req: IncomingMessage,
    res: ServerResponse,
    agentId: string,
  ): Promise<void> {
    const taskId = decodeSegment(rawId);
    if (!taskId) {
      this.sendJson(res, 400, { error: { code: 400, message: 'Invalid task id' } });
      return;
    }
    const body = await this.readBody(req);
    if (!body.ok) {
      this.sendBodyError(res, body.reason);
      return;
    }
    if (!validateCompleteTask(body.value)) {
      this.sendJson(res, 400, { error: { code: 400, message: ajv.errorsText(validateCompleteTask.errors) } });
      return;
    }

    const existing = this.context.tasks.query(taskId);
    if (!existing.ok) {
      this.sendBusError(res, existing.error);
      return;
    }
    if (existing.value.toAgent !== agentId) {
      this.sendJson(res, 403, { error: { code: 403, message: `Agent ${agentId} is not the delegate of task ${taskId}` } });
      return;
    }

    const completed = await this.context.tasks.complete(taskId, body.value.result_data, body.value.notes);
    if (!completed.ok) {
      this.sendBusError(res, completed.error);
      return;
    }
    this.sendJson(res, 200, { task: completed.value });
  }

  // ── Helpers ──

  private setCors(req: IncomingMessage, res: ServerResponse): void {
    const origins = this.config.corsOrigins;
    const origin = req.headers.origin;
    let allowed = '*';
    if (origins.length > 0) {
      allowed = origin && origins.includes(origin) ? origin : origins[0];
    }
    res.setHeader('Access-Control-Allow-Origin', allowed);
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  }

  private sendBusError(res: ServerResponse, error: BusError): void {
    this.sendJson(res, STATUS_BY_CODE[error.code], { error: { code: error.code, message: error.message } });
  }

  private sendBodyError(res: ServerResponse, reason: 'too_large' | 'invalid_json' | 'aborted'): void {
    if (reason === 'too_large') {
      this.sendJson(res, 413, { error: { code: 413, message: 'Request body too large' } });
    } else {
      this.sendJson(res, 400, { error: { code: 400, message: 'Invalid JSON body' } });
    }
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    if (res.headersSent) return;
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  private readBody(req: IncomingMessage): Promise<BodyResult> {
    return new Promise(resolve => {
      let data = '';
      let size = 0;
      let settled = false;
      const settle = (result: BodyResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        resolve(result);
      };
      const timeout = setTimeout(() => {
        settle({ ok: false, reason: 'aborted' });
        req.destroy();
      }, REQUEST_TIMEOUT_MS);

      req.on('data', (chunk: Buffer) => {
        if (settled) return;
        size += chunk.length;
        if (size > MAX_BODY_BYTES) {
          settle({ ok: false, reason: 'too_large' });
          req.resume();
          return;
        }
        data += chunk.toString();
      });
      req.on('end', () => {
        try {
          settle({ ok: true, value: JSON.parse(data) });
        } catch {
          settle({ ok: false, reason: 'invalid_json' });
        }
      });
      req.on('error', () => settle({ ok: false, reason: 'aborted' }));
    });
  }
}

function decodeSegment(segment: string): string | null {
  try {
    const decoded = decodeURIComponent(segment);
    return decoded.length > 0 ? decoded : null;
  } catch {
    return null;
  }
}

/** Low-cardinality route label for metrics. */
function routeName(path: string, base: string): string {
  if (path === '/health' || path === '/metrics') return path;
  if (!path.startsWith(base)) return 'other';
  const rest = path.slice(base.length);
  if (rest === '/jsonrpc' || rest === '/messages' || rest === '/tasks' || rest === '/agents') return rest;
  if (rest.startsWith('/messages/')) return '/messages/:id/ack';
  if (rest.startsWith('/tasks/')) return '/tasks/:id/complete';
  if (rest.startsWith('/agents/by-service/')) return '/agents/by-service/:name';
  if (rest.startsWith('/agent-card/')) return '/agent-card/:id';
  return 'other';
}
