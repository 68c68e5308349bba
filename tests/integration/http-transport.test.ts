/**
 * Integration tests — HTTP binding with a real server and client on loopback.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { AgentBusHttpServer } from '../../src/transport/http-server.js';
import { AgentBusClient, RpcCallError } from '../../src/transport/http-client.js';
import { finalizeEnvelope } from '../../src/bus/envelope.js';
import { makeFixture, type Fixture } from '../helpers.js';

const MESSAGE_ID = 'e41c8b26-9f0a-4d37-a6b5-2c8d1e7f9a03';

describe('HTTP Transport Integration', () => {
  let fx: Fixture;
  let server: AgentBusHttpServer;
  let baseUrl: string;
  let alice: AgentBusClient;
  let bob: AgentBusClient;

  function post(path: string, body: string, agent?: string, contentType = 'application/json'): Promise<Response> {
    const headers: Record<string, string> = { 'Content-Type': contentType };
    if (agent) headers['Authorization'] = `Bearer ${agent}`;
    return fetch(`${baseUrl}${path}`, { method: 'POST', headers, body });
  }

  function get(path: string, agent?: string): Promise<Response> {
    const headers: Record<string, string> = {};
    if (agent) headers['Authorization'] = `Bearer ${agent}`;
    return fetch(`${baseUrl}${path}`, { headers });
  }

  beforeAll(async () => {
    fx = makeFixture({ http: { port: 0, host: '127.0.0.1', basePath: '/a2a' } });
    const registered = await fx.ctx.registry.register('bob', {
      services: ['translation'],
      skills: ['French'],
      pricing: { translation: 0.5 },
      maxConcurrentTasks: 2,
    });
    if (!registered.ok) throw registered.error;

    server = new AgentBusHttpServer(fx.ctx);
    await server.start();
    baseUrl = server.url;
    alice = new AgentBusClient(baseUrl, 'alice', { retry: { maxRetries: 0 } });
    bob = new AgentBusClient(baseUrl, 'bob', { retry: { maxRetries: 0 } });
  });

  afterAll(async () => {
    await server.stop();
  });

  describe('health and metrics', () => {
    it('reports health at the server root', async () => {
      await expect(alice.healthCheck()).resolves.toEqual({ status: 'ok', version: '0.1.0' });
    });

    it('serves a metrics snapshot', async () => {
      await alice.ping();
      const resp = await fetch(new URL('/metrics', baseUrl));
      expect(resp.status).toBe(200);
      expect(await resp.json()).toMatchObject({ counters: { 'rpc.requests': expect.any(Array) } });
    });
  });

  describe('JSON-RPC endpoint', () => {
    it('answers ping', async () => {
      await expect(alice.ping()).resolves.toMatchObject({ status: 'pong' });
    });

    it('requires a bearer agent id', async () => {
      const resp = await post('/jsonrpc', JSON.stringify({ jsonrpc: '2.0', method: 'ping', id: 1 }));
      expect(resp.status).toBe(401);
    });

    it('requires a JSON content type', async () => {
      const resp = await post('/jsonrpc', '{}', 'alice', 'text/plain');
      expect(resp.status).toBe(415);
    });

    it('answers malformed JSON with a parse error', async () => {
      const resp = await post('/jsonrpc', '{"jsonrpc": "2.0", ', 'alice');
      expect(resp.status).toBe(200);
      expect(await resp.json()).toEqual({
        jsonrpc: '2.0',
        error: { code: -32700, message: 'Parse error' },
        id: null,
      });
    });

    it('refuses bodies over 1 MB', async () => {
      const resp = await post('/jsonrpc', JSON.stringify({ pad: 'x'.repeat(1_100_000) }), 'alice');
      expect(resp.status).toBe(413);
    });

    it('raises RpcCallError for error responses', async () => {
      const call = alice.capabilityQuery('carol');
      await expect(call).rejects.toBeInstanceOf(RpcCallError);
      await expect(alice.capabilityQuery('carol')).rejects.toMatchObject({ code: -32001 });
    });

    it('discovers agents and cards', async () => {
      await expect(alice.findAgentsByService('translation')).resolves.toEqual({
        service: 'translation',
        agent_ids: ['bob'],
      });
      await expect(alice.agentCard('bob')).resolves.toMatchObject({
        agent_id: 'bob',
        connection: { protocol: 'jsonrpc2.0' },
      });
    });
  });

  describe('mailbox', () => {
    it('delivers a sent envelope and acknowledges it once', async () => {
      const envelope = finalizeEnvelope(
        { id: MESSAGE_ID, from: 'alice', to: 'bob', kind: 'ServiceRequest', content: 'bonjour?' },
        new Date(),
      );
      const receipt = await alice.send(envelope);
      expect(receipt).toMatchObject({ message_id: MESSAGE_ID, status: 'sent' });

      const pending = await bob.pending();
      expect(pending).toHaveLength(1);
      expect(pending[0]).toMatchObject({ id: MESSAGE_ID, from: 'alice', content: 'bonjour?' });

      await expect(bob.acknowledge(MESSAGE_ID)).resolves.toBe(true);
      await expect(bob.acknowledge(MESSAGE_ID)).resolves.toBe(false);
    });

    it('rejects a send to an unknown agent', async () => {
      const envelope = finalizeEnvelope({ from: 'alice', to: 'nobody', kind: 'Ping' }, new Date());
      await expect(alice.send(envelope)).rejects.toMatchObject({ code: -32603, data: { reason: 'UnknownAgent' } });
    });
  });

  describe('REST routes', () => {
    it('lists available agents', async () => {
      const resp = await get('/agents');
      expect(await resp.json()).toEqual({ agents: ['bob'] });
    });

    it('finds agents by service', async () => {
      const resp = await get('/agents/by-service/translation');
      expect(await resp.json()).toEqual({ service: 'translation', agent_ids: ['bob'] });
    });

    it('serves agent cards pointing at this server', async () => {
      const resp = await get('/agent-card/bob');
      expect(resp.status).toBe(200);
      expect(await resp.json()).toMatchObject({
        agent_id: 'bob',
        connection: { endpoint: `${baseUrl}/jsonrpc` },
      });
      expect((await get('/agent-card/carol')).status).toBe(404);
    });

    it('creates, lists and completes a task', async () => {
      const created = await post('/tasks', JSON.stringify({ to: 'bob', name: 'Translate', description: 'menu' }), 'alice');
      expect(created.status).toBe(201);
      expect(await created.json()).toMatchObject({ task: { fromAgent: 'alice', toAgent: 'bob', status: 'Pending' } });

      const [task] = fx.ctx.tasks.queryByAgent('alice');
      const listed = await get('/tasks?status=Pending', 'bob');
      expect(await listed.json()).toMatchObject({ tasks: [{ taskId: task.taskId }] });

      const byDelegator = await post(`/tasks/${task.taskId}/complete`, '{}', 'alice');
      expect(byDelegator.status).toBe(403);

      const completed = await post(
        `/tasks/${task.taskId}/complete`,
        JSON.stringify({ result_data: { text: 'carte' }, notes: 'done' }),
        'bob',
      );
      expect(completed.status).toBe(200);
      expect(await completed.json()).toMatchObject({ task: { status: 'Completed', resultData: { text: 'carte' } } });

      const again = await post(`/tasks/${task.taskId}/complete`, '{}', 'bob');
      expect(again.status).toBe(409);
    });

    it('validates task bodies', async () => {
      const resp = await post('/tasks', JSON.stringify({ name: 'no recipient' }), 'alice');
      expect(resp.status).toBe(400);
    });

    it('rejects an unknown status filter', async () => {
      expect((await get('/tasks?status=Paused', 'alice')).status).toBe(400);
    });

    it('returns 404 for unknown routes', async () => {
      expect((await get('/nope', 'alice')).status).toBe(404);
    });
  });
});
