import { describe, it, expect, vi } from 'vitest';
import { createAgentBus } from '../src/context.js';
import { InMemoryIdentityDirectory, InMemoryReputation } from '../src/collaborators/memory.js';
import type { ReputationCollaborator } from '../src/collaborators/types.js';
import { makeFixture } from './helpers.js';

describe('createAgentBus', () => {
  it('refuses an invalid configuration', () => {
    const created = createAgentBus({
      identity: new InMemoryIdentityDirectory(),
      config: { maxMailboxSize: -5 },
    });
    expect(!created.ok && created.error.code).toBe('InvalidArgument');
  });

  it('contexts do not share mailboxes or metrics', async () => {
    const a = makeFixture();
    const b = makeFixture();
    await a.ctx.bus.send({ from: 'alice', to: 'bob', kind: 'Ping' });
    expect(b.ctx.mailboxes.stats().envelopes).toBe(0);
    expect(b.ctx.metrics.getCounter('bus.sent')).toBe(0);
  });

  it('passes the configured reward and penalty to the ledger', async () => {
    const fx = makeFixture({ completionReward: 25 });
    const task = await fx.ctx.tasks.delegate({ from: 'alice', to: 'bob', name: 'index', description: '' });
    if (!task.ok) throw task.error;
    await fx.ctx.tasks.complete(task.value.taskId);
    expect(fx.reputation.scoreOf('bob')).toBe(25);
  });

  describe('topAgents', () => {
    it('delegates to the reputation ranking', async () => {
      const reputation = new InMemoryReputation();
      await reputation.award('alice', 5, 'seed', 'r-1');
      await reputation.award('bob', 12, 'seed', 'r-2');
      await reputation.award('carol', 8, 'seed', 'r-3');
      const fx = makeFixture({}, { reputation });
      const top = await fx.ctx.topAgents(2);
      expect(top.ok && top.value).toEqual([
        { agentId: 'bob', score: 12, rank: 1 },
        { agentId: 'carol', score: 8, rank: 2 },
      ]);
    });

    it('is NotConfigured when the collaborator has no ranking', async () => {
      const awardOnly: ReputationCollaborator = { award: async () => undefined };
      const fx = makeFixture({}, { reputation: awardOnly });
      const top = await fx.ctx.topAgents();
      expect(!top.ok && top.error.code).toBe('NotConfigured');
    });

    it('is NotConfigured without any reputation collaborator', async () => {
      const created = createAgentBus({ identity: new InMemoryIdentityDirectory(), config: { logLevel: 'silent' } });
      if (!created.ok) throw created.error;
      const top = await created.value.topAgents();
      expect(!top.ok && top.error.code).toBe('NotConfigured');
    });
  });

  it('start runs periodic compaction and stop ends it', async () => {
    const fx = makeFixture({ compactionIntervalMs: 10 });
    await fx.ctx.bus.send({ from: 'alice', to: 'bob', kind: 'Ping', expiresAt: fx.clock.iso(500) });
    fx.clock.advance(500);

    fx.ctx.start();
    try {
      await vi.waitFor(() => {
        expect(fx.ctx.metrics.getCounter('mailbox.compacted')).toBe(1);
      });
      expect(fx.ctx.mailboxes.stats().envelopes).toBe(0);
    } finally {
      fx.ctx.stop();
    }
  });
});
