import { describe, it, expect, beforeEach } from 'vitest';
import { makeFixture, type Fixture } from './helpers.js';
import type { IdentityValidator } from '../src/collaborators/types.js';

describe('MessageBus', () => {
  let fx: Fixture;

  beforeEach(() => {
    fx = makeFixture();
  });

  describe('send', () => {
    it('enqueues into the recipient mailbox and stamps the envelope', async () => {
      const result = await fx.ctx.bus.send({ from: 'alice', to: 'bob', kind: 'ServiceOffer', content: 'offer' });
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.createdAt).toBe('2026-01-01T00:00:00.000Z');
      expect(result.value.priority).toBe('Normal');

      const pending = fx.ctx.bus.listPending('bob');
      expect(pending.ok && pending.value.map(e => e.id)).toEqual([result.value.id]);
      expect(fx.ctx.metrics.getCounter('bus.sent', { kind: 'ServiceOffer' })).toBe(1);
    });

    it('rejects an unknown sender', async () => {
      const result = await fx.ctx.bus.send({ from: 'mallory', to: 'bob', kind: 'Ping' });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('UnknownAgent');
      expect(result.error.message).toBe('Sender agent mallory not found');
      expect(fx.ctx.mailboxes.stats().envelopes).toBe(0);
    });

    it('rejects a sender that is not an agent', async () => {
      const result = await fx.ctx.bus.send({ from: 'human', to: 'bob', kind: 'Ping' });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('NotAnAgent');
      expect(result.error.message).toBe('Sender human is not an agent');
    });

    it('checks the sender before the recipient', async () => {
      const result = await fx.ctx.bus.send({ from: 'human', to: 'mallory', kind: 'Ping' });
      expect(!result.ok && result.error.code).toBe('NotAnAgent');
    });

    it('rejects an unknown or non-agent recipient', async () => {
      const unknown = await fx.ctx.bus.send({ from: 'alice', to: 'mallory', kind: 'Ping' });
      expect(!unknown.ok && unknown.error.message).toBe('Recipient agent mallory not found');
      const human = await fx.ctx.bus.send({ from: 'alice', to: 'human', kind: 'Ping' });
      expect(!human.ok && human.error.code).toBe('NotAnAgent');
      expect(fx.ctx.metrics.getCounter('bus.rejected')).toBe(2);
    });

    it('rejects an empty recipient id', async () => {
      const result = await fx.ctx.bus.send({ from: 'alice', to: '', kind: 'Ping' });
      expect(!result.ok && result.error.message).toBe('Recipient agent id is missing');
    });

    it('reports an identity lookup failure as InternalError', async () => {
      const broken: IdentityValidator = {
        resolve: async () => { throw new Error('directory offline'); },
      };
      const local = makeFixture({}, { identity: broken });
      const result = await local.ctx.bus.send({ from: 'alice', to: 'bob', kind: 'Ping' });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InternalError');
      expect(result.error.message).toBe('Identity lookup for alice failed: directory offline');
    });

    it('notifies the recipient with a summary', async () => {
      await fx.ctx.bus.send({ from: 'alice', to: 'bob', kind: 'TaskUpdate' });
      expect(fx.notifications.sent).toEqual([{ from: 'alice', to: 'bob', summary: 'A2A Message: TaskUpdate' }]);
    });

    it('still succeeds when notification fails', async () => {
      fx.notifications.failWith = new Error('push gateway down');
      const result = await fx.ctx.bus.send({ from: 'alice', to: 'bob', kind: 'Ping' });
      expect(result.ok).toBe(true);
      expect(fx.ctx.mailboxes.stats().envelopes).toBe(1);
      expect(fx.ctx.metrics.getCounter('bus.notify_failed')).toBe(1);
    });

    it('rejects a retry with a still-pending id', async () => {
      const first = await fx.ctx.bus.send({ id: 'retry-1', from: 'alice', to: 'bob', kind: 'Ping' });
      const second = await fx.ctx.bus.send({ id: 'retry-1', from: 'alice', to: 'bob', kind: 'Ping' });
      expect(first.ok).toBe(true);
      expect(!second.ok && second.error.code).toBe('DuplicateMessage');
      expect(fx.notifications.sent).toHaveLength(1);
    });

    it('keeps both copies under the append policy', async () => {
      const local = makeFixture({ duplicatePolicy: 'append' });
      await local.ctx.bus.send({ id: 'same', from: 'alice', to: 'bob', kind: 'Ping' });
      await local.ctx.bus.send({ id: 'same', from: 'alice', to: 'bob', kind: 'Ping' });
      const pending = local.ctx.bus.listPending('bob');
      expect(pending.ok && pending.value).toHaveLength(2);
    });
  });

  describe('listPending / acknowledge', () => {
    it('acknowledges without identity validation', async () => {
      const sent = await fx.ctx.bus.send({ from: 'alice', to: 'bob', kind: 'Ping' });
      if (!sent.ok) throw sent.error;
      fx.identity.remove('bob');
      const acked = await fx.ctx.bus.acknowledge('bob', sent.value.id);
      expect(acked.ok).toBe(true);
      expect(fx.ctx.metrics.getCounter('bus.acknowledged')).toBe(1);
    });

    it('returns NotFound for a second acknowledge', async () => {
      const sent = await fx.ctx.bus.send({ from: 'alice', to: 'bob', kind: 'Ping' });
      if (!sent.ok) throw sent.error;
      await fx.ctx.bus.acknowledge('bob', sent.value.id);
      const again = await fx.ctx.bus.acknowledge('bob', sent.value.id);
      expect(!again.ok && again.error.code).toBe('NotFound');
    });

    it('hides envelopes once they expire', async () => {
      await fx.ctx.bus.send({ from: 'alice', to: 'bob', kind: 'Ping', expiresAt: fx.clock.iso(60_000) });
      fx.clock.advance(60_000);
      const pending = fx.ctx.bus.listPending('bob');
      expect(pending.ok && pending.value).toEqual([]);
    });
  });

  describe('convenience builders', () => {
    it('sendServiceRequest builds a Normal-priority request', async () => {
      const result = await fx.ctx.bus.sendServiceRequest('alice', 'bob', 'translation', { lang: 'fr' });
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.kind).toBe('ServiceRequest');
      expect(result.value.content).toBe('Request for service: translation');
      expect(result.value.payload).toEqual({ serviceName: 'translation', parameters: { lang: 'fr' } });
      expect(result.value.priority).toBe('Normal');
    });

    it('sendPaymentRequest builds a High-priority request in the configured currency', async () => {
      const result = await fx.ctx.bus.sendPaymentRequest('alice', 'bob', 2.5, 'GPU hours', 'tx-test-1');
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.kind).toBe('PaymentRequest');
      expect(result.value.content).toBe('Payment request: 2.5 SOL for GPU hours');
      expect(result.value.payload).toEqual({ amount: 2.5, description: 'GPU hours', currency: 'SOL' });
      expect(result.value.priority).toBe('High');
      expect(result.value.transactionRef).toBe('tx-test-1');
    });

    it('sendPaymentRequest uses a configured currency', async () => {
      const local = makeFixture({ paymentCurrency: 'USDC' });
      const result = await local.ctx.bus.sendPaymentRequest('alice', 'bob', 3, 'storage');
      expect(result.ok && result.value.content).toBe('Payment request: 3 USDC for storage');
    });

    it('sendPaymentRequest rejects a non-positive amount', async () => {
      const result = await fx.ctx.bus.sendPaymentRequest('alice', 'bob', 0, 'nothing');
      expect(!result.ok && result.error.code).toBe('InvalidArgument');
    });

    it('reply swaps the parties and links the original', async () => {
      const query = await fx.ctx.bus.send({ from: 'alice', to: 'bob', kind: 'CapabilityQuery' });
      if (!query.ok) throw query.error;
      const reply = await fx.ctx.bus.reply(query.value, { kind: 'CapabilityResponse', content: 'translation' });
      expect(reply.ok).toBe(true);
      if (!reply.ok) return;
      expect(reply.value.from).toBe('bob');
      expect(reply.value.to).toBe('alice');
      expect(reply.value.inResponseTo).toBe(query.value.id);
    });
  });
});
