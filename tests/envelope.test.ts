import { describe, it, expect } from 'vitest';
import { compareEnvelopes, finalizeEnvelope, isExpired, replyTo } from '../src/bus/envelope.js';
import type { Envelope } from '../src/core/types.js';
import { EPOCH } from './helpers.js';

const NOW = new Date(EPOCH);

function envelope(overrides: Partial<Envelope> = {}): Envelope {
  return finalizeEnvelope({ from: 'alice', to: 'bob', kind: 'Ping', ...overrides }, NOW);
}

describe('finalizeEnvelope', () => {
  it('fills in id, timestamp, priority and empty maps', () => {
    const env = finalizeEnvelope({ from: 'alice', to: 'bob', kind: 'ServiceOffer' }, NOW);
    expect(env.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(env.createdAt).toBe('2026-01-01T00:00:00.000Z');
    expect(env.priority).toBe('Normal');
    expect(env.content).toBe('');
    expect(env.payload).toEqual({});
    expect(env.metadata).toEqual({});
    expect('expiresAt' in env).toBe(false);
  });

  it('keeps caller-supplied id and createdAt', () => {
    const env = finalizeEnvelope(
      { id: 'msg-1', from: 'alice', to: 'bob', kind: 'Ping', createdAt: '2025-12-31T23:00:00.000Z' },
      NOW,
    );
    expect(env.id).toBe('msg-1');
    expect(env.createdAt).toBe('2025-12-31T23:00:00.000Z');
  });

  it('generates an id when the draft id is empty', () => {
    expect(envelope({ id: '' }).id).not.toBe('');
  });

  it('copies payload so later edits to the draft do not leak', () => {
    const payload = { amount: 1 };
    const env = finalizeEnvelope({ from: 'alice', to: 'bob', kind: 'PaymentRequest', payload }, NOW);
    payload.amount = 2;
    expect(env.payload).toEqual({ amount: 1 });
  });
});

describe('isExpired', () => {
  it('never expires without expiresAt', () => {
    expect(isExpired(envelope(), EPOCH + 1e12)).toBe(false);
  });

  it('is expired at and after expiresAt', () => {
    const env = envelope({ expiresAt: '2026-01-01T00:00:10.000Z' });
    expect(isExpired(env, EPOCH + 9_999)).toBe(false);
    expect(isExpired(env, EPOCH + 10_000)).toBe(true);
  });

  it('treats an unparseable expiresAt as never expiring', () => {
    expect(isExpired(envelope({ expiresAt: 'soon' }), EPOCH)).toBe(false);
  });
});

describe('compareEnvelopes', () => {
  it('orders by priority before time', () => {
    const low = envelope({ priority: 'Low', createdAt: '2025-01-01T00:00:00.000Z' });
    const urgent = envelope({ priority: 'Urgent', createdAt: '2026-06-01T00:00:00.000Z' });
    expect(compareEnvelopes(urgent, low)).toBeLessThan(0);
  });

  it('orders equal priorities oldest first', () => {
    const older = envelope({ createdAt: '2026-01-01T00:00:00.000Z' });
    const newer = envelope({ createdAt: '2026-01-01T00:00:01.000Z' });
    expect(compareEnvelopes(older, newer)).toBeLessThan(0);
    expect(compareEnvelopes(older, envelope({ createdAt: older.createdAt }))).toBe(0);
  });
});

describe('replyTo', () => {
  it('swaps parties and links the original', () => {
    const original = envelope({ id: 'q-1', kind: 'CapabilityQuery' });
    const reply = replyTo(original, { kind: 'CapabilityResponse', content: 'here' });
    expect(reply).toEqual({
      kind: 'CapabilityResponse',
      content: 'here',
      from: 'bob',
      to: 'alice',
      inResponseTo: 'q-1',
    });
  });
});
