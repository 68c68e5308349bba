/**
 * Shared fixtures: a manual clock and a bus context over in-memory collaborators.
 */

import { createAgentBus, type AgentBus, type AgentBusOptions } from '../src/context.js';
import type { BusConfigOverrides } from '../src/core/config.js';
import {
  InMemoryIdentityDirectory,
  InMemoryReputation,
  RecordingNotificationSink,
} from '../src/collaborators/memory.js';

export const EPOCH = Date.parse('2026-01-01T00:00:00.000Z');

export interface ManualClock {
  now: () => number;
  advance(ms: number): void;
  iso(offsetMs?: number): string;
}

export function manualClock(start = EPOCH): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
    iso(offsetMs = 0) {
      return new Date(current + offsetMs).toISOString();
    },
  };
}

export interface Fixture {
  ctx: AgentBus;
  identity: InMemoryIdentityDirectory;
  notifications: RecordingNotificationSink;
  reputation: InMemoryReputation;
  clock: ManualClock;
}

export function makeFixture(
  config: BusConfigOverrides = {},
  extra: Partial<AgentBusOptions> = {},
): Fixture {
  const identity = new InMemoryIdentityDirectory(['alice', 'bob', 'carol']).addNonAgent('human');
  const notifications = new RecordingNotificationSink();
  const reputation = new InMemoryReputation();
  const clock = manualClock();
  const created = createAgentBus({
    identity,
    notifications,
    reputation,
    config: { logLevel: 'silent', ...config },
    now: clock.now,
    ...extra,
  });
  if (!created.ok) throw created.error;
  return { ctx: created.value, identity, notifications, reputation, clock };
}
