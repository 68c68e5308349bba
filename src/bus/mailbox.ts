/**
 * Mailbox Store — per-agent pending envelopes.
 *
 * One mailbox per recipient, created on first enqueue. Mutations of a mailbox
 * go through a per-agent lock; reads copy the mailbox synchronously, so they
 * never see a half-applied mutation. Expiry is applied when listing, and
 * optionally by a periodic compaction pass.
 */

import type { Envelope, Result } from '../core/types.js';
import { fail, ok } from '../core/types.js';
import type { DuplicatePolicy } from '../core/config.js';
import { KeyedLock } from '../core/keyed-lock.js';
import { createLogger, type Logger } from '../core/logger.js';
import { compareEnvelopes, isExpired } from './envelope.js';

interface StoredEnvelope {
  envelope: Readonly<Envelope>;
  /** Insertion order, the final tie-break */
  seq: number;
}

export interface MailboxStoreOptions {
  duplicatePolicy?: DuplicatePolicy;
  /** 0 or undefined = unbounded */
  maxMailboxSize?: number;
  logger?: Logger;
  now?: () => number;
}

export interface MailboxStats {
  mailboxes: number;
  envelopes: number;
}

export class MailboxStore {
  private mailboxes = new Map<string, StoredEnvelope[]>();
  private lock = new KeyedLock();
  private seq = 0;
  private compactionTimer: ReturnType<typeof setInterval> | null = null;
  private duplicatePolicy: DuplicatePolicy;
  private maxMailboxSize: number;
  private logger: Logger;
  private now: () => number;

  constructor(opts: MailboxStoreOptions = {}) {
    this.duplicatePolicy = opts.duplicatePolicy ?? 'reject';
    this.maxMailboxSize = opts.maxMailboxSize ?? 0;
    this.logger = opts.logger ?? createLogger('MailboxStore');
    this.now = opts.now ?? Date.now;
  }

  /**
   * Append an envelope to the recipient's mailbox.
   * Fails with `DuplicateMessage` under the `reject` policy when the id is
   * still pending there, and with `MailboxFull` when a bounded mailbox has no
   * room even after dropping its expired entries.
   */
  async enqueue(agentId: string, envelope: Envelope): Promise<Result<Envelope>> {
    const stored = freeze(envelope);
    return this.lock.run(agentId, () => {
      let mailbox = this.mailboxes.get(agentId);
      if (!mailbox) {
        mailbox = [];
        this.mailboxes.set(agentId, mailbox);
      }

      if (this.duplicatePolicy === 'reject' && mailbox.some(e => e.envelope.id === stored.id)) {
        return fail('DuplicateMessage', `Message ${stored.id} is already pending for agent ${agentId}`);
      }

      if (this.maxMailboxSize > 0 && mailbox.length >= this.maxMailboxSize) {
        this.dropExpired(agentId, mailbox);
        if (mailbox.length >= this.maxMailboxSize) {
          return fail('MailboxFull', `Mailbox for agent ${agentId} is full (${this.maxMailboxSize} messages)`);
        }
      }

      mailbox.push({ envelope: stored, seq: this.seq++ });
      return ok(stored);
    });
  }

  /** Unexpired envelopes, highest priority first, oldest first within a priority. */
  listPending(agentId: string, nowMs: number = this.now()): Envelope[] {
    const mailbox = this.mailboxes.get(agentId);
    if (!mailbox) return [];
    return mailbox
      .filter(e => !isExpired(e.envelope, nowMs))
      .sort((a, b) => compareEnvelopes(a.envelope, b.envelope) || a.seq - b.seq)
      .map(e => e.envelope);
  }

  /** Remove by id. Expired envelopes are still present and can be acknowledged. */
  async acknowledge(agentId: string, messageId: string): Promise<Result<Envelope>> {
    return this.lock.run(agentId, () => {
      const mailbox = this.mailboxes.get(agentId);
      if (!mailbox) {
        return fail('NotFound', `No mailbox found for agent ${agentId}`);
      }
      const index = mailbox.findIndex(e => e.envelope.id === messageId);
      if (index === -1) {
        return fail('NotFound', `Message ${messageId} not found in mailbox of agent ${agentId}`);
      }
      const [removed] = mailbox.splice(index, 1);
      return ok(removed.envelope);
    });
  }

  /** Whether `messageId` is held (expired or not) in the agent's mailbox. */
  has(agentId: string, messageId: string): boolean {
    return this.mailboxes.get(agentId)?.some(e => e.envelope.id === messageId) ?? false;
  }

  /** Drop expired envelopes from every mailbox. Resolves to the number dropped. */
  async compact(nowMs?: number): Promise<number> {
    let dropped = 0;
    for (const agentId of Array.from(this.mailboxes.keys())) {
      dropped += await this.lock.run(agentId, () => {
        const mailbox = this.mailboxes.get(agentId);
        return mailbox ? this.dropExpired(agentId, mailbox, nowMs) : 0;
      });
    }
    return dropped;
  }

  startCompaction(intervalMs: number, onCompacted?: (dropped: number) => void): void {
    if (this.compactionTimer || intervalMs <= 0) return;
    this.compactionTimer = setInterval(() => {
      this.compact().then(
        dropped => onCompacted?.(dropped),
        (err: unknown) => this.logger.error('Compaction failed', {
          error: err instanceof Error ? err.message : String(err),
        }),
      );
    }, intervalMs);
    this.compactionTimer.unref();
  }

  stopCompaction(): void {
    if (this.compactionTimer) {
      clearInterval(this.compactionTimer);
      this.compactionTimer = null;
    }
  }

  stats(): MailboxStats {
    let envelopes = 0;
    for (const mailbox of this.mailboxes.values()) envelopes += mailbox.length;
    return { mailboxes: this.mailboxes.size, envelopes };
  }

  /** Caller must hold the agent's lock. */
  private dropExpired(agentId: string, mailbox: StoredEnvelope[], nowMs: number = this.now()): number {
    const before = mailbox.length;
    const kept = mailbox.filter(e => !isExpired(e.envelope, nowMs));
    mailbox.splice(0, mailbox.length, ...kept);
    const dropped = before - kept.length;
    if (dropped > 0) {
      this.logger.debug('Dropped expired messages', { agentId, dropped });
    }
    return dropped;
  }
}

/** Stored envelopes are detached deep copies; nothing in them can change after enqueue. */
function freeze(envelope: Envelope): Readonly<Envelope> {
  return deepFreeze(structuredClone(envelope));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
