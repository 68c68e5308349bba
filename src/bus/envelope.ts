/**
 * Envelope helpers — finalizing drafts, ordering, expiry.
 */

import type { Envelope, EnvelopeDraft } from '../core/types.js';
import { PRIORITY_RANK } from '../core/types.js';
import { generateMessageId } from '../core/ids.js';

/**
 * Fill in the bus-assigned fields. `id` and `createdAt` are only generated
 * when the draft leaves them unset, so a retried send keeps its id.
 */
export function finalizeEnvelope(draft: EnvelopeDraft, now: Date): Envelope {
  const envelope: Envelope = {
    id: draft.id && draft.id.length > 0 ? draft.id : generateMessageId(),
    from: draft.from,
    to: draft.to,
    kind: draft.kind,
    content: draft.content ?? '',
    payload: { ...draft.payload },
    createdAt: draft.createdAt ?? now.toISOString(),
    priority: draft.priority ?? 'Normal',
    metadata: { ...draft.metadata },
  };
  if (draft.expiresAt !== undefined) envelope.expiresAt = draft.expiresAt;
  if (draft.inResponseTo !== undefined) envelope.inResponseTo = draft.inResponseTo;
  if (draft.transactionRef !== undefined) envelope.transactionRef = draft.transactionRef;
  return envelope;
}

/** An envelope without `expiresAt`, or with an unparseable one, never expires. */
export function isExpired(envelope: Envelope, nowMs: number): boolean {
  if (envelope.expiresAt === undefined) return false;
  const expiresMs = Date.parse(envelope.expiresAt);
  if (Number.isNaN(expiresMs)) return false;
  return expiresMs <= nowMs;
}

/** Priority ascending, then creation time ascending. Equal keys compare as 0. */
export function compareEnvelopes(a: Envelope, b: Envelope): number {
  const byPriority = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  if (byPriority !== 0) return byPriority;
  return timeOf(a.createdAt) - timeOf(b.createdAt);
}

function timeOf(iso: string): number {
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? 0 : ms;
}

/** Build the draft for a reply: sender and recipient swapped, `inResponseTo` set. */
export function replyTo(original: Envelope, reply: Omit<EnvelopeDraft, 'from' | 'to' | 'inResponseTo'>): EnvelopeDraft {
  return {
    ...reply,
    from: original.to,
    to: original.from,
    inResponseTo: original.id,
  };
}
