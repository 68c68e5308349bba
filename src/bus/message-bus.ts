/**
 * Message Bus — the public send / list / acknowledge surface.
 *
 * Validates both parties through the identity collaborator, stamps the
 * envelope, enqueues it and then fires a best-effort delivery notification.
 * A send is successful once the envelope is in the mailbox; the notification
 * outcome never changes that.
 */

import type { BusError, Envelope, EnvelopeDraft, Result } from '../core/types.js';
import { fail, ok } from '../core/types.js';
import type { IdentityResolution, IdentityValidator, NotificationSink } from '../collaborators/types.js';
import type { Logger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import type { SideEffectGuard } from '../core/side-effects.js';
import type { MailboxStore } from './mailbox.js';
import { finalizeEnvelope, replyTo } from './envelope.js';

export interface MessageBusDeps {
  identity: IdentityValidator;
  notifications?: NotificationSink;
  mailboxes: MailboxStore;
  sideEffects: SideEffectGuard;
  logger: Logger;
  metrics: MetricsCollector;
  paymentCurrency?: string;
  now?: () => number;
}

export interface SendHooks {
  /** Runs once the envelope is in the mailbox, before the notification goes out. */
  onEnqueued?: (envelope: Envelope) => void;
}

export class MessageBus {
  private identity: IdentityValidator;
  private notifications?: NotificationSink;
  private mailboxes: MailboxStore;
  private sideEffects: SideEffectGuard;
  private logger: Logger;
  private metrics: MetricsCollector;
  private paymentCurrency: string;
  private now: () => number;

  constructor(deps: MessageBusDeps) {
    this.identity = deps.identity;
    this.notifications = deps.notifications;
    this.mailboxes = deps.mailboxes;
    this.sideEffects = deps.sideEffects;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.paymentCurrency = deps.paymentCurrency ?? 'SOL';
    this.now = deps.now ?? Date.now;
  }

  /**
   * Validate, stamp and enqueue. Under the `reject` duplicate policy a retry
   * with an id that is still pending fails with `DuplicateMessage`, which
   * makes retries safe to repeat.
   */
  async send(draft: EnvelopeDraft, hooks: SendHooks = {}): Promise<Result<Envelope>> {
    const fromCheck = await this.validateAgent(draft.from, 'Sender');
    if (!fromCheck.ok) return this.reject(draft, fromCheck);
    const toCheck = await this.validateAgent(draft.to, 'Recipient');
    if (!toCheck.ok) return this.reject(draft, toCheck);

    const envelope = finalizeEnvelope(draft, new Date(this.now()));
    const enqueued = await this.mailboxes.enqueue(envelope.to, envelope);
    if (!enqueued.ok) return this.reject(draft, enqueued);

    this.metrics.counter('bus.sent', { kind: envelope.kind });
    this.logger.debug('Message enqueued', {
      messageId: envelope.id,
      from: envelope.from,
      to: envelope.to,
      kind: envelope.kind,
    });

    hooks.onEnqueued?.(enqueued.value);
    await this.notify(enqueued.value);
    return enqueued;
  }

  listPending(agentId: string): Result<Envelope[]> {
    return ok(this.mailboxes.listPending(agentId));
  }

  async acknowledge(agentId: string, messageId: string): Promise<Result<Envelope>> {
    const result = await this.mailboxes.acknowledge(agentId, messageId);
    if (result.ok) {
      this.metrics.counter('bus.acknowledged');
    }
    return result;
  }

  /** Send a response to `original`: sender and recipient swapped, `inResponseTo` set. */
  async reply(
    original: Envelope,
    draft: Omit<EnvelopeDraft, 'from' | 'to' | 'inResponseTo'>,
  ): Promise<Result<Envelope>> {
    return this.send(replyTo(original, draft));
  }

  async sendServiceRequest(
    from: string,
    to: string,
    serviceName: string,
    parameters: Record<string, unknown> = {},
  ): Promise<Result<Envelope>> {
    return this.send({
      from,
      to,
      kind: 'ServiceRequest',
      content: `Request for service: ${serviceName}`,
      payload: { serviceName, parameters },
      priority: 'Normal',
    });
  }

  async sendPaymentRequest(
    from: string,
    to: string,
    amount: number,
    description: string,
    transactionRef?: string,
  ): Promise<Result<Envelope>> {
    if (!Number.isFinite(amount) || amount <= 0) {
      return fail('InvalidArgument', `Payment amount must be a positive number, got ${amount}`);
    }
    return this.send({
      from,
      to,
      kind: 'PaymentRequest',
      content: `Payment request: ${amount} ${this.paymentCurrency} for ${description}`,
      payload: { amount, description, currency: this.paymentCurrency },
      priority: 'High',
      transactionRef,
    });
  }

  private async validateAgent(id: string, role: 'Sender' | 'Recipient'): Promise<Result<void>> {
    if (typeof id !== 'string' || id.length === 0) {
      return fail('UnknownAgent', `${role} agent id is missing`);
    }
    let resolved: IdentityResolution;
    try {
      resolved = await this.identity.resolve(id);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error('Identity lookup failed', { agentId: id, error: message });
      return fail('InternalError', `Identity lookup for ${id} failed: ${message}`);
    }
    if (!resolved.exists) {
      return fail('UnknownAgent', `${role} agent ${id} not found`);
    }
    if (!resolved.isAgent) {
      return fail('NotAnAgent', `${role} ${id} is not an agent`);
    }
    return ok(undefined);
  }

  private reject(draft: EnvelopeDraft, failure: { ok: false; error: BusError }): Result<never> {
    this.metrics.counter('bus.rejected', { reason: failure.error.code });
    this.logger.info('Send rejected', {
      from: draft.from,
      to: draft.to,
      kind: draft.kind,
      reason: failure.error.code,
      error: failure.error.message,
    });
    return failure;
  }

  private async notify(envelope: Envelope): Promise<void> {
    const sink = this.notifications;
    if (!sink) return;
    const delivered = await this.sideEffects.attempt(
      'notification',
      () => sink.notify(envelope.from, envelope.to, `A2A Message: ${envelope.kind}`),
      { messageId: envelope.id },
    );
    if (!delivered) {
      this.metrics.counter('bus.notify_failed');
    }
  }
}
