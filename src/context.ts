/**
 * Bus context — wires configuration, logging, metrics and the collaborators
 * into one object. Nothing here is global: two contexts never share state.
 */

import type { AgentRanking, Result } from './core/types.js';
import { fail, ok } from './core/types.js';
import { resolveConfig, type BusConfig, type BusConfigOverrides } from './core/config.js';
import { createLogger, parseLogLevel, type Logger } from './core/logger.js';
import { MetricsCollector } from './core/metrics.js';
import { SideEffectGuard } from './core/side-effects.js';
import type { IdentityValidator, NotificationSink, ReputationCollaborator } from './collaborators/types.js';
import { MailboxStore } from './bus/mailbox.js';
import { MessageBus } from './bus/message-bus.js';
import { TaskLedger } from './tasks/ledger.js';
import { CapabilityRegistry } from './a2a/registry.js';
import { RpcDispatcher } from './protocol/dispatcher.js';

export interface AgentBusOptions {
  identity: IdentityValidator;
  notifications?: NotificationSink;
  reputation?: ReputationCollaborator;
  config?: BusConfigOverrides;
  /** Parent logger; each component logs through a child bound to its name. */
  logger?: Logger;
  /** Advertised JSON-RPC endpoint for agent cards. Defaults to the HTTP binding's address. */
  cardEndpoint?: (agentId: string) => string;
  now?: () => number;
}

export interface AgentBus {
  config: BusConfig;
  logger: Logger;
  metrics: MetricsCollector;
  mailboxes: MailboxStore;
  bus: MessageBus;
  tasks: TaskLedger;
  registry: CapabilityRegistry;
  dispatcher: RpcDispatcher;
  /** Leaderboard from the reputation collaborator, highest score first. */
  topAgents(limit?: number): Promise<Result<AgentRanking[]>>;
  /** Start background work (periodic compaction, when configured). */
  start(): void;
  stop(): void;
}

export function createAgentBus(options: AgentBusOptions): Result<AgentBus> {
  const resolved = resolveConfig(options.config);
  if (!resolved.ok) return resolved;
  const config = resolved.value;

  const level = parseLogLevel(config.logLevel);
  const parent = options.logger;
  const loggerFor = (component: string): Logger =>
    parent ? parent.child({ component }) : createLogger(component, level);

  const now = options.now ?? Date.now;
  const logger = loggerFor('AgentBus');
  const metrics = new MetricsCollector();
  const sideEffects = new SideEffectGuard(config.sideEffectBreaker, loggerFor('SideEffects'), metrics, now);

  const mailboxes = new MailboxStore({
    duplicatePolicy: config.duplicatePolicy,
    maxMailboxSize: config.maxMailboxSize,
    logger: loggerFor('MailboxStore'),
    now,
  });

  const bus = new MessageBus({
    identity: options.identity,
    notifications: options.notifications,
    mailboxes,
    sideEffects,
    logger: loggerFor('MessageBus'),
    metrics,
    paymentCurrency: config.paymentCurrency,
    now,
  });

  const reputation = options.reputation;
  const tasks = new TaskLedger({
    bus,
    reputation,
    sideEffects,
    logger: loggerFor('TaskLedger'),
    metrics,
    completionReward: config.completionReward,
    failurePenalty: config.failurePenalty,
    now,
  });

  const registry = new CapabilityRegistry(options.identity);
  const { host, port, basePath } = config.http;
  const dispatcher = new RpcDispatcher({
    bus,
    directory: registry,
    logger: loggerFor('RpcDispatcher'),
    metrics,
    cardEndpoint: options.cardEndpoint ?? (() => `http://${host}:${port}${basePath}/jsonrpc`),
    now,
  });

  return ok({
    config,
    logger,
    metrics,
    mailboxes,
    bus,
    tasks,
    registry,
    dispatcher,

    async topAgents(limit = 10): Promise<Result<AgentRanking[]>> {
      if (!reputation?.ranking) {
        return fail('NotConfigured', 'Reputation collaborator does not provide rankings');
      }
      try {
        return ok(await reputation.ranking(limit));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error('Ranking lookup failed', { error: message });
        return fail('InternalError', `Ranking lookup failed: ${message}`);
      }
    },

    start(): void {
      if (config.compactionIntervalMs <= 0) return;
      mailboxes.startCompaction(config.compactionIntervalMs, dropped => {
        if (dropped > 0) metrics.counter('mailbox.compacted', undefined, dropped);
      });
      logger.info('Mailbox compaction started', { intervalMs: config.compactionIntervalMs });
    },

    stop(): void {
      mailboxes.stopCompaction();
    },
  });
}
