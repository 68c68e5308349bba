/**
 * AgentBus — mailbox message bus, task delegation and JSON-RPC transcoding
 * for autonomous agents.
 */

// Core
export * from './core/types.js';
export { createLogger, setGlobalLogLevel, getGlobalLogLevel, setLogOutput, resetLogOutput, parseLogLevel, LogLevel, ConsoleLogger } from './core/logger.js';
export type { Logger, LogEntry } from './core/logger.js';
export { MetricsCollector } from './core/metrics.js';
export type { MetricsSnapshot, Tags } from './core/metrics.js';
export { CircuitBreaker, CircuitOpenError } from './core/circuit-breaker.js';
export type { CircuitBreakerConfig, CircuitState } from './core/circuit-breaker.js';
export { SideEffectGuard } from './core/side-effects.js';
export { KeyedLock } from './core/keyed-lock.js';
export { DEFAULT_CONFIG, resolveConfig, loadConfig } from './core/config.js';
export type { BusConfig, BusConfigOverrides, DuplicatePolicy, HttpConfig } from './core/config.js';
export { generateMessageId, generateTaskId } from './core/ids.js';

// Collaborators
export type {
  IdentityResolution,
  IdentityValidator,
  NotificationSink,
  CapabilityDirectory,
  ReputationCollaborator,
} from './collaborators/types.js';
export { InMemoryIdentityDirectory, RecordingNotificationSink, InMemoryReputation } from './collaborators/memory.js';

// Bus
export { finalizeEnvelope, isExpired, compareEnvelopes, replyTo } from './bus/envelope.js';
export { MailboxStore } from './bus/mailbox.js';
export type { MailboxStoreOptions, MailboxStats } from './bus/mailbox.js';
export { MessageBus } from './bus/message-bus.js';
export type { MessageBusDeps, SendHooks } from './bus/message-bus.js';

// Tasks
export { TaskLedger } from './tasks/ledger.js';
export type { TaskLedgerDeps } from './tasks/ledger.js';
export { isTerminal, canTransition, checkTransition } from './tasks/state-machine.js';

// Protocol
export * from './protocol/jsonrpc.js';
export * from './protocol/methods.js';
export { toRequest, fromRequest, PARAM } from './protocol/transcoder.js';
export { RpcDispatcher, JSONRPC_VERSION } from './protocol/dispatcher.js';
export type { RpcDispatcherDeps } from './protocol/dispatcher.js';

// A2A
export { CapabilityRegistry } from './a2a/registry.js';
export type { CapabilityRegistration } from './a2a/registry.js';
export { buildAgentCard, AGENT_CARD_VERSION } from './a2a/agent-card.js';
export type { AgentCard, AgentCardOptions } from './a2a/agent-card.js';

// Context
export { createAgentBus } from './context.js';
export type { AgentBus, AgentBusOptions } from './context.js';

// Transport
export { AgentBusHttpServer, bearerAgentId, SERVER_VERSION } from './transport/http-server.js';
export type { Authenticate, AgentBusHttpServerOptions } from './transport/http-server.js';
export { AgentBusClient, RpcCallError } from './transport/http-client.js';
export type { AgentBusClientOptions, RetryConfig, SendReceipt } from './transport/http-client.js';
