/**
 * Bus configuration — defaults, environment loading and schema validation.
 */

import AjvModule from 'ajv';
import type { SchemaObject } from 'ajv';
import type { Result } from './types.js';
import { fail, ok } from './types.js';
import type { CircuitBreakerConfig } from './circuit-breaker.js';

// ajv is CommonJS; its class hangs off `.default` under NodeNext typing.
const Ajv = AjvModule.default;

/** What happens when a send reuses the id of an envelope still pending for the recipient. */
export type DuplicatePolicy = 'reject' | 'append';

export interface HttpConfig {
  port: number;
  host: string;
  basePath: string;
  corsOrigins: string[];
}

export interface BusConfig {
  duplicatePolicy: DuplicatePolicy;
  /** 0 means unbounded */
  maxMailboxSize: number;
  /** 0 disables the periodic expired-envelope sweep */
  compactionIntervalMs: number;
  paymentCurrency: string;
  completionReward: number;
  failurePenalty: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  sideEffectBreaker: CircuitBreakerConfig;
  http: HttpConfig;
}

export type BusConfigOverrides = Partial<Omit<BusConfig, 'http' | 'sideEffectBreaker'>> & {
  http?: Partial<HttpConfig>;
  sideEffectBreaker?: Partial<CircuitBreakerConfig>;
};

export const DEFAULT_CONFIG: BusConfig = {
  duplicatePolicy: 'reject',
  maxMailboxSize: 0,
  compactionIntervalMs: 0,
  paymentCurrency: 'SOL',
  completionReward: 10,
  failurePenalty: 5,
  logLevel: 'info',
  sideEffectBreaker: { failureThreshold: 5, resetTimeoutMs: 30_000 },
  http: { port: 8080, host: '127.0.0.1', basePath: '/a2a', corsOrigins: [] },
};

const schema: SchemaObject = {
  type: 'object',
  properties: {
    duplicatePolicy: { type: 'string', enum: ['reject', 'append'] },
    maxMailboxSize: { type: 'integer', minimum: 0 },
    compactionIntervalMs: { type: 'integer', minimum: 0 },
    paymentCurrency: { type: 'string', minLength: 1 },
    completionReward: { type: 'number', minimum: 0 },
    failurePenalty: { type: 'number', minimum: 0 },
    logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error', 'silent'] },
    sideEffectBreaker: {
      type: 'object',
      properties: {
        failureThreshold: { type: 'integer', minimum: 1 },
        resetTimeoutMs: { type: 'integer', minimum: 0 },
      },
      required: ['failureThreshold', 'resetTimeoutMs'],
    },
    http: {
      type: 'object',
      properties: {
        port: { type: 'integer', minimum: 0, maximum: 65535 },
        host: { type: 'string', minLength: 1 },
        basePath: { type: 'string', pattern: '^(/[A-Za-z0-9._~-]+)*$' },
        corsOrigins: { type: 'array', items: { type: 'string' } },
      },
      required: ['port', 'host', 'basePath', 'corsOrigins'],
    },
  },
  required: [
    'duplicatePolicy',
    'maxMailboxSize',
    'compactionIntervalMs',
    'paymentCurrency',
    'completionReward',
    'failurePenalty',
    'logLevel',
    'sideEffectBreaker',
    'http',
  ],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile<BusConfig>(schema);

/** Merge overrides onto the defaults and validate the result. */
export function resolveConfig(overrides: BusConfigOverrides = {}): Result<BusConfig> {
  const merged = {
    ...DEFAULT_CONFIG,
    ...overrides,
    sideEffectBreaker: { ...DEFAULT_CONFIG.sideEffectBreaker, ...overrides.sideEffectBreaker },
    http: { ...DEFAULT_CONFIG.http, ...overrides.http },
  };
  if (!validate(merged)) {
    return fail('InvalidArgument', `Invalid configuration: ${ajv.errorsText(validate.errors)}`);
  }
  return ok(merged);
}

function intFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : Number.NaN;
}

function defined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

/**
 * Read `AGENTBUS_*` variables over the defaults. Unparseable numbers become
 * NaN and fail validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<BusConfig> {
  const duplicatePolicy = env.AGENTBUS_DUPLICATE_POLICY;
  const logLevel = env.AGENTBUS_LOG_LEVEL?.toLowerCase();
  const overrides = defined({
    duplicatePolicy,
    maxMailboxSize: intFromEnv(env.AGENTBUS_MAX_MAILBOX_SIZE),
    compactionIntervalMs: intFromEnv(env.AGENTBUS_COMPACTION_INTERVAL_MS),
    paymentCurrency: env.AGENTBUS_PAYMENT_CURRENCY,
    completionReward: intFromEnv(env.AGENTBUS_COMPLETION_REWARD),
    failurePenalty: intFromEnv(env.AGENTBUS_FAILURE_PENALTY),
    logLevel,
  });
  const http = defined({
    port: intFromEnv(env.AGENTBUS_PORT),
    host: env.AGENTBUS_HOST,
    basePath: env.AGENTBUS_BASE_PATH,
    corsOrigins: env.AGENTBUS_CORS_ORIGINS?.split(',').map(o => o.trim()).filter(Boolean),
  });

  const merged = {
    ...DEFAULT_CONFIG,
    ...overrides,
    sideEffectBreaker: { ...DEFAULT_CONFIG.sideEffectBreaker },
    http: { ...DEFAULT_CONFIG.http, ...http },
  };
  if (!validate(merged)) {
    return fail('InvalidArgument', `Invalid configuration: ${ajv.errorsText(validate.errors)}`);
  }
  return ok(merged);
}
