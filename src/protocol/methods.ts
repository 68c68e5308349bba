/**
 * Wire method names for each message kind.
 */

import type { MessageKind } from '../core/types.js';

export const UNKNOWN_METHOD = 'unknown_method';

/** Kinds without an entry here transcode to `unknown_method`. */
const KIND_TO_METHOD = {
  CapabilityQuery: 'capability_query',
  CapabilityResponse: 'capability_response',
  ServiceRequest: 'service_request',
  ServiceOffer: 'service_offer',
  TaskDelegation: 'task_delegation',
  TaskAcceptance: 'task_acceptance',
  TaskRejection: 'task_rejection',
  TaskUpdate: 'task_update',
  TaskCompletion: 'task_completion',
  PaymentRequest: 'payment_request',
  PaymentConfirmation: 'payment_confirmation',
  PaymentRejection: 'payment_rejection',
  NegotiationStart: 'negotiation_start',
  NegotiationOffer: 'negotiation_offer',
  NegotiationAccept: 'negotiation_accept',
  NegotiationReject: 'negotiation_reject',
  Ping: 'ping',
  Pong: 'pong',
} as const satisfies Partial<Record<MessageKind, string>>;

export type WireKind = keyof typeof KIND_TO_METHOD;
export type WireMethod = (typeof KIND_TO_METHOD)[WireKind];

const METHOD_TO_KIND = new Map<string, WireKind>();
for (const [kind, method] of Object.entries(KIND_TO_METHOD)) {
  if (isWireKind(kind)) METHOD_TO_KIND.set(method, kind);
}

export function isWireKind(kind: string): kind is WireKind {
  return Object.prototype.hasOwnProperty.call(KIND_TO_METHOD, kind);
}

export function methodForKind(kind: MessageKind): string {
  return isWireKind(kind) ? KIND_TO_METHOD[kind] : UNKNOWN_METHOD;
}

/** Unmapped method names read back as the `Error` kind. */
export function kindForMethod(method: string): MessageKind {
  return METHOD_TO_KIND.get(method) ?? 'Error';
}

export function isKnownMethod(method: string): method is WireMethod {
  return METHOD_TO_KIND.has(method);
}

export const WIRE_METHODS: readonly string[] = Object.values(KIND_TO_METHOD);

/** Methods answered by the dispatcher itself rather than delivered as envelopes. */
export const RPC_METHODS = {
  Ping: 'ping',
  CapabilityQuery: 'capability_query',
  FindAgentsByService: 'find_agents_by_service',
  GetAgentCard: 'get_agent_card',
} as const;
