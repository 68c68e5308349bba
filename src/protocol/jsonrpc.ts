/**
 * JSON-RPC 2.0 message shapes and error codes.
 */

import AjvModule from 'ajv';
import type { SchemaObject } from 'ajv';

const Ajv = AjvModule.default;

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: string;
  method: string;
  /** By-name params; anything else is read as empty */
  params?: unknown;
  id?: JsonRpcId;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; result: unknown; id: JsonRpcId }
  | { jsonrpc: '2.0'; error: JsonRpcError; id: JsonRpcId };

export const JsonRpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  // Agent protocol
  AgentNotFound: -32001,
} as const;

export function successResponse(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', result, id };
}

export function errorResponse(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  const error: JsonRpcError = { code, message };
  if (data !== undefined) error.data = data;
  return { jsonrpc: '2.0', error, id };
}

// ── Structural validation ──

/** Shape only; the version value itself is checked by the dispatcher. */
const requestSchema: SchemaObject = {
  type: 'object',
  properties: {
    jsonrpc: { type: 'string' },
    method: { type: 'string', minLength: 1 },
    id: { type: ['string', 'number', 'null'] },
  },
  required: ['jsonrpc', 'method'],
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateRequest = ajv.compile<JsonRpcRequest>(requestSchema);

export type RequestCheck =
  | { valid: true; request: JsonRpcRequest }
  | { valid: false; id: JsonRpcId; reason: string };

/** Validate an untrusted value as a JSON-RPC request object. */
export function checkRequest(value: unknown): RequestCheck {
  if (validateRequest(value)) {
    return { valid: true, request: value };
  }
  return { valid: false, id: extractId(value), reason: ajv.errorsText(validateRequest.errors) };
}

/** Best-effort id for error responses to requests that failed validation. */
export function extractId(value: unknown): JsonRpcId {
  if (typeof value !== 'object' || value === null || !('id' in value)) return null;
  const id = value.id;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

const responseSchema: SchemaObject = {
  type: 'object',
  properties: {
    jsonrpc: { const: '2.0' },
    id: { type: ['string', 'number', 'null'] },
    error: {
      type: 'object',
      properties: {
        code: { type: 'integer' },
        message: { type: 'string' },
      },
      required: ['code', 'message'],
    },
  },
  required: ['jsonrpc', 'id'],
  oneOf: [
    { type: 'object', required: ['result'] },
    { type: 'object', required: ['error'] },
  ],
};

/** Type guard for responses read off the wire. */
export const isJsonRpcResponse = ajv.compile<JsonRpcResponse>(responseSchema);
