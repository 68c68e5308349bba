import { randomUUID } from 'node:crypto';

/** Envelope ids are plain UUIDs so they survive a trip through any JSON-RPC peer. */
export function generateMessageId(): string {
  return randomUUID();
}

export function generateTaskId(): string {
  return `task_${randomUUID().replace(/-/g, '').slice(0, 16)}`;
}
