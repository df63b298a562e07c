import type { MessagePort } from 'node:worker_threads';
import type { SerializedHttpTransportError } from '../error.js';
import type { LogLevel } from '../logger.js';
import type { ClientModule } from '../types.js';

/**
 * Messages exchanged between a transport and its standalone worker
 *
 * Main thread -> worker: `request`, `close`
 * Worker -> main thread: `ready` or `build-error` (once), then `response` per request
 */

/**
 * Data the worker is started with
 */
export interface WorkerInit {
  port: MessagePort;
  client: ClientModule;

  /**
   * Level for the worker's own logger; null disables logging
   */
  logLevel: LogLevel | null;
}

/**
 * Request as posted to the worker (Buffers arrive as plain Uint8Arrays)
 */
export interface PostedRequest {
  url: string;
  headers: Record<string, string>;
  body: Uint8Array;
}

export type PostedOutcome =
  | { ok: true; value: Uint8Array }
  | { ok: false; error: SerializedHttpTransportError };

export type ToWorkerMessage =
  | { type: 'request'; seq: number; request: PostedRequest }
  | { type: 'close' };

export type FromWorkerMessage =
  | { type: 'ready' }
  | { type: 'build-error'; error: SerializedHttpTransportError }
  | { type: 'response'; seq: number; outcome: PostedOutcome };

/**
 * Rewrap bytes that arrived as a plain Uint8Array, without copying them
 */
export function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
