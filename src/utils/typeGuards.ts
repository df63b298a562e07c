import { MessagePort } from 'node:worker_threads';
import { HttpTransportError, type SerializedHttpTransportError } from '../error.js';
import { isLogLevel } from '../logger.js';
import type {
  FromWorkerMessage,
  PostedOutcome,
  PostedRequest,
  ToWorkerMessage,
  WorkerInit,
} from '../standalone/protocol.js';
import type { ClientModule } from '../types.js';

/**
 * Type guard to check if a value is a non-null, non-array object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard to check if a value is a module-referenced client factory
 * Module reference has: module (string), exportName (optional string), options (optional)
 */
export function isClientModule(value: unknown): value is ClientModule {
  return (
    isRecord(value) &&
    typeof value.module === 'string' &&
    (value.exportName === undefined || typeof value.exportName === 'string')
  );
}

/**
 * Type guard to check if a value is a serialized transport error
 */
export function isSerializedError(value: unknown): value is SerializedHttpTransportError {
  return (
    isRecord(value) &&
    HttpTransportError.isKind(value.kind) &&
    typeof value.message === 'string' &&
    (value.status === undefined || typeof value.status === 'number') &&
    (value.cause === undefined || typeof value.cause === 'string')
  );
}

function isPostedRequest(value: unknown): value is PostedRequest {
  return (
    isRecord(value) &&
    typeof value.url === 'string' &&
    isRecord(value.headers) &&
    Object.values(value.headers).every((header) => typeof header === 'string') &&
    value.body instanceof Uint8Array
  );
}

function isPostedOutcome(value: unknown): value is PostedOutcome {
  if (!isRecord(value)) {
    return false;
  }
  if (value.ok === true) {
    return value.value instanceof Uint8Array;
  }
  return value.ok === false && isSerializedError(value.error);
}

/**
 * Type guard for messages posted to the standalone worker
 */
export function isToWorkerMessage(value: unknown): value is ToWorkerMessage {
  if (!isRecord(value)) {
    return false;
  }
  if (value.type === 'close') {
    return true;
  }
  return (
    value.type === 'request' && typeof value.seq === 'number' && isPostedRequest(value.request)
  );
}

/**
 * Type guard for messages posted back by the standalone worker
 */
export function isFromWorkerMessage(value: unknown): value is FromWorkerMessage {
  if (!isRecord(value)) {
    return false;
  }
  switch (value.type) {
    case 'ready':
      return true;
    case 'build-error':
      return isSerializedError(value.error);
    case 'response':
      return typeof value.seq === 'number' && isPostedOutcome(value.outcome);
    default:
      return false;
  }
}

/**
 * Type guard for the data a standalone worker is started with
 */
export function isWorkerInit(value: unknown): value is WorkerInit {
  return (
    isRecord(value) &&
    value.port instanceof MessagePort &&
    isClientModule(value.client) &&
    (value.logLevel === null || isLogLevel(value.logLevel))
  );
}
