/**
 * jsonrpc-http-transport
 * HTTP transport for JSON-RPC clients: one shared client, one dispatch loop,
 * embedded in the caller's event loop or on its own worker thread
 *
 * @module jsonrpc-http-transport
 */

// Transport and builder
export { HttpTransport, HttpTransportBuilder, type ExecutionContext } from './httpTransport.js';

// Per-URL handle
export { HttpHandle } from './handle.js';

// Transport interface consumed by RPC clients
export type { Transport } from './transport.js';

// Reactors
export { EventLoopReactor, type Reactor } from './reactor.js';

// Default network client
export {
  NodeHttpClient,
  createDefaultClient,
  defaultClient,
  isNodeHttpClientOptions,
  type NodeHttpClientOptions,
} from './client.js';

// Dispatch pipeline
export {
  createDispatchPipeline,
  exchange,
  runDispatchLoop,
  type DispatchPipeline,
} from './dispatch.js';

// Channel primitives
export {
  Receiver,
  Sender,
  SlotReader,
  SlotWriter,
  createRequestChannel,
  createResponseSlot,
  type Outcome,
} from './channel.js';

// Types
export type {
  ClientBuilder,
  ClientFactory,
  ClientModule,
  DispatchOptions,
  HttpClient,
  HttpRequest,
  HttpResponse,
  HttpTransportConfig,
  PendingRequest,
  SendOptions,
  TransportStats,
} from './types.js';

// Error class
export {
  HttpTransportError,
  type HttpTransportErrorKind,
  type SerializedHttpTransportError,
} from './error.js';

// Logger
export { createLogger, defaultLogger, noopLogger, type Logger, type LogLevel } from './logger.js';

// Utilities
export { IDGenerator } from './utils/idGenerator.js';
