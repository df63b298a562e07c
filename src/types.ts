import type { SlotWriter } from './channel.js';
import type { HttpTransportError } from './error.js';
import type { Logger } from './logger.js';
import type { Reactor } from './reactor.js';

/**
 * HTTP Transport Types
 */

/**
 * Outgoing HTTP request
 * Always a JSON POST; the body is the raw payload handed to `send`
 */
export interface HttpRequest {
  method: 'POST';
  url: string;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Incoming HTTP response, before its body has been read
 */
export interface HttpResponse {
  status: number;
  body: AsyncIterable<Uint8Array>;

  /**
   * Throw the unread body away so the connection can be reused
   * Called for responses whose status is not 200
   */
  discard?(): void;
}

/**
 * Network client that performs the HTTP exchanges
 *
 * Only the dispatch loop ever calls it, so implementations need no locking
 * and can keep connections alive between requests.
 */
export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Release pooled connections
   * Called once after the dispatch loop has finished
   */
  close?(): void | Promise<void>;
}

/**
 * Constructs the network client for the reactor it will run on
 * Throwing (or rejecting) aborts `build()` with a ClientBuilderError
 */
export type ClientFactory = (
  reactor: Reactor,
  options?: unknown
) => HttpClient | Promise<HttpClient>;

/**
 * A client factory referenced by module, so it can be loaded inside the standalone worker
 */
export interface ClientModule {
  /**
   * Module URL or specifier, resolvable from the worker (use an absolute file URL for local files)
   */
  module: string;

  /**
   * Name of the exported ClientFactory
   * @default 'default'
   */
  exportName?: string;

  /**
   * Options passed to the factory; must be structured-cloneable
   */
  options?: unknown;
}

/**
 * Strategy for creating the network client
 *
 * Functions only work when a reactor is supplied to the builder.
 * Module references work in both embedded and standalone mode.
 */
export type ClientBuilder = ClientFactory | ClientModule;

/**
 * Request queued for the dispatch loop
 */
export interface PendingRequest {
  request: HttpRequest;
  slot: SlotWriter<Buffer, HttpTransportError>;
}

/**
 * Send Options
 * Options that can be passed when sending a payload
 */
export interface SendOptions {
  /**
   * AbortSignal for abandoning the call
   * When aborted, the send is rejected; the HTTP exchange itself still completes
   */
  signal?: AbortSignal;
}

/**
 * Delivery counters of a transport
 */
export interface TransportStats {
  /** Requests accepted onto the channel */
  submitted: number;

  /** Outcomes handed to a waiting caller */
  delivered: number;

  /** Outcomes whose caller had already given up */
  undelivered: number;
}

/**
 * Settings shared by the dispatch pipeline in both execution contexts
 */
export interface DispatchOptions {
  logger: Logger;
  stats: TransportStats;
}

/**
 * HttpTransport builder configuration
 */
export interface HttpTransportConfig {
  /**
   * How the network client is created
   * @default defaultClient()
   */
  client: ClientBuilder;

  /**
   * Reactor to run the dispatch loop on
   * When omitted, a standalone worker thread with its own event loop is started
   */
  reactor?: Reactor;

  /**
   * Enable debug logging
   * @default false
   */
  debug: boolean;

  /**
   * Custom logger; only used on the calling thread
   */
  logger?: Logger;
}
