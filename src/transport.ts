import type { SendOptions } from './types.js';

/**
 * Transport interface consumed by JSON-RPC call plumbing.
 *
 * A Transport moves serialized calls to a server and returns the serialized
 * replies. It is all an RPC client needs from the network.
 *
 * ## Responsibilities
 *
 * The Transport is responsible for:
 * - Issuing call identifiers that are unique for the transport
 * - Moving payload bytes to the server and the reply bytes back
 * - Reporting transport-level failures (HTTP status, network, shutdown)
 *
 * ## NOT Responsible For
 *
 * The Transport should NOT handle:
 * - JSON-RPC serialization or parsing (that's the client's job)
 * - Matching replies to calls by id (each `send` returns its own reply)
 * - Retries (that's the client's job)
 *
 * ## Example Usage
 *
 * ```typescript
 * async function call(transport: Transport, method: string, params: unknown): Promise<unknown> {
 *   const id = transport.getNextId();
 *   const payload = Buffer.from(JSON.stringify({ jsonrpc: '2.0', method, params, id }));
 *
 *   const reply = JSON.parse((await transport.send(payload)).toString('utf8'));
 *   if (reply.error) {
 *     throw new Error(reply.error.message);
 *   }
 *   return reply.result;
 * }
 * ```
 */
export interface Transport {
  /**
   * Return a fresh call identifier.
   *
   * Synchronous and free of I/O. Never returns the same value twice for one
   * transport, whichever handle it is called on.
   */
  getNextId(): number;

  /**
   * Send a serialized call and wait for the serialized reply.
   *
   * Never blocks the caller; every failure, including HTTP and network
   * errors, rejects the returned promise.
   *
   * @param payload - Serialized request, sent as the body unmodified
   * @param options - Send options (abort signal)
   * @returns Promise resolving with the raw response body
   * @throws HttpTransportError describing the failure
   */
  send(payload: Uint8Array, options?: SendOptions): Promise<Buffer>;
}
