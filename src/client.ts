import * as http from 'node:http';
import * as https from 'node:https';
import type { Reactor } from './reactor.js';
import type { ClientModule, HttpClient, HttpRequest, HttpResponse } from './types.js';
import { isRecord } from './utils/typeGuards.js';

/**
 * Options for the default network client
 */
export interface NodeHttpClientOptions {
  /**
   * Keep sockets open between requests
   * @default true
   */
  keepAlive?: boolean;

  /**
   * Maximum sockets per host
   * @default Infinity
   */
  maxSockets?: number;

  /**
   * Socket inactivity timeout in milliseconds; the exchange fails when it elapses
   * @default undefined (no timeout)
   */
  timeout?: number;
}

/**
 * Type guard to check if a value is a valid set of NodeHttpClientOptions
 */
export function isNodeHttpClientOptions(value: unknown): value is NodeHttpClientOptions {
  return (
    isRecord(value) &&
    (value.keepAlive === undefined || typeof value.keepAlive === 'boolean') &&
    (value.maxSockets === undefined ||
      (typeof value.maxSockets === 'number' && value.maxSockets > 0)) &&
    (value.timeout === undefined || (typeof value.timeout === 'number' && value.timeout > 0))
  );
}

/**
 * Default network client, built on node:http and node:https
 *
 * One keep-alive agent per protocol is shared by every request, so
 * consecutive requests to the same host reuse connections.
 */
export class NodeHttpClient implements HttpClient {
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private timeout?: number;

  constructor(options: NodeHttpClientOptions = {}) {
    const agentOptions = {
      keepAlive: options.keepAlive ?? true,
      maxSockets: options.maxSockets ?? Number.POSITIVE_INFINITY,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);
    this.timeout = options.timeout;
  }

  request(request: HttpRequest): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage): void => {
        resolve({
          status: res.statusCode ?? 0,
          body: res,
          discard: () => {
            res.resume();
          },
        });
      };
      const options = {
        method: request.method,
        headers: request.headers,
        timeout: this.timeout,
      };

      const req = request.url.startsWith('https:')
        ? https.request(request.url, { ...options, agent: this.httpsAgent }, onResponse)
        : http.request(request.url, { ...options, agent: this.httpAgent }, onResponse);

      req.on('error', reject);
      req.on('timeout', () => {
        req.destroy(new Error(`Request timed out after ${this.timeout}ms`));
      });
      req.end(request.body);
    });
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

/**
 * Client factory used by `defaultClient()`
 *
 * @throws Error if the options are not valid NodeHttpClientOptions
 */
export function createDefaultClient(_reactor: Reactor, options: unknown = {}): HttpClient {
  if (!isNodeHttpClientOptions(options)) {
    throw new Error('Invalid NodeHttpClientOptions');
  }
  return new NodeHttpClient(options);
}

/**
 * Reference to the default client factory
 * Usable in both embedded and standalone mode
 *
 * @example
 * ```typescript
 * const transport = await HttpTransport.builder()
 *   .client(defaultClient({ maxSockets: 8, timeout: 10_000 }))
 *   .build();
 * ```
 */
export function defaultClient(options?: NodeHttpClientOptions): ClientModule {
  return {
    module: import.meta.url,
    exportName: 'createDefaultClient',
    ...(options !== undefined && { options }),
  };
}
