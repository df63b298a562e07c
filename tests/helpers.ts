import * as http from 'node:http';
import { vi } from 'vitest';
import type { Logger } from '../src/logger.js';
import type { HttpRequest } from '../src/types.js';

/**
 * Delay for a specified time
 *
 * @param ms - Milliseconds to delay
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait for a condition to become true
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Timeout in milliseconds (default: 1000)
 * @param interval - Check interval in milliseconds (default: 10)
 * @returns Promise that resolves when condition is met
 */
export function waitForCondition(
  condition: () => boolean,
  timeout = 1000,
  interval = 10
): Promise<void> {
  return new Promise((resolve, reject) => {
    const startTime = Date.now();

    const check = () => {
      if (condition()) {
        resolve();
        return;
      }

      if (Date.now() - startTime >= timeout) {
        reject(new Error(`Condition not met within ${timeout}ms`));
        return;
      }

      setTimeout(check, interval);
    };

    check();
  });
}

/**
 * A promise that the test resolves by hand
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Logger whose methods are spies
 */
export function createMockLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/**
 * Build a request the way HttpHandle does
 */
export function makeRequest(url: string, body = '{}'): HttpRequest {
  const payload = Buffer.from(body);
  return {
    method: 'POST',
    url,
    headers: {
      'Content-Type': 'application/json',
      'Content-Length': String(payload.byteLength),
    },
    body: payload,
  };
}

/**
 * HTTP server on 127.0.0.1, running inside the test process
 */
export interface TestServer {
  url: string;
  readonly connections: number;
  close(): Promise<void>;
}

/**
 * Start an in-process HTTP server on an ephemeral port
 *
 * @example
 * ```typescript
 * const server = await startTestServer((req, res) => res.end('pong'));
 * // ... send to `${server.url}/rpc`
 * await server.close();
 * ```
 */
export async function startTestServer(handler: http.RequestListener): Promise<TestServer> {
  const server = http.createServer(handler);
  let connections = 0;
  server.on('connection', () => {
    connections++;
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', resolve);
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    get connections() {
      return connections;
    },
    close: () =>
      new Promise((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

/**
 * Read a whole request body as UTF-8
 */
export async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}
