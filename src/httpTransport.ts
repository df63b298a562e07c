import type { Sender } from './channel.js';
import { defaultClient } from './client.js';
import { createDispatchPipeline } from './dispatch.js';
import { HttpTransportError } from './error.js';
import { HttpHandle, type HandleShared } from './handle.js';
import { type Logger, createLogger, defaultLogger, noopLogger } from './logger.js';
import type { Reactor } from './reactor.js';
import { startStandalone } from './standalone/bridge.js';
import type {
  ClientBuilder,
  HttpTransportConfig,
  PendingRequest,
  TransportStats,
} from './types.js';
import { IDGenerator } from './utils/idGenerator.js';

/**
 * Where a transport's dispatch loop runs
 *
 * - embedded: as a task on a reactor the caller supplied and drives
 * - standalone: on a worker thread owned by the transport
 */
export type ExecutionContext =
  | { kind: 'embedded'; reactor: Reactor }
  | { kind: 'standalone'; threadId: number; exited: Promise<number> };

// Releases the producer of a transport or handle that was collected without close()
const releaseOnCollect = new FinalizationRegistry<Sender<PendingRequest>>((sender) => {
  sender.close();
});

/**
 * Builder for {@link HttpTransport}. Created with `HttpTransport.builder()`.
 *
 * Every setter returns a new builder; the one it was called on is unchanged.
 */
export class HttpTransportBuilder {
  /** @internal */
  constructor(private readonly config: HttpTransportConfig) {}

  /**
   * Change how the network client is created
   *
   * Function factories require a reactor (see {@link HttpTransportBuilder.reactor});
   * module references work with and without one.
   */
  client(client: ClientBuilder): HttpTransportBuilder {
    return new HttpTransportBuilder({ ...this.config, client });
  }

  /**
   * Run the transport on the given reactor
   *
   * If this method is not called, the default is to start a standalone worker
   * thread with its own event loop. The thread runs for as long as the
   * returned transport, or any handle to it, is not closed.
   */
  reactor(reactor: Reactor): HttpTransportBuilder {
    return new HttpTransportBuilder({ ...this.config, reactor });
  }

  logger(logger: Logger): HttpTransportBuilder {
    return new HttpTransportBuilder({ ...this.config, logger });
  }

  debug(enabled = true): HttpTransportBuilder {
    return new HttpTransportBuilder({ ...this.config, debug: enabled });
  }

  /**
   * Construct the client and start the dispatch loop
   *
   * @throws HttpTransportError (ClientBuilderError) if the client cannot be created
   * @throws HttpTransportError (ReactorError) if the standalone worker cannot be started
   */
  async build(): Promise<HttpTransport> {
    const { client, reactor, debug } = this.config;
    const logger =
      this.config.logger ?? (debug ? createLogger({ level: 'debug' }) : defaultLogger);
    const stats: TransportStats = { submitted: 0, delivered: 0, undelivered: 0 };

    if (reactor) {
      const pipeline = await createDispatchPipeline(reactor, client, { logger, stats });
      return new HttpTransport(pipeline.sender, { kind: 'embedded', reactor }, stats, logger);
    }

    if (typeof client === 'function') {
      throw HttpTransportError.clientBuilder(
        new Error(
          'A client factory function cannot run on the standalone worker; ' +
            'pass a ClientModule or supply a reactor'
        )
      );
    }

    const standalone = await startStandalone(client, {
      logger,
      stats,
      workerLogLevel: this.config.logger === noopLogger ? null : debug ? 'debug' : 'warn',
    });
    return new HttpTransport(
      standalone.sender,
      { kind: 'standalone', threadId: standalone.threadId, exited: standalone.exited },
      stats,
      logger
    );
  }
}

/**
 * HTTP transport for JSON-RPC clients
 *
 * Owns one network client and one dispatch loop. Every handle created from
 * it submits to that loop, so all requests share the client's connections.
 *
 * @example
 * ```typescript
 * import { HttpTransport } from 'jsonrpc-http-transport';
 *
 * const transport = await HttpTransport.builder().build();
 * const handle = transport.handle('http://localhost:8080/rpc');
 *
 * const reply = await handle.send(Buffer.from('{"jsonrpc":"2.0","method":"ping","id":1}'));
 *
 * handle.close();
 * transport.close(); // worker thread exits once both are closed
 * ```
 */
export class HttpTransport {
  private readonly shared: HandleShared;
  private closed = false;

  /** @internal */
  constructor(
    private readonly sender: Sender<PendingRequest>,
    readonly executionContext: ExecutionContext,
    private readonly stats: TransportStats,
    logger: Logger
  ) {
    this.shared = { ids: new IDGenerator(), stats, logger, registry: releaseOnCollect };
    releaseOnCollect.register(this, sender, this);
  }

  /**
   * Returns the default builder: default client, standalone worker thread
   */
  static builder(): HttpTransportBuilder {
    return new HttpTransportBuilder({ client: defaultClient(), debug: false });
  }

  /**
   * Returns a handle to this transport for the given URI
   *
   * @throws HttpTransportError (InvalidUri) if the URI is not an absolute http(s) URL
   * @throws HttpTransportError (NotListening) if the transport was closed
   */
  handle(uri: string): HttpHandle {
    let url: URL;
    try {
      url = new URL(uri);
    } catch (error) {
      throw HttpTransportError.invalidUri(uri, error);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw HttpTransportError.invalidUri(uri, new Error(`Unsupported protocol ${url.protocol}`));
    }
    if (this.closed) {
      throw HttpTransportError.notListening();
    }

    return new HttpHandle(this.sender.clone(), url.href, this.shared);
  }

  /**
   * Release the transport's own reference
   * Handles already created stay usable until they are closed as well.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    releaseOnCollect.unregister(this);
    this.sender.close();
  }

  /**
   * Whether the dispatch side still accepts requests from this transport
   */
  isClosed(): boolean {
    return this.sender.isClosed();
  }

  getStats(): TransportStats {
    return { ...this.stats };
  }
}
