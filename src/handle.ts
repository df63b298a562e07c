import { type Outcome, type Sender, createResponseSlot } from './channel.js';
import { HttpTransportError } from './error.js';
import type { Logger } from './logger.js';
import type { Transport } from './transport.js';
import type { HttpRequest, PendingRequest, SendOptions, TransportStats } from './types.js';
import type { IDGenerator } from './utils/idGenerator.js';

/**
 * State a handle shares with its transport
 * @internal
 */
export interface HandleShared {
  ids: IDGenerator;
  stats: TransportStats;
  logger: Logger;
  registry: FinalizationRegistry<Sender<PendingRequest>>;
}

/**
 * A handle to an HttpTransport, bound to one URL
 *
 * Implements {@link Transport} and can be given to an RPC client as its
 * transport object. Handles are cheap: every handle of a transport submits
 * to the same dispatch loop and draws ids from the same counter.
 *
 * @example
 * ```typescript
 * const handle = transport.handle('http://localhost:8080/rpc');
 *
 * const id = handle.getNextId();
 * const payload = JSON.stringify({ jsonrpc: '2.0', method: 'ping', id });
 * const response = await handle.send(Buffer.from(payload));
 * console.log(JSON.parse(response.toString('utf8')));
 *
 * handle.close();
 * ```
 */
export class HttpHandle implements Transport {
  /** @internal */
  constructor(
    private readonly sender: Sender<PendingRequest>,
    readonly uri: string,
    private readonly shared: HandleShared
  ) {
    shared.registry.register(this, sender, this);
  }

  getNextId(): number {
    return this.shared.ids.next();
  }

  async send(payload: Uint8Array, options?: SendOptions): Promise<Buffer> {
    const request = this.createRequest(payload);
    const [slot, reader] = createResponseSlot<Buffer, HttpTransportError>();

    if (!this.sender.send({ request, slot })) {
      throw HttpTransportError.notListening();
    }
    this.shared.stats.submitted++;

    let outcome: Outcome<Buffer, HttpTransportError> | undefined;
    try {
      outcome = await reader.receive(options?.signal);
    } catch (reason) {
      this.shared.logger.debug('Send abandoned by caller:', { url: this.uri });
      throw HttpTransportError.aborted(reason);
    }

    if (outcome === undefined) {
      throw HttpTransportError.diedWithoutResponse();
    }
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  /**
   * Create another handle for the same URL
   */
  clone(): HttpHandle {
    return new HttpHandle(this.sender.clone(), this.uri, this.shared);
  }

  /**
   * Release this handle
   * Once the transport and all of its handles are released, the dispatch loop stops.
   */
  close(): void {
    this.shared.registry.unregister(this);
    this.sender.close();
  }

  isClosed(): boolean {
    return this.sender.isClosed();
  }

  /**
   * Creates a POST request with JSON content type and the given body data
   */
  private createRequest(payload: Uint8Array): HttpRequest {
    const body = Buffer.from(payload);
    return {
      method: 'POST',
      url: this.uri,
      headers: {
        'Content-Type': 'application/json',
        'Content-Length': String(body.byteLength),
      },
      body,
    };
  }
}
