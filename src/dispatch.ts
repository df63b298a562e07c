import {
  type Outcome,
  type Receiver,
  type Sender,
  type SlotWriter,
  createRequestChannel,
} from './channel.js';
import { HttpTransportError } from './error.js';
import type { Reactor } from './reactor.js';
import type {
  ClientBuilder,
  ClientFactory,
  DispatchOptions,
  HttpClient,
  HttpRequest,
  HttpResponse,
  PendingRequest,
} from './types.js';
import { isRecord } from './utils/typeGuards.js';

/**
 * A running dispatch loop and the channel feeding it
 */
export interface DispatchPipeline {
  /**
   * Producer side of the request channel; release it (and every clone) to stop the loop
   */
  sender: Sender<PendingRequest>;

  /**
   * Resolves once the loop has finished and the client has been closed
   */
  done: Promise<void>;
}

/**
 * Type guard to check if a value implements HttpClient
 */
export function isHttpClient(value: unknown): value is HttpClient {
  return (
    isRecord(value) &&
    typeof value.request === 'function' &&
    (value.close === undefined || typeof value.close === 'function')
  );
}

/**
 * Turn a client strategy into a factory function
 * Module references are imported on the thread that calls this
 */
export async function resolveClientFactory(builder: ClientBuilder): Promise<ClientFactory> {
  if (typeof builder === 'function') {
    return builder;
  }

  const exportName = builder.exportName ?? 'default';
  const loaded: unknown = await import(builder.module);
  const factory = isRecord(loaded) ? loaded[exportName] : undefined;

  if (typeof factory !== 'function') {
    throw new Error(`Module ${builder.module} has no client factory export '${exportName}'`);
  }

  return async (reactor) => {
    const client: unknown = await factory(reactor, builder.options);
    if (!isHttpClient(client)) {
      throw new Error(`Client factory '${exportName}' did not return an HttpClient`);
    }
    return client;
  };
}

/**
 * Perform one HTTP exchange and collect its outcome
 *
 * - request fails: NetworkError
 * - status other than 200: HttpError carrying the status
 * - status 200: the whole body as one Buffer
 */
export async function exchange(
  client: HttpClient,
  request: HttpRequest
): Promise<Outcome<Buffer, HttpTransportError>> {
  let response: HttpResponse;
  try {
    response = await client.request(request);
  } catch (error) {
    return { ok: false, error: HttpTransportError.network(error) };
  }

  if (response.status !== 200) {
    response.discard?.();
    return { ok: false, error: HttpTransportError.http(response.status) };
  }

  const chunks: Uint8Array[] = [];
  try {
    for await (const chunk of response.body) {
      chunks.push(chunk);
    }
  } catch (error) {
    return { ok: false, error: HttpTransportError.network(error) };
  }

  return { ok: true, value: Buffer.concat(chunks) };
}

/**
 * Hand an outcome to the waiting caller
 *
 * A caller that already gave up cannot receive it; that is logged and
 * counted, never thrown.
 *
 * @returns true if the caller received the outcome
 */
export function deliver(
  slot: SlotWriter<Buffer, HttpTransportError>,
  outcome: Outcome<Buffer, HttpTransportError>,
  options: DispatchOptions
): boolean {
  if (slot.send(outcome)) {
    options.stats.delivered++;
    return true;
  }

  options.stats.undelivered++;
  options.logger.warn('Unable to send response back to caller');
  return false;
}

async function processRequest(
  pending: PendingRequest,
  client: HttpClient,
  options: DispatchOptions
): Promise<void> {
  try {
    const outcome = await exchange(client, pending.request);
    options.logger.debug('Request completed:', {
      url: pending.request.url,
      ok: outcome.ok,
    });
    deliver(pending.slot, outcome, options);
  } catch (error) {
    options.logger.error('Request processing failed:', error);
  } finally {
    // No-op once delivered; otherwise the caller sees DiedWithoutResponse
    pending.slot.drop();
  }
}

/**
 * Drain the request channel, running every exchange through one client
 *
 * Each request is started as soon as it is received, without waiting for
 * earlier exchanges. Resolves once the channel has closed and every
 * in-flight exchange has been delivered.
 */
export async function runDispatchLoop(
  receiver: Receiver<PendingRequest>,
  client: HttpClient,
  options: DispatchOptions
): Promise<void> {
  const inFlight = new Set<Promise<void>>();

  for await (const pending of receiver) {
    options.logger.debug('Dispatching request:', { url: pending.request.url });

    const unit: Promise<void> = processRequest(pending, client, options).finally(() => {
      inFlight.delete(unit);
    });
    inFlight.add(unit);
  }

  options.logger.debug('Request channel closed, in-flight requests:', inFlight.size);
  await Promise.all(inFlight);
}

/**
 * Build the network client on a reactor and start the dispatch loop there
 *
 * Shared by both execution contexts: an embedded transport calls it with the
 * caller's reactor, a standalone worker with its own.
 *
 * @throws HttpTransportError (ClientBuilderError) if the client cannot be constructed
 */
export async function createDispatchPipeline(
  reactor: Reactor,
  builder: ClientBuilder,
  options: DispatchOptions
): Promise<DispatchPipeline> {
  let client: HttpClient;
  try {
    const factory = await resolveClientFactory(builder);
    client = await factory(reactor);
  } catch (error) {
    throw HttpTransportError.clientBuilder(error);
  }

  const [sender, receiver] = createRequestChannel<PendingRequest>();

  const done = new Promise<void>((resolve) => {
    reactor.spawn(async () => {
      try {
        await runDispatchLoop(receiver, client, options);
        options.logger.debug('Dispatch loop finished');
      } finally {
        try {
          await client.close?.();
        } finally {
          resolve();
        }
      }
    });
  });

  return { sender, done };
}
