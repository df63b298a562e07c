import { workerData } from 'node:worker_threads';
import { createResponseSlot, type Outcome, type Sender } from '../channel.js';
import { createDispatchPipeline } from '../dispatch.js';
import { HttpTransportError } from '../error.js';
import { createLogger, type Logger, noopLogger } from '../logger.js';
import { EventLoopReactor } from '../reactor.js';
import type { PendingRequest, TransportStats } from '../types.js';
import { isToWorkerMessage, isWorkerInit } from '../utils/typeGuards.js';
import {
  type FromWorkerMessage,
  type PostedOutcome,
  type ToWorkerMessage,
  type WorkerInit,
  toBuffer,
} from './protocol.js';

/**
 * Entry point of a standalone transport's worker thread
 *
 * Creates a private event loop reactor, builds the client on it and runs the
 * dispatch loop until the owning thread posts `close`. The port stays open
 * until every response has been posted back.
 */
async function run(init: WorkerInit): Promise<void> {
  const { port } = init;
  const logger: Logger =
    init.logLevel === null
      ? noopLogger
      : createLogger({ level: init.logLevel, prefix: '[HTTP-TRANSPORT:worker]' });
  const stats: TransportStats = { submitted: 0, delivered: 0, undelivered: 0 };
  const post = (message: FromWorkerMessage): void => port.postMessage(message);

  let sender: Sender<PendingRequest> | null = null;
  const replies = new Set<Promise<void>>();

  const handleRequest = (message: Extract<ToWorkerMessage, { type: 'request' }>): void => {
    const { seq } = message;
    const [slot, reader] = createResponseSlot<Buffer, HttpTransportError>();
    const request = {
      method: 'POST' as const,
      url: message.request.url,
      headers: message.request.headers,
      body: toBuffer(message.request.body),
    };

    if (!sender?.send({ request, slot })) {
      const outcome = toPosted(undefined, HttpTransportError.notListening());
      post({ type: 'response', seq, outcome });
      return;
    }

    const reply: Promise<void> = reader
      .receive()
      .then((outcome) => post({ type: 'response', seq, outcome: toPosted(outcome) }))
      .finally(() => {
        replies.delete(reply);
      });
    replies.add(reply);
  };

  // Listening before the build keeps this thread alive until the owner closes the port
  port.on('message', (message: unknown) => {
    if (!isToWorkerMessage(message)) {
      logger.warn('Ignoring unexpected message:', message);
      return;
    }
    if (message.type === 'close') {
      logger.debug('Owner released the transport');
      sender?.close();
      return;
    }
    handleRequest(message);
  });

  const reactor = new EventLoopReactor({ logger });
  let done: Promise<void>;
  try {
    const pipeline = await createDispatchPipeline(reactor, init.client, { logger, stats });
    sender = pipeline.sender;
    done = pipeline.done;
  } catch (error) {
    const failure =
      error instanceof HttpTransportError
        ? error
        : HttpTransportError.reactor('Worker setup failed', error);
    logger.debug('Client construction failed:', failure.message);
    post({ type: 'build-error', error: failure.toJSON() });
    return;
  }

  post({ type: 'ready' });
  logger.debug('Standalone worker ready');

  await done;
  await Promise.all(replies);
  logger.debug('Standalone worker exiting, undelivered responses:', stats.undelivered);
  port.close();
}

function toPosted(
  outcome: Outcome<Buffer, HttpTransportError> | undefined,
  fallback: HttpTransportError = HttpTransportError.diedWithoutResponse()
): PostedOutcome {
  if (outcome === undefined) {
    return { ok: false, error: fallback.toJSON() };
  }
  return outcome.ok
    ? { ok: true, value: outcome.value }
    : { ok: false, error: outcome.error.toJSON() };
}

const init: unknown = workerData;
if (!isWorkerInit(init)) {
  throw new Error('Standalone worker started without valid worker data');
}
const { port } = init;

run(init).catch((error: unknown) => {
  createLogger({ level: 'error', prefix: '[HTTP-TRANSPORT:worker]' }).error(
    'Standalone worker crashed:',
    error
  );
  process.exitCode = 1;
  port.close();
});
