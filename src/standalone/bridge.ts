import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { MessageChannel, type MessagePort, Worker, type WorkerOptions } from 'node:worker_threads';
import {
  type Outcome,
  type Receiver,
  type Sender,
  type SlotWriter,
  createRequestChannel,
} from '../channel.js';
import { deliver } from '../dispatch.js';
import { HttpTransportError } from '../error.js';
import type { LogLevel } from '../logger.js';
import type { ClientModule, DispatchOptions, PendingRequest } from '../types.js';
import { isFromWorkerMessage } from '../utils/typeGuards.js';
import {
  type FromWorkerMessage,
  type ToWorkerMessage,
  type WorkerInit,
  toBuffer,
} from './protocol.js';

/**
 * A started standalone worker, seen from the thread that owns the transport
 */
export interface StandaloneContext {
  sender: Sender<PendingRequest>;
  threadId: number;

  /**
   * Resolves with the exit code once the worker thread has exited
   */
  exited: Promise<number>;
}

export interface StandaloneOptions extends DispatchOptions {
  /**
   * Level for the worker's logger; null disables logging inside the worker
   */
  workerLogLevel: LogLevel | null;
}

/**
 * Source of the bootstrap that registers the tsx loader inside the worker,
 * then imports the worker entry
 */
function tsxBootstrap(entry: URL): string {
  return (
    "import('tsx/esm/api')" +
    '.then(({ register }) => { register(); ' +
    `return import(${JSON.stringify(entry.href)}); })`
  );
}

/**
 * Start the worker entry beside this module
 *
 * The compiled entry starts as it is. A TypeScript entry starts through
 * {@link tsxBootstrap}; `--import tsx` in `execArgv` does not reach a
 * worker's entry module.
 */
function spawnWorker(options: WorkerOptions): Worker {
  const extension = path.extname(fileURLToPath(import.meta.url));
  const entry = new URL(`./worker${extension}`, import.meta.url);
  if (extension !== '.ts') {
    return new Worker(entry, options);
  }
  return new Worker(tsxBootstrap(entry), { ...options, eval: true });
}

/**
 * Start a worker thread with its own event loop and dispatch loop
 *
 * Resolves once the worker has built its client and is ready for requests.
 * On failure the worker has exited before the promise rejects.
 *
 * @throws HttpTransportError (ClientBuilderError) if the worker could not build the client
 * @throws HttpTransportError (ReactorError) if the worker could not be started
 */
export async function startStandalone(
  client: ClientModule,
  options: StandaloneOptions
): Promise<StandaloneContext> {
  const { port1, port2 } = new MessageChannel();
  const workerData: WorkerInit = { port: port2, client, logLevel: options.workerLogLevel };

  let worker: Worker;
  try {
    worker = spawnWorker({ workerData, transferList: [port2] });
  } catch (error) {
    port1.close();
    throw HttpTransportError.reactor('Unable to start worker thread', error);
  }

  const exited = new Promise<number>((resolve) => {
    worker.once('exit', resolve);
  });
  options.logger.debug('Standalone worker started:', { threadId: worker.threadId });

  let first: FromWorkerMessage;
  try {
    first = await waitForSetup(worker, port1);
  } catch (error) {
    port1.close();
    await worker.terminate();
    throw error;
  }

  if (first.type === 'build-error') {
    port1.close();
    await exited;
    throw HttpTransportError.fromJSON(first.error);
  }

  const [sender, receiver] = createRequestChannel<PendingRequest>();
  new StandaloneBridge(worker, port1, receiver, options).start();

  return { sender, threadId: worker.threadId, exited };
}

function waitForSetup(worker: Worker, port: MessagePort): Promise<FromWorkerMessage> {
  return new Promise((resolve, reject) => {
    const cleanup = (): void => {
      port.off('message', onMessage);
      worker.off('error', onError);
      worker.off('exit', onExit);
    };
    const onMessage = (message: unknown): void => {
      cleanup();
      if (isFromWorkerMessage(message) && message.type !== 'response') {
        resolve(message);
      } else {
        reject(HttpTransportError.reactor('Unexpected message from worker during setup'));
      }
    };
    const onError = (error: Error): void => {
      cleanup();
      reject(HttpTransportError.reactor('Worker failed during setup', error));
    };
    const onExit = (code: number): void => {
      cleanup();
      reject(HttpTransportError.reactor(`Worker exited during setup with code ${code}`));
    };

    port.on('message', onMessage);
    worker.on('error', onError);
    worker.on('exit', onExit);
  });
}

/**
 * Forwards the owning thread's request channel to the worker
 * and delivers the worker's responses into the callers' slots
 */
class StandaloneBridge {
  private pending = new Map<number, SlotWriter<Buffer, HttpTransportError>>();
  private seq = 0;
  private alive = true;

  constructor(
    private readonly worker: Worker,
    private readonly port: MessagePort,
    private readonly receiver: Receiver<PendingRequest>,
    private readonly options: StandaloneOptions
  ) {}

  start(): void {
    this.port.on('message', (message: unknown) => this.handleMessage(message));
    this.port.once('close', () => this.shutdown('port closed'));
    this.worker.on('error', (error: Error) => {
      this.options.logger.error('Standalone worker failed:', error.message);
    });
    // Responses still queued on the port are handled before shutdown
    this.worker.once('exit', (code: number) => {
      setImmediate(() => this.shutdown(`worker exited with code ${code}`));
    });
    this.updateRef();

    this.forward().catch((error: unknown) => {
      this.options.logger.error('Forwarding to standalone worker failed:', error);
    });
  }

  private async forward(): Promise<void> {
    for await (const { request, slot } of this.receiver) {
      const seq = ++this.seq;
      this.pending.set(seq, slot);

      const message: ToWorkerMessage = {
        type: 'request',
        seq,
        request: { url: request.url, headers: request.headers, body: request.body },
      };
      this.port.postMessage(message);
      this.updateRef();
    }

    if (this.alive) {
      this.options.logger.debug('Request channel closed, stopping standalone worker');
      const message: ToWorkerMessage = { type: 'close' };
      this.port.postMessage(message);
    }
  }

  private handleMessage(message: unknown): void {
    if (!isFromWorkerMessage(message) || message.type !== 'response') {
      this.options.logger.warn('Unexpected message from standalone worker:', message);
      return;
    }

    const slot = this.pending.get(message.seq);
    if (!slot) {
      this.options.logger.warn('Received response for unknown request:', message.seq);
      return;
    }
    this.pending.delete(message.seq);

    const posted = message.outcome;
    const outcome: Outcome<Buffer, HttpTransportError> = posted.ok
      ? { ok: true, value: toBuffer(posted.value) }
      : { ok: false, error: HttpTransportError.fromJSON(posted.error) };

    deliver(slot, outcome, this.options);
    this.updateRef();
  }

  /**
   * The worker is gone: fail whatever it still owed and refuse new requests
   */
  private shutdown(reason: string): void {
    if (!this.alive) {
      return;
    }
    this.alive = false;
    this.options.logger.debug('Standalone worker stopped:', reason);

    this.receiver.close((pending) => pending.slot.drop());
    for (const slot of this.pending.values()) {
      slot.drop();
    }
    this.pending.clear();
    this.port.close();
  }

  /**
   * Keep the process alive only while requests are outstanding
   */
  private updateRef(): void {
    if (this.alive && (this.pending.size > 0 || this.receiver.size > 0)) {
      this.worker.ref();
      this.port.ref();
    } else {
      this.worker.unref();
      this.port.unref();
    }
  }
}
