import { describe, expect, it } from 'vitest';
import { createRequestChannel, createResponseSlot } from '../src/channel.js';
import {
  createDispatchPipeline,
  deliver,
  exchange,
  resolveClientFactory,
  runDispatchLoop,
} from '../src/dispatch.js';
import { HttpTransportError } from '../src/error.js';
import { EventLoopReactor } from '../src/reactor.js';
import type { DispatchOptions, PendingRequest, TransportStats } from '../src/types.js';
import { createDeferred, createMockLogger, delay, makeRequest } from './helpers.js';
import { clientModulesUrl } from './mocks/clientModules.js';
import { MockHttpClient } from './mocks/mockHttpClient.js';

function createOptions() {
  const stats: TransportStats = { submitted: 0, delivered: 0, undelivered: 0 };
  const logger = createMockLogger();
  const options: DispatchOptions = { logger, stats };
  return { stats, logger, options };
}

describe('exchange', () => {
  it('should concatenate the body of a 200 response', async () => {
    const client = new MockHttpClient(() => ({ chunks: ['{"result"', ':3}'] }));

    const outcome = await exchange(client, makeRequest('http://localhost/rpc'));

    expect(outcome).toEqual({ ok: true, value: Buffer.from('{"result":3}') });
  });

  it('should yield an empty buffer for an empty 200 response', async () => {
    const client = new MockHttpClient(() => ({}));

    const outcome = await exchange(client, makeRequest('http://localhost/rpc'));

    expect(outcome).toEqual({ ok: true, value: Buffer.alloc(0) });
  });

  it('should report a non-200 status as HttpError and discard the body', async () => {
    const client = new MockHttpClient(() => ({ status: 404, chunks: ['not found'] }));

    const outcome = await exchange(client, makeRequest('http://localhost/rpc'));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(HttpTransportError);
      expect(outcome.error.kind).toBe('HttpError');
      expect(outcome.error.status).toBe(404);
      expect(outcome.error.message).toBe('Http error. Status code 404');
    }
    expect(client.discarded).toBe(1);
  });

  it('should treat other success statuses as errors', async () => {
    const client = new MockHttpClient(() => ({ status: 204 }));

    const outcome = await exchange(client, makeRequest('http://localhost/rpc'));

    expect(outcome).toMatchObject({ ok: false, error: { kind: 'HttpError', status: 204 } });
  });

  it('should report a failed request as NetworkError', async () => {
    const client = new MockHttpClient(() => {
      throw new Error('connect ECONNREFUSED');
    });

    const outcome = await exchange(client, makeRequest('http://localhost/rpc'));

    expect(outcome).toMatchObject({
      ok: false,
      error: { kind: 'NetworkError', message: 'Network error: connect ECONNREFUSED' },
    });
  });

  it('should report a failed body stream as NetworkError', async () => {
    const client = new MockHttpClient(() => ({
      chunks: ['partial'],
      streamError: new Error('socket hang up'),
    }));

    const outcome = await exchange(client, makeRequest('http://localhost/rpc'));

    expect(outcome).toMatchObject({
      ok: false,
      error: { kind: 'NetworkError', message: 'Network error: socket hang up' },
    });
  });
});

describe('deliver', () => {
  it('should count a delivered outcome', () => {
    const { stats, logger, options } = createOptions();
    const [slot] = createResponseSlot<Buffer, HttpTransportError>();

    expect(deliver(slot, { ok: true, value: Buffer.from('ok') }, options)).toBe(true);

    expect(stats).toEqual({ submitted: 0, delivered: 1, undelivered: 0 });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should log and count an outcome whose caller is gone', () => {
    const { stats, logger, options } = createOptions();
    const [slot, reader] = createResponseSlot<Buffer, HttpTransportError>();
    reader.abandon();

    expect(deliver(slot, { ok: true, value: Buffer.from('ok') }, options)).toBe(false);

    expect(stats).toEqual({ submitted: 0, delivered: 0, undelivered: 1 });
    expect(logger.warn).toHaveBeenCalledWith('Unable to send response back to caller');
  });
});

describe('runDispatchLoop', () => {
  it('should run exchanges concurrently', async () => {
    const gate = createDeferred<void>();
    const client = new MockHttpClient(async (request) => {
      if (request.url.endsWith('/slow')) {
        await gate.promise;
      }
      return { chunks: [request.url] };
    });
    const { options } = createOptions();
    const [tx, rx] = createRequestChannel<PendingRequest>();
    const loop = runDispatchLoop(rx, client, options);

    const [slowSlot, slowReader] = createResponseSlot<Buffer, HttpTransportError>();
    const [fastSlot, fastReader] = createResponseSlot<Buffer, HttpTransportError>();
    tx.send({ request: makeRequest('http://localhost/slow'), slot: slowSlot });
    tx.send({ request: makeRequest('http://localhost/fast'), slot: fastSlot });

    expect(await fastReader.receive()).toEqual({
      ok: true,
      value: Buffer.from('http://localhost/fast'),
    });
    expect(client.getRequestedUrls()).toEqual(['http://localhost/slow', 'http://localhost/fast']);

    gate.resolve();
    expect(await slowReader.receive()).toEqual({
      ok: true,
      value: Buffer.from('http://localhost/slow'),
    });

    tx.close();
    await loop;
  });

  it('should finish in-flight exchanges before ending', async () => {
    const gate = createDeferred<void>();
    const client = new MockHttpClient(async () => {
      await gate.promise;
      return { chunks: ['late'] };
    });
    const { options } = createOptions();
    const [tx, rx] = createRequestChannel<PendingRequest>();
    const [slot, reader] = createResponseSlot<Buffer, HttpTransportError>();

    let finished = false;
    const loop = runDispatchLoop(rx, client, options).then(() => {
      finished = true;
    });
    tx.send({ request: makeRequest('http://localhost/rpc'), slot });
    tx.close();

    await delay(20);
    expect(finished).toBe(false);

    gate.resolve();
    await loop;
    expect(finished).toBe(true);
    expect(await reader.receive()).toEqual({ ok: true, value: Buffer.from('late') });
  });

  it('should process requests buffered before the channel closed', async () => {
    const client = new MockHttpClient();
    const { stats, options } = createOptions();
    const [tx, rx] = createRequestChannel<PendingRequest>();
    const readers = ['a', 'b', 'c'].map((body) => {
      const [slot, reader] = createResponseSlot<Buffer, HttpTransportError>();
      tx.send({ request: makeRequest('http://localhost/rpc', body), slot });
      return reader;
    });
    tx.close();

    await runDispatchLoop(rx, client, options);

    const outcomes = await Promise.all(readers.map((reader) => reader.receive()));
    expect(outcomes).toEqual([
      { ok: true, value: Buffer.from('a') },
      { ok: true, value: Buffer.from('b') },
      { ok: true, value: Buffer.from('c') },
    ]);
    expect(stats.delivered).toBe(3);
  });

  it('should complete the exchange of an abandoned call and log the lost delivery', async () => {
    const client = new MockHttpClient();
    const { stats, logger, options } = createOptions();
    const [tx, rx] = createRequestChannel<PendingRequest>();
    const [slot, reader] = createResponseSlot<Buffer, HttpTransportError>();

    const controller = new AbortController();
    const received = reader.receive(controller.signal);
    controller.abort(new Error('caller left'));
    await expect(received).rejects.toThrow('caller left');

    tx.send({ request: makeRequest('http://localhost/rpc'), slot });
    tx.close();
    await runDispatchLoop(rx, client, options);

    expect(client.requests).toHaveLength(1);
    expect(stats).toEqual({ submitted: 0, delivered: 0, undelivered: 1 });
    expect(logger.warn).toHaveBeenCalledWith('Unable to send response back to caller');
  });
});

describe('resolveClientFactory', () => {
  it('should return a factory function unchanged', async () => {
    const factory = () => new MockHttpClient();

    expect(await resolveClientFactory(factory)).toBe(factory);
  });

  it('should load a factory from a module reference', async () => {
    const factory = await resolveClientFactory({
      module: clientModulesUrl,
      exportName: 'createEchoClient',
    });
    const client = await factory(new EventLoopReactor());

    const outcome = await exchange(client, makeRequest('http://localhost/status/503'));
    expect(outcome).toMatchObject({ ok: false, error: { kind: 'HttpError', status: 503 } });
  });

  it('should reject a module without the named export', async () => {
    await expect(
      resolveClientFactory({ module: clientModulesUrl, exportName: 'missing' })
    ).rejects.toThrow(`Module ${clientModulesUrl} has no client factory export 'missing'`);
  });

  it('should reject a factory that does not return a client', async () => {
    const factory = await resolveClientFactory({
      module: clientModulesUrl,
      exportName: 'createNotAClient',
    });

    await expect(factory(new EventLoopReactor())).rejects.toThrow(
      "Client factory 'createNotAClient' did not return an HttpClient"
    );
  });
});

describe('createDispatchPipeline', () => {
  it('should run the loop as a task on the reactor and close the client at the end', async () => {
    const client = new MockHttpClient();
    const reactor = new EventLoopReactor();
    const { options } = createOptions();

    const pipeline = await createDispatchPipeline(reactor, () => client, options);
    expect(reactor.activeTasks).toBe(1);

    const [slot, reader] = createResponseSlot<Buffer, HttpTransportError>();
    pipeline.sender.send({ request: makeRequest('http://localhost/rpc', 'ping'), slot });
    expect(await reader.receive()).toEqual({ ok: true, value: Buffer.from('ping') });

    pipeline.sender.close();
    await pipeline.done;
    await reactor.idle();

    expect(client.closed).toBe(true);
    expect(reactor.activeTasks).toBe(0);
  });

  it('should not run the loop inline', async () => {
    const client = new MockHttpClient();
    const reactor = new EventLoopReactor();
    const { options } = createOptions();

    const pipeline = await createDispatchPipeline(reactor, () => client, options);
    const [slot] = createResponseSlot<Buffer, HttpTransportError>();
    pipeline.sender.send({ request: makeRequest('http://localhost/rpc'), slot });

    expect(client.requests).toHaveLength(0);

    pipeline.sender.close();
    await pipeline.done;
    expect(client.requests).toHaveLength(1);
  });

  it('should wrap a client construction failure as ClientBuilderError', async () => {
    const { options } = createOptions();

    const building = createDispatchPipeline(
      new EventLoopReactor(),
      () => {
        throw new Error('Dummy error');
      },
      options
    );

    await expect(building).rejects.toBeInstanceOf(HttpTransportError);
    await expect(building).rejects.toMatchObject({
      kind: 'ClientBuilderError',
      message: 'Failed to create the HTTP client: Dummy error',
    });
  });
});
