/**
 * Embedded Reactor Example
 *
 * Runs the dispatch loop on the caller's own event loop and plugs in a
 * custom network client. No worker thread is started.
 */

import {
  EventLoopReactor,
  HttpTransport,
  type HttpClient,
  type HttpRequest,
  type HttpResponse,
  createLogger,
} from '../src/index.js';

/**
 * Answers every call locally; stands in for a real network client
 */
class LoopbackClient implements HttpClient {
  async request(request: HttpRequest): Promise<HttpResponse> {
    console.log(`${request.method} ${request.url} (${request.headers['Content-Length']} bytes)`);
    const body = request.body;
    return {
      status: 200,
      body: (async function* () {
        yield body;
      })(),
    };
  }
}

async function main() {
  const reactor = new EventLoopReactor();
  const transport = await HttpTransport.builder()
    .reactor(reactor)
    .client(() => new LoopbackClient())
    .logger(createLogger({ level: 'debug' }))
    .build();

  const handle = transport.handle('http://localhost:8080/rpc');
  const controller = new AbortController();
  const reply = await handle.send(Buffer.from('{"jsonrpc":"2.0","method":"echo","id":1}'), {
    signal: controller.signal,
  });
  console.log('Reply:', reply.toString('utf8'));

  handle.close();
  transport.close();
  await reactor.idle();
  console.log('Dispatch loop finished');
}

main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});
