/**
 * Basic Usage Example
 *
 * Starts a local JSON-RPC server, then talks to it through a transport
 * running on its own worker thread:
 * - Building the default transport
 * - Creating handles and numbering calls
 * - Handling HTTP errors
 * - Proper cleanup
 */

import * as http from 'node:http';
import { HttpTransport, HttpTransportError, defaultClient } from '../src/index.js';

function startServer(): Promise<http.Server> {
  const server = http.createServer(async (req, res) => {
    if (req.url !== '/rpc') {
      res.statusCode = 404;
      res.end();
      return;
    }

    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.from(chunk));
    }
    const call: unknown = JSON.parse(Buffer.concat(chunks).toString('utf8'));
    const id = typeof call === 'object' && call !== null && 'id' in call ? call.id : null;

    res.setHeader('Content-Type', 'application/json');
    res.end(JSON.stringify({ jsonrpc: '2.0', result: 'pong', id }));
  });

  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve(server));
  });
}

async function main() {
  const server = await startServer();
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server has no TCP address');
  }
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const transport = await HttpTransport.builder()
    .client(defaultClient({ timeout: 5000 }))
    .build();
  const handle = transport.handle(`${baseUrl}/rpc`);

  try {
    for (const method of ['ping', 'ping']) {
      const id = handle.getNextId();
      const payload = Buffer.from(JSON.stringify({ jsonrpc: '2.0', method, id }));
      const reply = await handle.send(payload);
      console.log(`Call ${id}:`, reply.toString('utf8'));
    }

    const missing = transport.handle(`${baseUrl}/missing`);
    try {
      await missing.send(Buffer.from('{}'));
    } catch (error) {
      if (error instanceof HttpTransportError && error.kind === 'HttpError') {
        console.log('Server answered with status', error.status);
      } else {
        throw error;
      }
    } finally {
      missing.close();
    }

    console.log('Stats:', transport.getStats());
  } finally {
    handle.close();
    transport.close();
    server.close();
  }
}

main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});
