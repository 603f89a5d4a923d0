import { createServer, type Server } from 'node:http';

import { describe, it, expect, beforeAll, afterAll } from 'vitest';

import { WorkerRequestError, WorkerTimeoutError } from './errors.js';
import { HttpWorkerClient } from './worker-client.js';

describe('HttpWorkerClient', () => {
  let server: Server;
  let baseUrl: string;
  const client = new HttpWorkerClient();

  beforeAll(async () => {
    server = createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        const body = Buffer.concat(chunks).toString('utf-8');
        switch (req.url) {
          case '/echo':
            res.writeHead(200, { 'Content-Type': 'application/json' });
            res.end(body);
            break;
          case '/empty':
            res.writeHead(200);
            res.end();
            break;
          case '/fail':
            res.writeHead(500, { 'Content-Type': 'application/json' });
            res.end(JSON.stringify({ error: 'tool crashed' }));
            break;
          case '/health':
            res.writeHead(req.method === 'GET' ? 200 : 405, { 'Content-Type': 'application/json' });
            res.end(JSON.stringify({ status: 'healthy' }));
            break;
          case '/slow':
            setTimeout(() => {
              res.writeHead(200);
              res.end('{}');
            }, 500);
            break;
          default:
            res.writeHead(404);
            res.end('not here');
        }
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should post JSON and return the parsed answer', async () => {
    const result = await client.post({ workerId: 'w1', baseUrl, path: '/echo', body: { instance_id: 'i1' }, timeoutMs: 2000 });
    expect(result).toEqual({ instance_id: 'i1' });
  });

  it('should return null for an empty answer', async () => {
    expect(await client.post({ workerId: 'w1', baseUrl, path: '/empty', body: {}, timeoutMs: 2000 })).toBeNull();
  });

  it('should raise WorkerRequestError with the upstream status and body', async () => {
    const error = await client
      .post({ workerId: 'w1', baseUrl, path: '/fail', body: {}, timeoutMs: 2000 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WorkerRequestError);
    expect(error).toMatchObject({
      message: 'Worker w1 returned 500',
      upstreamStatus: 500,
      upstreamBody: { error: 'tool crashed' },
    });
  });

  it('should keep non-JSON error bodies as text', async () => {
    const error = await client
      .post({ workerId: 'w1', baseUrl, path: '/missing', body: {}, timeoutMs: 2000 })
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ upstreamStatus: 404, upstreamBody: 'not here' });
  });

  it('should raise WorkerTimeoutError past the deadline', async () => {
    await expect(
      client.post({ workerId: 'w1', baseUrl, path: '/slow', body: {}, timeoutMs: 50 })
    ).rejects.toBeInstanceOf(WorkerTimeoutError);
  });

  it('should raise WorkerRequestError when the worker is unreachable', async () => {
    await expect(
      client.post({ workerId: 'w9', baseUrl: 'http://127.0.0.1:1', path: '/echo', body: {}, timeoutMs: 2000 })
    ).rejects.toThrow('Request to worker w9 failed');
  });

  it('should GET the health endpoint', async () => {
    expect(await client.get({ workerId: 'w1', baseUrl, path: '/health', timeoutMs: 2000 })).toEqual({ status: 'healthy' });
  });

  it('should raise the same errors for a failed GET', async () => {
    await expect(client.get({ workerId: 'w1', baseUrl, path: '/fail', timeoutMs: 2000 })).rejects.toMatchObject({
      upstreamStatus: 500,
    });
    await expect(client.get({ workerId: 'w1', baseUrl, path: '/slow', timeoutMs: 50 })).rejects.toBeInstanceOf(
      WorkerTimeoutError
    );
  });
});
