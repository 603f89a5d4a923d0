/**
 * Minimal JSON-over-HTTP plumbing on node:http shared by the coordinator and
 * the worker agents: a method/pattern route table, bounded body reading,
 * FleetError rendering and promise wrappers around listen/close.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';

import { PayloadTooLargeError, RouteNotFoundError, ValidationError, toErrorBody } from '../coordinator/errors.js';
import type { Logger } from '../logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export const DEFAULT_MAX_BODY_BYTES = 8 * 1024 * 1024;

export interface RouteContext {
  req: IncomingMessage;
  url: URL;
  /** Decoded capture groups of the route pattern */
  params: string[];
  /** Parsed JSON body; undefined for an empty body */
  readJson(): Promise<unknown>;
}

export type RouteResult = { status?: number; json: unknown } | { status?: number; html: string };

export interface Route {
  method: HttpMethod;
  pattern: RegExp;
  handle(ctx: RouteContext): RouteResult | Promise<RouteResult>;
}

export interface JsonServerOptions {
  logger: Logger;
  maxBodyBytes?: number;
}

export interface ListenAddress {
  host: string;
  port: number;
  url: string;
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(data) });
  res.end(data);
}

function sendHtml(res: ServerResponse, status: number, html: string): void {
  res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8', 'Content-Length': Buffer.byteLength(html) });
  res.end(html);
}

export function readBody(req: IncomingMessage, maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let rejected = false;
    req.on('data', (chunk: Buffer) => {
      if (rejected) return;
      size += chunk.length;
      if (size > maxBytes) {
        rejected = true;
        chunks.length = 0;
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!rejected) resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

export async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const text = await readBody(req, maxBytes);
  if (!text.trim()) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Request body is not valid JSON');
  }
}

function decodeParams(groups: string[]): string[] {
  try {
    return groups.map((group) => decodeURIComponent(group));
  } catch {
    throw new ValidationError('Malformed percent-encoding in path');
  }
}

/**
 * Create an http.Server dispatching to the first route whose method and
 * pattern match the request path
 */
export function createJsonServer(routes: readonly Route[], options: JsonServerOptions): Server {
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const log = options.logger;

  async function dispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startedAt = Date.now();
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');
    let status = 500;

    try {
      let result: RouteResult | undefined;
      for (const route of routes) {
        if (route.method !== method) continue;
        const match = route.pattern.exec(url.pathname);
        if (!match) continue;
        result = await route.handle({
          req,
          url,
          params: decodeParams(match.slice(1)),
          readJson: () => readJsonBody(req, maxBodyBytes),
        });
        break;
      }
      if (!result) {
        throw new RouteNotFoundError(method, url.pathname);
      }

      status = result.status ?? 200;
      if ('html' in result) {
        sendHtml(res, status, result.html);
      } else {
        sendJson(res, status, result.json);
      }
    } catch (error) {
      const rendered = toErrorBody(error);
      status = rendered.status;
      if (status >= 500 && rendered.body.error.code === 'INTERNAL_ERROR') {
        log.error(`Unhandled error on ${method} ${url.pathname}`, { error });
      }
      if (status === 413) {
        res.setHeader('Connection', 'close');
      }
      sendJson(res, status, rendered.body);
    } finally {
      log.debug(`${method} ${url.pathname} → ${status}`, { durationMs: Date.now() - startedAt });
    }
  }

  return createServer((req, res) => {
    dispatch(req, res).catch((error: unknown) => {
      log.error('Failed to write response', { error });
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end();
    });
  });
}

/**
 * Start listening; resolves with the bound address (port 0 picks a free one)
 */
export function listen(server: Server, port: number, host: string): Promise<ListenAddress> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      const boundPort = isAddressInfo(address) ? address.port : port;
      const urlHost = host === '0.0.0.0' || host === '::' ? '127.0.0.1' : host;
      resolve({ host, port: boundPort, url: `http://${urlHost}:${boundPort}` });
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}

function isAddressInfo(value: string | AddressInfo | null): value is AddressInfo {
  return typeof value === 'object' && value !== null;
}
