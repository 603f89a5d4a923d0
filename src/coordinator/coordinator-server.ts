/**
 * HTTP surface of the coordinator
 *
 *   POST   /register                   worker registration
 *   PUT    /heartbeat/{worker_id}      liveness
 *   DELETE /workers/{worker_id}        graceful deregistration
 *   POST   /tools/{tool}/{operation}   create | execute | release | calc_reward
 *   GET    /health                     JSON snapshot
 *   GET    /                           HTML dashboard
 */

import type { Server } from 'node:http';

import { closeServer, createJsonServer, listen, type ListenAddress, type Route } from '../http/json-server.js';
import { createLogger, type Logger } from '../logger.js';
import type { Coordinator } from './coordinator.js';
import { renderDashboard } from './dashboard.js';
import { TIMEOUT_HEADER, isToolOperation, parseTimeoutHeader, toHealthReport } from './protocol.js';
import { RouteNotFoundError } from './errors.js';

export interface CoordinatorServerOptions {
  logger?: Logger;
  maxBodyBytes?: number;
}

export class CoordinatorServer {
  private readonly server: Server;
  private readonly log: Logger;
  private address: ListenAddress | null = null;

  constructor(
    private readonly coordinator: Coordinator,
    options: CoordinatorServerOptions = {}
  ) {
    this.log = options.logger ?? createLogger('Coordinator').child('http');
    this.server = createJsonServer(this.routes(), { logger: this.log, maxBodyBytes: options.maxBodyBytes });
  }

  /**
   * Listen and start the coordinator's liveness sweep
   */
  async listen(port: number, host = '0.0.0.0'): Promise<ListenAddress> {
    this.address = await listen(this.server, port, host);
    this.coordinator.start();
    this.log.info(`Listening on ${this.address.url}`);
    return this.address;
  }

  async close(): Promise<void> {
    this.coordinator.stop();
    await closeServer(this.server);
    this.address = null;
  }

  get url(): string | null {
    return this.address?.url ?? null;
  }

  private routes(): Route[] {
    const coordinator = this.coordinator;

    return [
      {
        method: 'POST',
        pattern: /^\/register\/?$/,
        handle: async (ctx) => ({ json: await coordinator.registerWorker(await ctx.readJson()) }),
      },
      {
        method: 'PUT',
        pattern: /^\/heartbeat\/([^/]+)$/,
        handle: async (ctx) => ({ json: coordinator.heartbeat(ctx.params[0] ?? '', await ctx.readJson()) }),
      },
      {
        method: 'DELETE',
        pattern: /^\/workers\/([^/]+)$/,
        handle: (ctx) => ({ json: coordinator.deregisterWorker(ctx.params[0] ?? '') }),
      },
      {
        method: 'POST',
        pattern: /^\/tools\/([^/]+)\/([^/]+)$/,
        handle: async (ctx) => {
          const [toolName = '', operation = ''] = ctx.params;
          if (!isToolOperation(operation)) {
            throw new RouteNotFoundError('POST', ctx.url.pathname);
          }
          const timeoutMs = parseTimeoutHeader(ctx.req.headers[TIMEOUT_HEADER]);
          const body = await ctx.readJson();
          switch (operation) {
            case 'create':
              return { json: await coordinator.createInstance(toolName, body, timeoutMs) };
            case 'execute':
              return { json: await coordinator.execute(toolName, body, timeoutMs) };
            case 'release':
              return { json: await coordinator.release(toolName, body, timeoutMs) };
            case 'calc_reward':
              return { json: await coordinator.calcReward(toolName, body, timeoutMs) };
          }
        },
      },
      {
        method: 'GET',
        pattern: /^\/health\/?$/,
        handle: () => ({ json: toHealthReport(coordinator.snapshot()) }),
      },
      {
        method: 'GET',
        pattern: /^\/$/,
        handle: () => ({
          html: renderDashboard(coordinator.snapshot(), { listenUrl: this.address?.url ?? 'not listening' }),
        }),
      },
    ];
  }
}
