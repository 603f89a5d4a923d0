/**
 * Worker Agent - hosts tools behind HTTP and keeps itself registered
 *
 * Lifecycle:
 *   start  → listen → register (backoff until the coordinator answers)
 *          → heartbeat every interval
 *   a heartbeat answered with 404 means the coordinator evicted us or
 *   restarted, so the agent registers again under the same id
 *   stop   → cancel loops → deregister (best effort) → close
 *
 * The agent does no affinity checks of its own; the coordinator decides which
 * worker owns an instance.
 */

import { randomUUID } from 'node:crypto';
import type { Server } from 'node:http';
import { hostname } from 'node:os';

import { RouteNotFoundError, UnknownWorkerError } from '../coordinator/errors.js';
import {
  CreateRequestSchema,
  ExecuteRequestSchema,
  InstanceRequestSchema,
  isToolOperation,
  parseBody,
} from '../coordinator/protocol.js';
import { closeServer, createJsonServer, listen, type ListenAddress, type Route } from '../http/json-server.js';
import { createLogger, type Logger } from '../logger.js';
import { MasterClient } from './master-client.js';
import { withRetry, type RetryConfig } from './retry.js';
import type { Tool } from './tool.js';
import { ToolHost } from './tool-host.js';

export interface WorkerAgentOptions {
  masterUrl: string;
  tools: readonly Tool[] | ToolHost;
  /** Bind address (default 0.0.0.0) */
  host?: string;
  /** Listen port (default 0 = any free port) */
  port?: number;
  /** Host name put in the advertised base URL, when it differs from the bind address */
  advertiseHost?: string;
  workerId?: string;
  /** Backoff for (re-)registration; maxRetries defaults to unbounded */
  registration?: RetryConfig;
  /** Overrides the interval suggested by the coordinator */
  heartbeatIntervalMs?: number;
  masterClient?: MasterClient;
  logger?: Logger;
}

export interface WorkerHealth {
  status: 'healthy';
  worker_id: string | null;
  registered: boolean;
  tools: string[];
  active_instances: number;
  instances_by_tool: Record<string, number>;
  uptime_ms: number;
}

export class WorkerAgent {
  readonly host: ToolHost;
  private readonly server: Server;
  private readonly master: MasterClient;
  private readonly log: Logger;
  private address: ListenAddress | null = null;
  private controller: AbortController | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private heartbeatInFlight = false;
  private startedAt = 0;
  private id: string | null;
  private isRegistered = false;

  constructor(private readonly options: WorkerAgentOptions) {
    this.host = options.tools instanceof ToolHost ? options.tools : new ToolHost(options.tools);
    if (this.host.toolNames.length === 0) {
      throw new RangeError('A worker agent needs at least one tool');
    }
    this.master = options.masterClient ?? new MasterClient(options.masterUrl);
    this.log = options.logger ?? createLogger('WorkerAgent');
    this.id = options.workerId ?? null;
    this.server = createJsonServer(this.routes(), { logger: this.log.child('http') });
  }

  get workerId(): string | null {
    return this.id;
  }

  get registered(): boolean {
    return this.isRegistered;
  }

  /** Base URL the coordinator uses to reach this agent */
  get baseUrl(): string | null {
    if (!this.address) return null;
    return this.options.advertiseHost ? `http://${this.options.advertiseHost}:${this.address.port}` : this.address.url;
  }

  /**
   * Listen, register and begin heartbeating
   */
  async start(): Promise<ListenAddress> {
    if (this.controller) {
      throw new Error('Worker agent already started');
    }
    const controller = new AbortController();
    this.controller = controller;
    this.startedAt = Date.now();
    try {
      const address = await listen(this.server, this.options.port ?? 0, this.options.host ?? '0.0.0.0');
      this.address = address;
      this.log.info(`Serving ${this.host.toolNames.join(', ')} on ${this.baseUrl}`);

      const intervalMs = await this.register(controller.signal);
      this.startHeartbeat(this.options.heartbeatIntervalMs ?? intervalMs, controller.signal);
      return address;
    } catch (error) {
      await this.stop();
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (!this.controller) {
      return;
    }
    this.controller.abort();
    this.controller = null;
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    if (this.isRegistered && this.id) {
      try {
        const result = await this.master.deregister(this.id);
        this.log.info(`Deregistered ${this.id}`, { invalidatedInstances: result.invalidated_instances.length });
      } catch (error) {
        this.log.warn(`Deregistration of ${this.id} failed`, { error });
      }
      this.isRegistered = false;
    }

    await closeServer(this.server);
    this.address = null;
    this.log.info('Stopped');
  }

  /**
   * Send one heartbeat; re-registers when the coordinator no longer knows us
   */
  async heartbeatOnce(): Promise<void> {
    const signal = this.controller?.signal;
    if (!this.id || !signal || this.heartbeatInFlight) {
      return;
    }
    this.heartbeatInFlight = true;
    try {
      await this.master.heartbeat(this.id, this.host.status().activeInstances);
    } catch (error) {
      if (!(error instanceof UnknownWorkerError)) {
        throw error;
      }
      this.log.warn(`Coordinator does not know ${this.id}; registering again`);
      this.isRegistered = false;
      await this.register(signal);
    } finally {
      this.heartbeatInFlight = false;
    }
  }

  health(): WorkerHealth {
    const status = this.host.status();
    return {
      status: 'healthy',
      worker_id: this.id,
      registered: this.isRegistered,
      tools: status.tools,
      active_instances: status.activeInstances,
      instances_by_tool: status.instancesByTool,
      uptime_ms: this.startedAt ? Date.now() - this.startedAt : 0,
    };
  }

  private async register(signal: AbortSignal): Promise<number> {
    const baseUrl = this.baseUrl;
    if (!baseUrl || !this.address) {
      throw new Error('Worker agent is not listening');
    }
    const port = this.address.port;

    const response = await withRetry(
      () =>
        this.master.register({
          workerId: this.id ?? undefined,
          baseUrl,
          supportedTools: this.host.toolNames,
          hostInfo: { hostname: hostname(), ip: this.options.advertiseHost ?? this.address?.host, port, pid: process.pid },
        }),
      {
        config: { maxRetries: Number.POSITIVE_INFINITY, ...this.options.registration },
        signal,
        onRetry: ({ attempt, delay, lastError }) => {
          this.log.warn(`Registration attempt ${attempt + 1} failed, retrying in ${Math.round(delay)}ms`, {
            masterUrl: this.master.masterUrl,
            error: lastError,
          });
        },
      }
    );

    this.id = response.worker_id;
    this.isRegistered = true;
    this.log.info(`Registered as ${response.worker_id}`, { masterUrl: this.master.masterUrl });
    return response.heartbeat_interval_ms;
  }

  private startHeartbeat(intervalMs: number, signal: AbortSignal): void {
    this.heartbeatTimer = setInterval(() => {
      if (signal.aborted) return;
      this.heartbeatOnce().catch((error: unknown) => {
        this.log.warn('Heartbeat failed', { error });
      });
    }, intervalMs);
    this.heartbeatTimer.unref();
  }

  private routes(): Route[] {
    return [
      {
        method: 'POST',
        pattern: /^\/tools\/([^/]+)\/([^/]+)$/,
        handle: async (ctx) => {
          const [toolName = '', operation = ''] = ctx.params;
          if (!isToolOperation(operation)) {
            throw new RouteNotFoundError('POST', ctx.url.pathname);
          }
          const body = await ctx.readJson();
          switch (operation) {
            case 'create': {
              const request = parseBody(CreateRequestSchema, body ?? {});
              const instanceId = request.instance_id ?? randomUUID();
              await this.host.create(toolName, instanceId, request.identity ?? null);
              return { json: { success: true, instance_id: instanceId } };
            }
            case 'execute': {
              const request = parseBody(ExecuteRequestSchema, body);
              return { json: await this.host.execute(toolName, request.instance_id, request.parameters ?? {}) };
            }
            case 'release': {
              const request = parseBody(InstanceRequestSchema, body);
              await this.host.release(toolName, request.instance_id);
              return { json: { success: true, instance_id: request.instance_id } };
            }
            case 'calc_reward': {
              const request = parseBody(InstanceRequestSchema, body);
              return { json: { reward_score: await this.host.calcReward(toolName, request.instance_id) } };
            }
          }
        },
      },
      {
        method: 'GET',
        pattern: /^\/health\/?$/,
        handle: () => ({ json: this.health() }),
      },
    ];
  }
}
