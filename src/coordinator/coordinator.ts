/**
 * Coordinator - routes tool-instance calls to registered workers
 *
 * Composes the worker registry, the load balancer, the health monitor and the
 * outbound worker client. Transport independent: the HTTP server in
 * coordinator-server.ts maps routes onto these methods.
 *
 * A worker is registered only once its GET /health answers.
 *
 * Instance lifecycle as seen from here:
 *   create  → pick worker + bind (pending) in one tick → forward → activate
 *   execute → resolve binding → forward to the bound worker
 *   release → resolve binding → forward → unbind (always)
 */

import { randomUUID } from 'node:crypto';

import { createLogger, type Logger } from '../logger.js';
import { InstanceNotBoundError, UnknownWorkerError, ValidationError, WorkerRequestError } from './errors.js';
import { HealthMonitor } from './health-monitor.js';
import type { LoadBalancer } from './load-balancer.js';
import {
  CreateRequestSchema,
  ExecuteRequestSchema,
  HeartbeatRequestSchema,
  InstanceRequestSchema,
  RegisterRequestSchema,
  parseBody,
  toolPath,
  type CreateResponse,
  type DeregisterResponse,
  type HeartbeatResponse,
  type RegisterRequest,
  type RegisterResponse,
  type ReleaseResponse,
  type ToolOperation,
} from './protocol.js';
import {
  DEFAULT_COORDINATOR_CONFIG,
  type CoordinatorConfig,
  type InstanceId,
  type InstanceMapping,
  type RegistrySnapshot,
  type ToolName,
  type WorkerId,
} from './types.js';
import { HttpWorkerClient, type WorkerClient } from './worker-client.js';
import { WorkerRegistry, normalizeBaseUrl } from './worker-registry.js';

export interface CoordinatorOptions {
  config?: Partial<CoordinatorConfig>;
  /** Outbound transport to workers (defaults to fetch) */
  workerClient?: WorkerClient;
  balancer?: LoadBalancer;
  /** Tools expected in this deployment, shown before any worker advertises them */
  declaredTools?: readonly ToolName[];
  now?: () => number;
  generateInstanceId?: () => InstanceId;
  generateWorkerId?: () => WorkerId;
  logger?: Logger;
}

export class Coordinator {
  readonly registry: WorkerRegistry;
  readonly monitor: HealthMonitor;
  readonly config: CoordinatorConfig;
  private readonly client: WorkerClient;
  private readonly now: () => number;
  private readonly generateInstanceId: () => InstanceId;
  private readonly log: Logger;
  /** In-flight create calls, so concurrent creates and early executes wait on them */
  private pendingCreates: Map<InstanceId, Promise<InstanceMapping>> = new Map();
  private controller: AbortController | null = null;

  constructor(options: CoordinatorOptions = {}) {
    this.config = { ...DEFAULT_COORDINATOR_CONFIG, ...options.config };
    this.now = options.now ?? Date.now;
    this.generateInstanceId = options.generateInstanceId ?? randomUUID;
    this.log = options.logger ?? createLogger('Coordinator');
    this.client = options.workerClient ?? new HttpWorkerClient();

    this.registry = new WorkerRegistry({
      balancer: options.balancer,
      generateWorkerId: options.generateWorkerId,
    });
    this.registry.declareTools(options.declaredTools ?? []);

    this.monitor = new HealthMonitor(this.registry, {
      heartbeatTimeoutMs: this.config.heartbeatTimeoutMs,
      sweepIntervalMs: this.config.sweepIntervalMs,
      instanceIdleTimeoutMs: this.config.instanceIdleTimeoutMs,
      now: this.now,
      logger: this.log.child('health'),
    });

    this.registry.on('worker:registered', (worker, replaced) => {
      this.log.info(`Worker ${worker.workerId} ${replaced ? 're-registered' : 'registered'}`, {
        baseUrl: worker.baseUrl,
        tools: worker.supportedTools,
      });
    });
    this.registry.on('worker:evicted', (worker, invalidated) => {
      this.log.info(`Worker ${worker.workerId} removed`, { invalidatedInstances: invalidated.length });
    });
  }

  /**
   * Start the liveness sweep
   */
  start(): void {
    if (this.controller) {
      return;
    }
    this.controller = new AbortController();
    this.monitor.start(this.controller.signal);
    this.log.info('Started', {
      heartbeatTimeoutMs: this.config.heartbeatTimeoutMs,
      requestTimeoutMs: this.config.requestTimeoutMs,
    });
  }

  stop(): void {
    if (!this.controller) {
      return;
    }
    this.controller.abort();
    this.controller = null;
    this.log.info('Stopped');
  }

  get running(): boolean {
    return this.controller !== null;
  }

  // -------------------------------------------------------------------------
  // Worker lifecycle
  // -------------------------------------------------------------------------

  /**
   * Register (or re-register) a worker after checking that its /health
   * answers at the advertised URL
   */
  async registerWorker(body: unknown): Promise<RegisterResponse> {
    const request = parseBody(RegisterRequestSchema, body);
    await this.checkWorkerHealth(request);
    const result = this.registry.register(
      {
        workerId: request.worker_id,
        baseUrl: request.base_url,
        supportedTools: request.supported_tools,
        hostInfo: request.host_info,
      },
      this.now()
    );

    if (result.invalidatedInstances.length > 0) {
      this.log.warn(`Re-registration of ${result.worker.workerId} dropped instances`, {
        invalidatedInstances: result.invalidatedInstances,
      });
    }

    return {
      success: true,
      worker_id: result.worker.workerId,
      replaced: result.replaced,
      heartbeat_interval_ms: this.config.heartbeatIntervalMs,
      heartbeat_timeout_ms: this.config.heartbeatTimeoutMs,
    };
  }

  heartbeat(workerId: WorkerId, body?: unknown): HeartbeatResponse {
    const request = parseBody(HeartbeatRequestSchema, body ?? {});
    const now = this.now();
    this.registry.heartbeat(workerId, now);
    this.log.debug(`Heartbeat from ${workerId}`, { reportedInstances: request.active_instances });
    return { success: true, worker_id: workerId, server_time: new Date(now).toISOString() };
  }

  deregisterWorker(workerId: WorkerId): DeregisterResponse {
    if (!this.registry.getWorker(workerId)) {
      throw new UnknownWorkerError(workerId);
    }
    const invalidated = this.registry.evict(workerId);
    return { success: true, worker_id: workerId, invalidated_instances: invalidated };
  }

  // -------------------------------------------------------------------------
  // Instance routing
  // -------------------------------------------------------------------------

  /**
   * Bind a new instance to the least-loaded worker and create it there.
   * Creating an id that is already bound is a no-op returning the existing
   * binding.
   */
  async createInstance(toolName: ToolName, body: unknown, timeoutMs?: number): Promise<CreateResponse> {
    const request = parseBody(CreateRequestSchema, body ?? {});
    const instanceId = request.instance_id ?? this.generateInstanceId();

    const existing = this.registry.getInstance(instanceId);
    if (existing) {
      this.assertSameTool(existing, toolName);
      const mapping = existing.state === 'pending' ? await this.awaitPending(existing) : existing;
      return { success: true, instance_id: instanceId, worker_id: mapping.workerId, created: false };
    }

    // Pick and bind without yielding; a concurrent create sees the pending binding
    const worker = this.registry.pickWorker(toolName);
    const binding = this.registry.bindInstance(
      { instanceId, workerId: worker.workerId, toolName, identity: request.identity, state: 'pending' },
      this.now()
    );
    this.log.debug(`Routing create of ${instanceId} to ${worker.workerId}`, {
      tool: toolName,
      activeInstances: worker.activeInstanceCount + 1,
    });

    const creation = this.forwardCreate(binding, worker.baseUrl, request.identity, timeoutMs);
    this.pendingCreates.set(instanceId, creation);
    try {
      const mapping = await creation;
      return { success: true, instance_id: instanceId, worker_id: mapping.workerId, created: true };
    } finally {
      // A newer create of the same id may have replaced this entry
      if (this.pendingCreates.get(instanceId) === creation) {
        this.pendingCreates.delete(instanceId);
      }
    }
  }

  /**
   * Forward an execute call to the worker that owns the instance and relay
   * its answer unchanged
   */
  async execute(toolName: ToolName, body: unknown, timeoutMs?: number): Promise<unknown> {
    const request = parseBody(ExecuteRequestSchema, body);
    return this.forwardBound(toolName, request.instance_id, 'execute', body, timeoutMs);
  }

  async calcReward(toolName: ToolName, body: unknown, timeoutMs?: number): Promise<unknown> {
    const request = parseBody(InstanceRequestSchema, body);
    return this.forwardBound(toolName, request.instance_id, 'calc_reward', body, timeoutMs);
  }

  /**
   * Release an instance. The binding is dropped whether or not the worker
   * confirms; a failed worker-side release is reported in the response.
   */
  async release(toolName: ToolName, body: unknown, timeoutMs?: number): Promise<ReleaseResponse> {
    const request = parseBody(InstanceRequestSchema, body);
    const mapping = await this.resolveBound(request.instance_id, toolName);
    const worker = this.registry.getWorker(mapping.workerId);
    if (!worker) {
      throw new InstanceNotBoundError(mapping.instanceId, `worker ${mapping.workerId} is gone`);
    }

    let workerError: string | undefined;
    try {
      await this.client.post({
        workerId: worker.workerId,
        baseUrl: worker.baseUrl,
        path: toolPath(toolName, 'release'),
        body: { instance_id: mapping.instanceId },
        timeoutMs: timeoutMs ?? this.config.requestTimeoutMs,
      });
    } catch (error) {
      workerError = error instanceof Error ? error.message : String(error);
      this.log.warn(`Worker-side release of ${mapping.instanceId} failed; binding dropped anyway`, {
        workerId: worker.workerId,
        error,
      });
    } finally {
      this.registry.unbindInstance(mapping.instanceId, 'released');
    }

    return {
      success: true,
      instance_id: mapping.instanceId,
      worker_id: worker.workerId,
      worker_released: workerError === undefined,
      ...(workerError !== undefined ? { worker_error: workerError } : {}),
    };
  }

  snapshot(): RegistrySnapshot {
    return this.registry.snapshot(this.now());
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async checkWorkerHealth(request: RegisterRequest): Promise<void> {
    const timeoutMs = this.config.healthCheckTimeoutMs;
    if (timeoutMs <= 0) {
      return;
    }
    const baseUrl = normalizeBaseUrl(request.base_url);
    const label = request.worker_id ?? baseUrl;
    try {
      await this.client.get({ workerId: label, baseUrl, path: '/health', timeoutMs });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.log.warn(`Refusing registration of ${label}: health check failed`, { baseUrl, error });
      throw new WorkerRequestError(
        `Worker at ${baseUrl} failed its health check: ${reason}`,
        label,
        error instanceof WorkerRequestError ? error.upstreamStatus : undefined
      );
    }
  }

  /**
   * Create the instance on the bound worker. Only `binding` itself is
   * activated or dropped: if the id was unbound and bound again meanwhile,
   * the newer binding belongs to another create call.
   */
  private async forwardCreate(
    binding: InstanceMapping,
    baseUrl: string,
    identity: unknown,
    timeoutMs: number | undefined
  ): Promise<InstanceMapping> {
    const { instanceId, workerId, toolName, bindingId } = binding;
    try {
      await this.client.post({
        workerId,
        baseUrl,
        path: toolPath(toolName, 'create'),
        body: { instance_id: instanceId, identity: identity ?? null },
        timeoutMs: timeoutMs ?? this.config.requestTimeoutMs,
      });
    } catch (error) {
      this.registry.unbindInstance(instanceId, 'create-failed', bindingId);
      this.log.warn(`Create of ${instanceId} on ${workerId} failed`, { tool: toolName, error });
      throw error;
    }

    // The sweep may have evicted the worker while the call was in flight
    if (this.registry.getInstance(instanceId)?.bindingId !== bindingId) {
      throw new InstanceNotBoundError(instanceId, `worker ${workerId} was removed during creation`);
    }
    return this.registry.activateInstance(instanceId, this.now(), bindingId);
  }

  private async forwardBound(
    toolName: ToolName,
    instanceId: InstanceId,
    operation: ToolOperation,
    body: unknown,
    timeoutMs: number | undefined
  ): Promise<unknown> {
    const mapping = await this.resolveBound(instanceId, toolName);
    const worker = this.registry.getWorker(mapping.workerId);
    if (!worker) {
      throw new InstanceNotBoundError(instanceId, `worker ${mapping.workerId} is gone`);
    }

    this.registry.touchInstance(instanceId, this.now());
    const result = await this.client.post({
      workerId: worker.workerId,
      baseUrl: worker.baseUrl,
      path: toolPath(toolName, operation),
      body,
      timeoutMs: timeoutMs ?? this.config.requestTimeoutMs,
    });
    this.registry.touchInstance(instanceId, this.now());
    return result;
  }

  /**
   * Active binding for the instance, waiting out an in-flight create
   */
  private async resolveBound(instanceId: InstanceId, toolName: ToolName): Promise<InstanceMapping> {
    const current = this.registry.getInstance(instanceId);
    if (!current) {
      throw new InstanceNotBoundError(instanceId);
    }
    this.assertSameTool(current, toolName);
    if (current.state === 'active') {
      return current;
    }
    return this.awaitPending(current);
  }

  private async awaitPending(mapping: InstanceMapping): Promise<InstanceMapping> {
    const pending = this.pendingCreates.get(mapping.instanceId);
    if (pending) {
      try {
        await pending;
      } catch (error) {
        throw new InstanceNotBoundError(
          mapping.instanceId,
          `creation failed: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    const resolved = this.registry.resolveInstance(mapping.instanceId);
    if (!resolved) {
      throw new InstanceNotBoundError(mapping.instanceId);
    }
    return resolved;
  }

  private assertSameTool(mapping: InstanceMapping, toolName: ToolName): void {
    if (mapping.toolName !== toolName) {
      throw new ValidationError(`Instance ${mapping.instanceId} belongs to tool ${mapping.toolName}`, {
        instanceId: mapping.instanceId,
        toolName: mapping.toolName,
      });
    }
  }
}

/**
 * Create a coordinator with default configuration
 */
export function createCoordinator(options?: CoordinatorOptions): Coordinator {
  return new Coordinator(options);
}
