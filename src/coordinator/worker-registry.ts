/**
 * Worker Registry - in-memory state for workers, tools and instance bindings
 *
 * Owns three structures:
 * 1. Worker records (workerId → WorkerRecord)
 * 2. Tool index (tool name → online workers advertising it)
 * 3. Instance mappings (instanceId → bound worker)
 *
 * Every method is synchronous and leaves the three structures consistent
 * before returning, so request handlers and the liveness sweep running on the
 * same event loop never observe a half-applied update. Callers that need a
 * pick followed by a bind do both in the same tick.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';

import {
  RegistryInvariantError,
  InstanceNotBoundError,
  NoWorkerAvailableError,
  UnknownWorkerError,
  ValidationError,
} from './errors.js';
import { LeastActiveInstancesBalancer, type LoadBalancer } from './load-balancer.js';
import {
  type EvictionReport,
  type InstanceId,
  type InstanceMapping,
  type InstanceState,
  type RegistrationResult,
  type RegistrySnapshot,
  type ToolIndex,
  type ToolName,
  type WorkerId,
  type WorkerRecord,
  type WorkerRegistration,
  WorkerStatus,
} from './types.js';

/** Input for binding an instance to a worker */
export interface InstanceBinding {
  instanceId: InstanceId;
  workerId: WorkerId;
  toolName: ToolName;
  identity?: unknown;
  state?: InstanceState;
}

/** Why an instance mapping went away */
export type ReleaseReason = 'released' | 'create-failed' | 'idle' | 'worker-evicted' | 'worker-replaced';

/** Worker registry events */
export interface WorkerRegistryEvents {
  'worker:registered': (worker: WorkerRecord, replaced: boolean) => void;
  'worker:offline': (worker: WorkerRecord) => void;
  'worker:evicted': (worker: WorkerRecord, invalidated: InstanceId[]) => void;
  'instance:bound': (mapping: InstanceMapping) => void;
  'instance:released': (mapping: InstanceMapping, reason: ReleaseReason) => void;
}

export interface WorkerRegistryOptions {
  balancer?: LoadBalancer;
  /** Id generator for workers that register without one */
  generateWorkerId?: () => WorkerId;
}

function defaultWorkerId(): WorkerId {
  return `wkr_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

function cloneWorker(record: WorkerRecord): WorkerRecord {
  return { ...record, supportedTools: [...record.supportedTools], hostInfo: { ...record.hostInfo } };
}

function cloneInstance(mapping: InstanceMapping): InstanceMapping {
  return { ...mapping };
}

/** Trim, drop empties, dedupe while keeping first-seen order */
function normalizeTools(tools: readonly string[]): ToolName[] {
  const seen = new Set<ToolName>();
  for (const tool of tools) {
    const name = tool.trim();
    if (name) seen.add(name);
  }
  return Array.from(seen);
}

export function normalizeBaseUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ValidationError('base_url must not be empty');
  }
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ValidationError(`base_url is not a valid URL: ${trimmed}`, { baseUrl: trimmed });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(`base_url must use http or https: ${trimmed}`, { baseUrl: trimmed });
  }
  return trimmed.replace(/\/+$/, '');
}

/**
 * Worker Registry
 */
export class WorkerRegistry extends EventEmitter {
  private workers: Map<WorkerId, WorkerRecord> = new Map();
  private tools: Map<ToolName, Set<WorkerId>> = new Map();
  private instances: Map<InstanceId, InstanceMapping> = new Map();
  /** Every tool ever declared or advertised, including ones with no worker now */
  private knownTools: Set<ToolName> = new Set();
  private balancer: LoadBalancer;
  private generateWorkerId: () => WorkerId;

  constructor(options: WorkerRegistryOptions = {}) {
    super();
    this.balancer = options.balancer ?? new LeastActiveInstancesBalancer();
    this.generateWorkerId = options.generateWorkerId ?? defaultWorkerId;
  }

  /**
   * Declare tools up front (from a tool-definition file) so they show up in
   * snapshots before any worker advertises them
   */
  declareTools(toolNames: readonly ToolName[]): void {
    for (const name of normalizeTools(toolNames)) {
      this.knownTools.add(name);
    }
  }

  /**
   * Insert or replace a worker record.
   *
   * Replacing a record whose base URL changed drops every instance bound to the
   * old record. Re-registering at the same URL keeps bindings for tools the
   * worker still advertises.
   */
  register(registration: WorkerRegistration, now: number = Date.now()): RegistrationResult {
    const baseUrl = normalizeBaseUrl(registration.baseUrl);
    const supportedTools = normalizeTools(registration.supportedTools);
    if (supportedTools.length === 0) {
      throw new ValidationError('supported_tools must list at least one tool');
    }

    const workerId = registration.workerId?.trim() || this.generateWorkerId();
    const existing = this.workers.get(workerId);
    let invalidatedInstances: InstanceId[] = [];

    if (existing) {
      this.removeFromToolIndex(existing);
      if (existing.baseUrl !== baseUrl) {
        invalidatedInstances = this.dropInstances(workerId, 'worker-replaced');
      } else {
        invalidatedInstances = this.dropInstances(
          workerId,
          'worker-replaced',
          (mapping) => !supportedTools.includes(mapping.toolName)
        );
      }
    }

    const keepsIdentity = existing !== undefined && existing.baseUrl === baseUrl;
    const record: WorkerRecord = {
      workerId,
      baseUrl,
      supportedTools,
      activeInstanceCount: keepsIdentity ? this.countInstancesOf(workerId) : 0,
      registeredAt: keepsIdentity && existing ? existing.registeredAt : now,
      lastHeartbeatAt: now,
      status: WorkerStatus.Online,
      hostInfo: { ...(registration.hostInfo ?? {}) },
    };

    this.workers.set(workerId, record);
    this.addToToolIndex(record);
    this.emit('worker:registered', cloneWorker(record), existing !== undefined);

    return {
      worker: cloneWorker(record),
      replaced: existing !== undefined,
      invalidatedInstances,
    };
  }

  /**
   * Refresh a worker's liveness timestamp.
   * Unknown ids must re-register.
   */
  heartbeat(workerId: WorkerId, now: number = Date.now()): WorkerRecord {
    const record = this.workers.get(workerId);
    if (!record || record.status !== WorkerStatus.Online) {
      throw new UnknownWorkerError(workerId);
    }
    record.lastHeartbeatAt = now;
    return cloneWorker(record);
  }

  /**
   * Choose the online worker for a new instance of `toolName`
   */
  pickWorker(toolName: ToolName): WorkerRecord {
    const candidates: WorkerRecord[] = [];
    for (const workerId of this.tools.get(toolName) ?? []) {
      const record = this.workers.get(workerId);
      if (record?.status === WorkerStatus.Online) {
        candidates.push(record);
      }
    }

    const chosen = this.balancer.select(candidates);
    if (!chosen) {
      throw new NoWorkerAvailableError(toolName);
    }
    return cloneWorker(chosen);
  }

  /**
   * Bind an instance to a worker and count it against the worker's load
   */
  bindInstance(binding: InstanceBinding, now: number = Date.now()): InstanceMapping {
    const instanceId = binding.instanceId.trim();
    if (!instanceId) {
      throw new ValidationError('instance_id must not be empty');
    }

    const existing = this.instances.get(instanceId);
    if (existing) {
      throw new ValidationError(`Instance ${instanceId} is already bound to worker ${existing.workerId}`, {
        instanceId,
        workerId: existing.workerId,
      });
    }

    const worker = this.workers.get(binding.workerId);
    if (!worker || worker.status !== WorkerStatus.Online) {
      throw new UnknownWorkerError(binding.workerId);
    }
    if (!worker.supportedTools.includes(binding.toolName)) {
      throw new ValidationError(`Worker ${worker.workerId} does not provide tool ${binding.toolName}`, {
        workerId: worker.workerId,
        toolName: binding.toolName,
      });
    }

    const mapping: InstanceMapping = {
      instanceId,
      workerId: worker.workerId,
      bindingId: randomUUID(),
      toolName: binding.toolName,
      identity: binding.identity ?? null,
      state: binding.state ?? 'active',
      createdAt: now,
      lastUsedAt: now,
    };

    this.instances.set(instanceId, mapping);
    worker.activeInstanceCount++;
    this.emit('instance:bound', cloneInstance(mapping));
    return cloneInstance(mapping);
  }

  /**
   * Mark a pending binding as active once the worker confirmed creation.
   * With `bindingId`, only that exact binding is activated.
   */
  activateInstance(instanceId: InstanceId, now: number = Date.now(), bindingId?: string): InstanceMapping {
    const mapping = this.instances.get(instanceId);
    if (!mapping || (bindingId !== undefined && mapping.bindingId !== bindingId)) {
      throw new InstanceNotBoundError(instanceId);
    }
    mapping.state = 'active';
    mapping.lastUsedAt = now;
    return cloneInstance(mapping);
  }

  /**
   * Active binding for an instance, or undefined when there is none
   */
  resolveInstance(instanceId: InstanceId): InstanceMapping | undefined {
    const mapping = this.instances.get(instanceId);
    return mapping?.state === 'active' ? cloneInstance(mapping) : undefined;
  }

  /**
   * Binding for an instance in any state (pending included)
   */
  getInstance(instanceId: InstanceId): InstanceMapping | undefined {
    const mapping = this.instances.get(instanceId);
    return mapping ? cloneInstance(mapping) : undefined;
  }

  touchInstance(instanceId: InstanceId, now: number = Date.now()): void {
    const mapping = this.instances.get(instanceId);
    if (mapping) {
      mapping.lastUsedAt = now;
    }
  }

  /**
   * Remove one binding and release its slot on the worker. With `bindingId`,
   * a binding made by a later bind of the same id is left alone.
   */
  unbindInstance(
    instanceId: InstanceId,
    reason: ReleaseReason = 'released',
    bindingId?: string
  ): InstanceMapping | undefined {
    const mapping = this.instances.get(instanceId);
    if (!mapping || (bindingId !== undefined && mapping.bindingId !== bindingId)) {
      return undefined;
    }
    this.instances.delete(instanceId);
    this.releaseSlot(mapping);
    this.emit('instance:released', cloneInstance(mapping), reason);
    return cloneInstance(mapping);
  }

  /**
   * Remove a worker and every binding that points at it.
   * Returns the invalidated instance ids.
   */
  evict(workerId: WorkerId): InstanceId[] {
    const record = this.workers.get(workerId);
    if (!record) {
      return [];
    }

    this.removeFromToolIndex(record);
    const invalidated = this.dropInstances(workerId, 'worker-evicted');
    this.workers.delete(workerId);
    this.emit('worker:evicted', cloneWorker(record), invalidated);
    return invalidated;
  }

  /**
   * Move every worker whose heartbeat is older than `timeoutMs` to OFFLINE and
   * evict it, in one pass
   */
  expireStaleWorkers(now: number, timeoutMs: number): EvictionReport[] {
    const stale = Array.from(this.workers.values()).filter(
      (record) => record.status === WorkerStatus.Online && now - record.lastHeartbeatAt > timeoutMs
    );

    const reports: EvictionReport[] = [];
    for (const record of stale) {
      record.status = WorkerStatus.Offline;
      this.removeFromToolIndex(record);
      this.emit('worker:offline', cloneWorker(record));

      reports.push({
        workerId: record.workerId,
        baseUrl: record.baseUrl,
        lastHeartbeatAt: record.lastHeartbeatAt,
        invalidatedInstances: this.evict(record.workerId),
      });
    }
    return reports;
  }

  /**
   * Release active instances unused for longer than `idleTimeoutMs`.
   * A non-positive timeout disables idle expiry.
   */
  expireIdleInstances(now: number, idleTimeoutMs: number): InstanceMapping[] {
    if (idleTimeoutMs <= 0) {
      return [];
    }
    const idle = Array.from(this.instances.values()).filter(
      (mapping) => mapping.state === 'active' && now - mapping.lastUsedAt > idleTimeoutMs
    );
    const released: InstanceMapping[] = [];
    for (const mapping of idle) {
      const removed = this.unbindInstance(mapping.instanceId, 'idle');
      if (removed) released.push(removed);
    }
    return released;
  }

  getWorker(workerId: WorkerId): WorkerRecord | undefined {
    const record = this.workers.get(workerId);
    return record ? cloneWorker(record) : undefined;
  }

  listWorkers(): WorkerRecord[] {
    return Array.from(this.workers.values(), cloneWorker);
  }

  listInstances(): InstanceMapping[] {
    return Array.from(this.instances.values(), cloneInstance);
  }

  /**
   * Tool name → online worker ids, tools without workers omitted
   */
  toolIndex(): ToolIndex {
    const index: ToolIndex = {};
    for (const [toolName, workerIds] of this.tools) {
      if (workerIds.size > 0) {
        index[toolName] = Array.from(workerIds);
      }
    }
    return index;
  }

  get workerCount(): number {
    return this.workers.size;
  }

  get instanceCount(): number {
    return this.instances.size;
  }

  snapshot(now: number = Date.now()): RegistrySnapshot {
    const workers = this.listWorkers();
    return {
      generatedAt: now,
      totalWorkers: workers.length,
      onlineWorkers: workers.filter((w) => w.status === WorkerStatus.Online).length,
      totalInstances: this.instances.size,
      knownTools: Array.from(this.knownTools).sort(),
      workers,
      tools: this.toolIndex(),
      instances: this.listInstances(),
    };
  }

  /**
   * Check the cross-structure invariants; throws RegistryInvariantError
   */
  verifyInvariants(): void {
    const counts = new Map<WorkerId, number>();
    for (const mapping of this.instances.values()) {
      if (!this.workers.has(mapping.workerId)) {
        throw new RegistryInvariantError(`Instance ${mapping.instanceId} points at missing worker`, {
          instanceId: mapping.instanceId,
          workerId: mapping.workerId,
        });
      }
      counts.set(mapping.workerId, (counts.get(mapping.workerId) ?? 0) + 1);
    }

    for (const record of this.workers.values()) {
      const expected = counts.get(record.workerId) ?? 0;
      if (record.activeInstanceCount !== expected) {
        throw new RegistryInvariantError(`Worker ${record.workerId} instance count drifted`, {
          workerId: record.workerId,
          recorded: record.activeInstanceCount,
          expected,
        });
      }
      for (const tool of record.supportedTools) {
        const indexed = this.tools.get(tool)?.has(record.workerId) ?? false;
        if (indexed !== (record.status === WorkerStatus.Online)) {
          throw new RegistryInvariantError(`Tool index out of sync for ${record.workerId}`, {
            workerId: record.workerId,
            tool,
          });
        }
      }
    }

    for (const [tool, workerIds] of this.tools) {
      for (const workerId of workerIds) {
        const record = this.workers.get(workerId);
        if (!record || record.status !== WorkerStatus.Online || !record.supportedTools.includes(tool)) {
          throw new RegistryInvariantError(`Tool index lists ${workerId} for ${tool}`, { workerId, tool });
        }
      }
    }
  }

  private addToToolIndex(record: WorkerRecord): void {
    for (const tool of record.supportedTools) {
      this.knownTools.add(tool);
      let workerIds = this.tools.get(tool);
      if (!workerIds) {
        workerIds = new Set();
        this.tools.set(tool, workerIds);
      }
      workerIds.add(record.workerId);
    }
  }

  private removeFromToolIndex(record: WorkerRecord): void {
    for (const tool of record.supportedTools) {
      const workerIds = this.tools.get(tool);
      if (!workerIds) continue;
      workerIds.delete(record.workerId);
      if (workerIds.size === 0) {
        this.tools.delete(tool);
      }
    }
  }

  private countInstancesOf(workerId: WorkerId): number {
    let count = 0;
    for (const mapping of this.instances.values()) {
      if (mapping.workerId === workerId) count++;
    }
    return count;
  }

  private dropInstances(
    workerId: WorkerId,
    reason: ReleaseReason,
    predicate: (mapping: InstanceMapping) => boolean = () => true
  ): InstanceId[] {
    const dropped: InstanceId[] = [];
    for (const [instanceId, mapping] of this.instances) {
      if (mapping.workerId === workerId && predicate(mapping)) {
        this.instances.delete(instanceId);
        this.releaseSlot(mapping);
        this.emit('instance:released', cloneInstance(mapping), reason);
        dropped.push(instanceId);
      }
    }
    return dropped;
  }

  private releaseSlot(mapping: InstanceMapping): void {
    const worker = this.workers.get(mapping.workerId);
    if (!worker) return;
    worker.activeInstanceCount--;
    if (worker.activeInstanceCount < 0) {
      throw new RegistryInvariantError(`Worker ${worker.workerId} instance count went negative`, {
        workerId: worker.workerId,
      });
    }
  }
}

// Type augmentation for EventEmitter
export interface WorkerRegistry {
  on<K extends keyof WorkerRegistryEvents>(event: K, listener: WorkerRegistryEvents[K]): this;
  emit<K extends keyof WorkerRegistryEvents>(event: K, ...args: Parameters<WorkerRegistryEvents[K]>): boolean;
}
