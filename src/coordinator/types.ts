/**
 * Coordinator types for routing tool instances across registered workers
 */

/** Unique identifier for a registered worker */
export type WorkerId = string;

/** Unique identifier for one tool-call session */
export type InstanceId = string;

/** Name under which a worker advertises a tool */
export type ToolName = string;

/** Worker liveness state */
export enum WorkerStatus {
  /** Heartbeats are arriving within the timeout */
  Online = 'online',
  /** Heartbeat timeout elapsed; the worker is being evicted */
  Offline = 'offline',
}

/** Descriptive metadata about the worker host. Never used for routing. */
export interface HostInfo {
  hostname?: string;
  ip?: string;
  port?: number;
  pid?: number;
  [key: string]: unknown;
}

/** One registered worker process */
export interface WorkerRecord {
  workerId: WorkerId;
  /** Address at which the worker's tool endpoints are reachable */
  baseUrl: string;
  /** Tools this worker can execute (deduplicated, registration order) */
  supportedTools: ToolName[];
  /** Instances currently bound to this worker, maintained by the coordinator */
  activeInstanceCount: number;
  /** Registration timestamp (ms since epoch) */
  registeredAt: number;
  /** Last heartbeat or registration timestamp (ms since epoch) */
  lastHeartbeatAt: number;
  status: WorkerStatus;
  hostInfo: HostInfo;
}

/** Registration input accepted by the registry */
export interface WorkerRegistration {
  workerId?: WorkerId;
  baseUrl: string;
  supportedTools: ToolName[];
  hostInfo?: HostInfo;
}

/**
 * Instance binding state.
 * `pending` while the create call is in flight on the chosen worker.
 */
export type InstanceState = 'pending' | 'active';

/** Binding of one session to one worker */
export interface InstanceMapping {
  instanceId: InstanceId;
  /** Chosen at creation; immutable for the life of the mapping */
  workerId: WorkerId;
  /** Unique per bind, so a late create answer can tell its binding from a newer one */
  bindingId: string;
  toolName: ToolName;
  /** Per-session context forwarded to the worker at creation, never interpreted */
  identity: unknown;
  state: InstanceState;
  createdAt: number;
  lastUsedAt: number;
}

/** Tool name → workers currently advertising it (online workers only) */
export type ToolIndex = Record<ToolName, WorkerId[]>;

/** Outcome of a register call */
export interface RegistrationResult {
  worker: WorkerRecord;
  /** Whether an existing record with the same id was replaced */
  replaced: boolean;
  /** Instances dropped because the replaced record pointed elsewhere */
  invalidatedInstances: InstanceId[];
}

/** A worker removed by the liveness sweep */
export interface EvictionReport {
  workerId: WorkerId;
  baseUrl: string;
  lastHeartbeatAt: number;
  invalidatedInstances: InstanceId[];
}

/** Read-only projection of registry state */
export interface RegistrySnapshot {
  generatedAt: number;
  totalWorkers: number;
  onlineWorkers: number;
  totalInstances: number;
  knownTools: ToolName[];
  workers: WorkerRecord[];
  tools: ToolIndex;
  instances: InstanceMapping[];
}

/** Coordinator configuration */
export interface CoordinatorConfig {
  /** A worker is evicted once its last heartbeat is older than this (ms) */
  heartbeatTimeoutMs: number;
  /** Interval between liveness sweeps (ms) */
  sweepIntervalMs: number;
  /** Heartbeat period handed to workers at registration (ms) */
  heartbeatIntervalMs: number;
  /** Default timeout for one proxied call to a worker (ms) */
  requestTimeoutMs: number;
  /** Idle instances are released after this long (ms, 0 = never) */
  instanceIdleTimeoutMs: number;
  /** Deadline for the GET /health a worker must answer to register (ms, 0 = skip the check) */
  healthCheckTimeoutMs: number;
}

/** Default coordinator configuration */
export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = {
  heartbeatTimeoutMs: 60_000, // 2 missed heartbeats
  sweepIntervalMs: 5_000,
  heartbeatIntervalMs: 30_000,
  requestTimeoutMs: 600_000, // 10 minutes per query
  instanceIdleTimeoutMs: 0,
  healthCheckTimeoutMs: 10_000,
};
