/**
 * Wire protocol between callers, the coordinator and worker agents.
 *
 * Bodies are JSON with snake_case keys. Incoming bodies are validated with
 * zod; a failed parse surfaces as ValidationError.
 */

import { z } from 'zod';

import { ValidationError } from './errors.js';
import type { RegistrySnapshot } from './types.js';

// ---------------------------------------------------------------------------
// Worker → Master
// ---------------------------------------------------------------------------

export const HostInfoSchema = z
  .object({
    hostname: z.string().optional(),
    ip: z.string().optional(),
    port: z.number().int().optional(),
    pid: z.number().int().optional(),
  })
  .passthrough();

/** Optional id; an empty or blank string counts as absent so one is generated */
const optionalId = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().min(1).optional()
);

export const RegisterRequestSchema = z.object({
  worker_id: optionalId,
  base_url: z.string().trim().min(1, 'base_url must not be empty'),
  supported_tools: z
    .array(z.string().trim().min(1))
    .min(1, 'supported_tools must list at least one tool'),
  host_info: HostInfoSchema.optional(),
});

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;

export interface RegisterResponse {
  success: true;
  worker_id: string;
  replaced: boolean;
  heartbeat_interval_ms: number;
  heartbeat_timeout_ms: number;
}

export const HeartbeatRequestSchema = z
  .object({
    /** Reported for observability only; balancing uses the coordinator's own count */
    active_instances: z.number().int().nonnegative().optional(),
  })
  .default({});

export type HeartbeatRequest = z.infer<typeof HeartbeatRequestSchema>;

export interface HeartbeatResponse {
  success: true;
  worker_id: string;
  server_time: string;
}

export interface DeregisterResponse {
  success: true;
  worker_id: string;
  invalidated_instances: string[];
}

// ---------------------------------------------------------------------------
// Caller → Master (and Master → Worker, same shapes)
// ---------------------------------------------------------------------------

export const CreateRequestSchema = z.object({
  instance_id: optionalId,
  identity: z.unknown().optional(),
});

export type CreateRequest = z.infer<typeof CreateRequestSchema>;

export interface CreateResponse {
  success: true;
  instance_id: string;
  worker_id: string;
  /** false when the instance already existed and the call was a no-op */
  created: boolean;
}

export const InstanceRequestSchema = z.object({
  instance_id: z.string().trim().min(1, 'instance_id is required'),
});

export const ExecuteRequestSchema = InstanceRequestSchema.extend({
  parameters: z.record(z.string(), z.unknown()).optional(),
});

export type ExecuteRequest = z.infer<typeof ExecuteRequestSchema>;
export type InstanceRequest = z.infer<typeof InstanceRequestSchema>;

/** What a tool execution returns, relayed unchanged to the caller */
export const ExecuteResponseSchema = z
  .object({
    response: z.string(),
    reward_score: z.number(),
    metrics: z.record(z.string(), z.unknown()),
  })
  .passthrough();

export type ExecuteResponse = z.infer<typeof ExecuteResponseSchema>;

export interface ReleaseResponse {
  success: true;
  instance_id: string;
  worker_id: string;
  /** Whether the worker confirmed the release; the binding is dropped either way */
  worker_released: boolean;
  worker_error?: string;
}

export const CalcRewardResponseSchema = z
  .object({
    reward_score: z.number(),
  })
  .passthrough();

export type CalcRewardResponse = z.infer<typeof CalcRewardResponseSchema>;

/** Tool operations a worker exposes under /tools/{tool}/{operation} */
export const TOOL_OPERATIONS = ['create', 'execute', 'release', 'calc_reward'] as const;

export type ToolOperation = (typeof TOOL_OPERATIONS)[number];

export function isToolOperation(value: string): value is ToolOperation {
  return TOOL_OPERATIONS.some((operation) => operation === value);
}

export function toolPath(toolName: string, operation: ToolOperation): string {
  return `/tools/${encodeURIComponent(toolName)}/${operation}`;
}

/** Header carrying a caller-chosen timeout for the proxied call */
export const TIMEOUT_HEADER = 'x-timeout-ms';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate an untrusted body against a schema
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error), { issues: result.error.issues });
  }
  return result.data;
}

/**
 * Parse a timeout header value; undefined when absent
 */
export function parseTimeoutHeader(value: string | string[] | undefined): number | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const timeoutMs = Number(raw);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ValidationError(`${TIMEOUT_HEADER} must be a positive integer`, { value: raw });
  }
  return timeoutMs;
}

// ---------------------------------------------------------------------------
// GET /health
// ---------------------------------------------------------------------------

export const WorkerSummarySchema = z.object({
  worker_id: z.string(),
  base_url: z.string(),
  supported_tools: z.array(z.string()),
  active_instances: z.number().int(),
  status: z.string(),
  registered_at: z.string(),
  last_heartbeat_at: z.string(),
  host_info: HostInfoSchema,
});

export const InstanceSummarySchema = z.object({
  instance_id: z.string(),
  worker_id: z.string(),
  tool_name: z.string(),
  state: z.string(),
  created_at: z.string(),
  last_used_at: z.string(),
});

export const HealthReportSchema = z.object({
  status: z.literal('healthy'),
  generated_at: z.string(),
  total_workers: z.number().int(),
  online_workers: z.number().int(),
  total_instances: z.number().int(),
  known_tools: z.array(z.string()),
  workers: z.array(WorkerSummarySchema),
  tools: z.record(z.string(), z.array(z.string())),
  instances: z.array(InstanceSummarySchema),
});

export type HealthReport = z.infer<typeof HealthReportSchema>;

/** Wire form of a registry snapshot */
export function toHealthReport(snapshot: RegistrySnapshot): HealthReport {
  const iso = (ms: number) => new Date(ms).toISOString();
  return {
    status: 'healthy',
    generated_at: iso(snapshot.generatedAt),
    total_workers: snapshot.totalWorkers,
    online_workers: snapshot.onlineWorkers,
    total_instances: snapshot.totalInstances,
    known_tools: snapshot.knownTools,
    workers: snapshot.workers.map((worker) => ({
      worker_id: worker.workerId,
      base_url: worker.baseUrl,
      supported_tools: worker.supportedTools,
      active_instances: worker.activeInstanceCount,
      status: worker.status,
      registered_at: iso(worker.registeredAt),
      last_heartbeat_at: iso(worker.lastHeartbeatAt),
      host_info: worker.hostInfo,
    })),
    tools: snapshot.tools,
    instances: snapshot.instances.map((mapping) => ({
      instance_id: mapping.instanceId,
      worker_id: mapping.workerId,
      tool_name: mapping.toolName,
      state: mapping.state,
      created_at: iso(mapping.createdAt),
      last_used_at: iso(mapping.lastUsedAt),
    })),
  };
}
