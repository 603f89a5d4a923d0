/**
 * Worker-side client for the coordinator's registration endpoints
 */

import { z } from 'zod';

import { CoordinatorUnavailableError, UnknownWorkerError, ValidationError } from '../coordinator/errors.js';
import type { HostInfo } from '../coordinator/types.js';
import type { DeregisterResponse, HeartbeatResponse, RegisterResponse } from '../coordinator/protocol.js';

const RegisterResponseSchema = z.object({
  success: z.literal(true),
  worker_id: z.string(),
  replaced: z.boolean().default(false),
  heartbeat_interval_ms: z.number().int().positive(),
  heartbeat_timeout_ms: z.number().int().positive(),
});

const HeartbeatResponseSchema = z.object({
  success: z.literal(true),
  worker_id: z.string(),
  server_time: z.string(),
});

const DeregisterResponseSchema = z.object({
  success: z.literal(true),
  worker_id: z.string(),
  invalidated_instances: z.array(z.string()),
});

const ErrorResponseSchema = z.object({
  error: z.object({ message: z.string() }),
});

export interface RegistrationRequest {
  workerId?: string;
  baseUrl: string;
  supportedTools: string[];
  hostInfo?: HostInfo;
}

export interface MasterClientOptions {
  /** Per-call deadline (ms) */
  timeoutMs?: number;
}

export class MasterClient {
  readonly masterUrl: string;
  private readonly timeoutMs: number;

  constructor(masterUrl: string, options: MasterClientOptions = {}) {
    this.masterUrl = masterUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async register(request: RegistrationRequest): Promise<RegisterResponse> {
    const body = await this.send('POST', '/register', {
      worker_id: request.workerId,
      base_url: request.baseUrl,
      supported_tools: request.supportedTools,
      host_info: request.hostInfo,
    });
    return this.parse(RegisterResponseSchema, body);
  }

  /**
   * Throws UnknownWorkerError when the coordinator no longer knows this id
   */
  async heartbeat(workerId: string, activeInstances?: number): Promise<HeartbeatResponse> {
    const path = `/heartbeat/${encodeURIComponent(workerId)}`;
    const body = await this.send('PUT', path, { active_instances: activeInstances }, workerId);
    return this.parse(HeartbeatResponseSchema, body);
  }

  async deregister(workerId: string): Promise<DeregisterResponse> {
    const body = await this.send('DELETE', `/workers/${encodeURIComponent(workerId)}`, undefined, workerId);
    return this.parse(DeregisterResponseSchema, body);
  }

  private async send(method: string, path: string, payload: unknown, workerId?: string): Promise<unknown> {
    let response: Response;
    let text: string;
    try {
      response = await fetch(`${this.masterUrl}${path}`, {
        method,
        headers: payload === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new CoordinatorUnavailableError(
        `Coordinator at ${this.masterUrl} unreachable: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    let body: unknown = null;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }

    if (response.ok) {
      return body;
    }
    if (response.status === 404 && workerId !== undefined) {
      throw new UnknownWorkerError(workerId);
    }
    const parsed = ErrorResponseSchema.safeParse(body);
    const message = parsed.success ? parsed.data.error.message : `${method} ${path} returned ${response.status}`;
    if (response.status >= 500) {
      throw new CoordinatorUnavailableError(message, response.status);
    }
    throw new ValidationError(message, { status: response.status });
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new CoordinatorUnavailableError(`Unexpected response from coordinator: ${result.error.message}`);
    }
    return result.data;
  }
}
