/**
 * Outbound calls from the coordinator to worker agents.
 *
 * One POST per proxied request with a deadline, plus a GET of the worker's
 * /health when it registers. No retries and no fan-out: a timeout or failure
 * goes straight back to the caller.
 */

import { WorkerRequestError, WorkerTimeoutError } from './errors.js';
import type { WorkerId } from './types.js';

export interface WorkerCall {
  workerId: WorkerId;
  baseUrl: string;
  path: string;
  body: unknown;
  timeoutMs: number;
}

/** A body-less request, e.g. the health check at registration */
export type WorkerHealthCheck = Omit<WorkerCall, 'body'>;

export interface WorkerClient {
  post(call: WorkerCall): Promise<unknown>;
  get(check: WorkerHealthCheck): Promise<unknown>;
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function isAbortTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * WorkerClient backed by the global fetch
 */
export class HttpWorkerClient implements WorkerClient {
  async post(call: WorkerCall): Promise<unknown> {
    return this.send(call, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(call.body ?? {}),
    });
  }

  async get(check: WorkerHealthCheck): Promise<unknown> {
    return this.send(check, { method: 'GET' });
  }

  private async send(call: WorkerHealthCheck, init: RequestInit): Promise<unknown> {
    const url = `${call.baseUrl}${call.path}`;

    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: AbortSignal.timeout(call.timeoutMs) });
    } catch (error) {
      if (isAbortTimeout(error)) {
        throw new WorkerTimeoutError(call.workerId, call.timeoutMs);
      }
      throw new WorkerRequestError(
        `Request to worker ${call.workerId} failed: ${error instanceof Error ? error.message : String(error)}`,
        call.workerId
      );
    }

    let body: unknown;
    try {
      body = await readJson(response);
    } catch (error) {
      if (isAbortTimeout(error)) {
        throw new WorkerTimeoutError(call.workerId, call.timeoutMs);
      }
      throw new WorkerRequestError(`Worker ${call.workerId} closed the response early`, call.workerId, response.status);
    }

    if (!response.ok) {
      throw new WorkerRequestError(
        `Worker ${call.workerId} returned ${response.status}`,
        call.workerId,
        response.status,
        body
      );
    }

    return body;
  }
}
