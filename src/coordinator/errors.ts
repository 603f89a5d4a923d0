/**
 * Coordinator error taxonomy.
 *
 * Every failure that can reach a caller is a FleetError carrying a stable
 * code, the HTTP status it maps to, and whether retrying the same call can
 * succeed.
 */

export type FleetErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNKNOWN_WORKER'
  | 'NO_WORKER_AVAILABLE'
  | 'INSTANCE_NOT_BOUND'
  | 'WORKER_TIMEOUT'
  | 'WORKER_REQUEST_FAILED'
  | 'ROUTE_NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'COORDINATOR_UNAVAILABLE'
  | 'REGISTRY_INVARIANT';

/**
 * Base error class for coordinator and worker-agent failures
 */
export class FleetError extends Error {
  constructor(
    message: string,
    public readonly code: FleetErrorCode,
    public readonly status: number,
    public readonly retryable: boolean,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FleetError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FleetError);
    }
  }
}

/** Malformed registration or request body. Not retried. */
export class ValidationError extends FleetError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, false, details);
    this.name = 'ValidationError';
  }
}

/** Heartbeat or binding for a worker id that is not registered */
export class UnknownWorkerError extends FleetError {
  constructor(public readonly workerId: string) {
    super(`Worker ${workerId} is not registered`, 'UNKNOWN_WORKER', 404, false, { workerId });
    this.name = 'UnknownWorkerError';
  }
}

/** No online worker advertises the requested tool */
export class NoWorkerAvailableError extends FleetError {
  constructor(public readonly toolName: string) {
    super(`No online worker available for tool ${toolName}`, 'NO_WORKER_AVAILABLE', 503, true, {
      toolName,
    });
    this.name = 'NoWorkerAvailableError';
  }
}

/**
 * The instance id has no live binding (never created, released, or its
 * worker was evicted). Callers may create a fresh instance but lose the
 * session state held by the old one.
 */
export class InstanceNotBoundError extends FleetError {
  constructor(
    public readonly instanceId: string,
    reason = 'no live binding'
  ) {
    super(`Instance ${instanceId} is not bound: ${reason}`, 'INSTANCE_NOT_BOUND', 404, false, {
      instanceId,
    });
    this.name = 'InstanceNotBoundError';
  }
}

/** A proxied call exceeded its deadline. The worker is not evicted for this. */
export class WorkerTimeoutError extends FleetError {
  constructor(
    public readonly workerId: string,
    public readonly timeoutMs: number
  ) {
    super(`Worker ${workerId} did not answer within ${timeoutMs}ms`, 'WORKER_TIMEOUT', 504, true, {
      workerId,
      timeoutMs,
    });
    this.name = 'WorkerTimeoutError';
  }
}

/** The worker was unreachable or answered with a non-2xx status */
export class WorkerRequestError extends FleetError {
  constructor(
    message: string,
    public readonly workerId: string,
    public readonly upstreamStatus?: number,
    public readonly upstreamBody?: unknown
  ) {
    super(message, 'WORKER_REQUEST_FAILED', 502, true, {
      workerId,
      upstreamStatus,
      upstreamBody,
    });
    this.name = 'WorkerRequestError';
  }
}

export class RouteNotFoundError extends FleetError {
  constructor(method: string, path: string) {
    super(`No route for ${method} ${path}`, 'ROUTE_NOT_FOUND', 404, false, { method, path });
    this.name = 'RouteNotFoundError';
  }
}

export class PayloadTooLargeError extends FleetError {
  constructor(limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes`, 'PAYLOAD_TOO_LARGE', 413, false, { limitBytes });
    this.name = 'PayloadTooLargeError';
  }
}

/** A worker agent could not reach the coordinator, or it answered 5xx */
export class CoordinatorUnavailableError extends FleetError {
  constructor(message: string, upstreamStatus?: number) {
    super(message, 'COORDINATOR_UNAVAILABLE', 503, true, { upstreamStatus });
    this.name = 'CoordinatorUnavailableError';
  }
}

/** Registry state contradicts its own invariants. Fatal to the coordinator. */
export class RegistryInvariantError extends FleetError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REGISTRY_INVARIANT', 500, false, details);
    this.name = 'RegistryInvariantError';
  }
}

export function isFleetError(value: unknown): value is FleetError {
  return value instanceof FleetError;
}

/** Structured failure body returned to callers */
export interface ErrorBody {
  success: false;
  error: {
    code: FleetErrorCode | 'INTERNAL_ERROR';
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

export function toErrorBody(error: unknown): { status: number; body: ErrorBody } {
  if (isFleetError(error)) {
    return {
      status: error.status,
      body: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          retryable: error.retryable,
          ...(error.details ? { details: error.details } : {}),
        },
      },
    };
  }

  return {
    status: 500,
    body: {
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: error instanceof Error ? error.message : String(error),
        retryable: false,
      },
    },
  };
}
