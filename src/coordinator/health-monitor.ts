/**
 * Health Monitor - periodic liveness sweep over the worker registry
 *
 * Per-worker state machine:
 *   ONLINE --(heartbeat timeout)--> OFFLINE --(evict)--> removed
 *
 * Runs on its own timer, independent of request traffic, and talks to request
 * handlers only through the registry's synchronous operations. Stopping is
 * driven by an AbortSignal so the owner can cancel it together with anything
 * else tied to the same lifecycle.
 */

import { createLogger, type Logger } from '../logger.js';
import type { EvictionReport, InstanceMapping } from './types.js';
import type { WorkerRegistry } from './worker-registry.js';

export interface HealthMonitorOptions {
  /** Heartbeat age after which a worker is evicted (ms) */
  heartbeatTimeoutMs: number;
  /** Interval between sweeps (ms) */
  sweepIntervalMs: number;
  /** Idle instance expiry (ms, 0 = disabled) */
  instanceIdleTimeoutMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
  logger?: Logger;
}

/** What one sweep removed */
export interface SweepResult {
  sweptAt: number;
  evicted: EvictionReport[];
  idleInstances: InstanceMapping[];
}

export class HealthMonitor {
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private readonly now: () => number;
  private readonly log: Logger;
  private sweeps = 0;

  constructor(
    private readonly registry: WorkerRegistry,
    private readonly options: HealthMonitorOptions
  ) {
    if (options.sweepIntervalMs <= 0) {
      throw new RangeError('sweepIntervalMs must be positive');
    }
    if (options.heartbeatTimeoutMs <= 0) {
      throw new RangeError('heartbeatTimeoutMs must be positive');
    }
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger('HealthMonitor');
  }

  /**
   * Start sweeping. Aborting `signal` (or calling stop()) cancels the task.
   */
  start(signal?: AbortSignal): void {
    if (this.timer) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    if (signal) {
      if (signal.aborted) {
        return;
      }
      signal.addEventListener('abort', () => controller.abort(), { once: true });
    }
    controller.signal.addEventListener('abort', () => this.clearTimer(), { once: true });

    this.timer = setInterval(() => {
      if (controller.signal.aborted) return;
      try {
        this.sweep();
      } catch (error) {
        this.log.error('Sweep failed', { error });
      }
    }, this.options.sweepIntervalMs);
    this.timer.unref();

    this.log.info('Started', {
      sweepIntervalMs: this.options.sweepIntervalMs,
      heartbeatTimeoutMs: this.options.heartbeatTimeoutMs,
    });
  }

  stop(): void {
    if (this.controller && !this.controller.signal.aborted) {
      this.controller.abort();
    }
    this.clearTimer();
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get sweepCount(): number {
    return this.sweeps;
  }

  /**
   * Run one sweep now
   */
  sweep(): SweepResult {
    const sweptAt = this.now();
    this.sweeps++;

    const evicted = this.registry.expireStaleWorkers(sweptAt, this.options.heartbeatTimeoutMs);
    for (const report of evicted) {
      this.log.warn(`Worker ${report.workerId} missed heartbeats, evicted`, {
        baseUrl: report.baseUrl,
        silentForMs: sweptAt - report.lastHeartbeatAt,
        invalidatedInstances: report.invalidatedInstances.length,
      });
      for (const instanceId of report.invalidatedInstances) {
        this.log.debug(`Invalidated instance ${instanceId}`, { workerId: report.workerId });
      }
    }

    const idleInstances = this.registry.expireIdleInstances(sweptAt, this.options.instanceIdleTimeoutMs ?? 0);
    if (idleInstances.length > 0) {
      this.log.info(`Released ${idleInstances.length} idle instance(s)`, {
        instances: idleInstances.map((m) => m.instanceId),
      });
    }

    return { sweptAt, evicted, idleInstances };
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.log.info('Stopped');
    }
  }
}
