/**
 * Coordinator Module - routes tool instances to registered workers
 *
 * Provides:
 * - Worker registry: worker records, tool index and instance bindings
 * - Least-active-instances load balancing for new instances
 * - Heartbeat-driven liveness sweep that evicts silent workers
 * - HTTP surface for workers (register/heartbeat) and callers (tool calls)
 *
 * Architecture:
 * ```
 *   caller ──► Coordinator ──► Worker A  (instances a1, a2)
 *                  │      └──► Worker B  (instance b1)
 *                  ▼
 *      instance_id → worker_id (fixed at create)
 * ```
 *
 * Usage:
 * ```ts
 * import { Coordinator, CoordinatorServer } from './coordinator/index.js';
 *
 * const coordinator = new Coordinator({ config: { heartbeatTimeoutMs: 60_000 } });
 * const server = new CoordinatorServer(coordinator);
 * await server.listen(8000);
 * ```
 */

export * from './types.js';
export * from './errors.js';
export * from './protocol.js';
export { LeastActiveInstancesBalancer, compareByLoad, type LoadBalancer } from './load-balancer.js';
export {
  WorkerRegistry,
  type InstanceBinding,
  type ReleaseReason,
  type WorkerRegistryEvents,
  type WorkerRegistryOptions,
} from './worker-registry.js';
export { HealthMonitor, type HealthMonitorOptions, type SweepResult } from './health-monitor.js';
export { HttpWorkerClient, type WorkerCall, type WorkerClient, type WorkerHealthCheck } from './worker-client.js';
export { Coordinator, createCoordinator, type CoordinatorOptions } from './coordinator.js';
export { CoordinatorServer, type CoordinatorServerOptions } from './coordinator-server.js';
export { renderDashboard, escapeHtml, formatAge, type DashboardMeta } from './dashboard.js';
