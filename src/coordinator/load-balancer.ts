/**
 * Load Balancer - picks the worker for a new tool instance
 *
 * Least-active-instances policy. The count is maintained by the coordinator
 * (incremented on bind, decremented on release), so it does not depend on
 * anything workers report about themselves. The ranking is computed fresh on
 * every call.
 */

import type { WorkerRecord } from './types.js';

export interface LoadBalancer {
  /** Choose one of the candidates, or undefined when there are none */
  select(candidates: readonly WorkerRecord[]): WorkerRecord | undefined;
}

/**
 * Order two workers by preference.
 * Fewer active instances first; ties go to the earliest heartbeat, then the
 * earliest registration, then the lexically smallest id.
 */
export function compareByLoad(a: WorkerRecord, b: WorkerRecord): number {
  if (a.activeInstanceCount !== b.activeInstanceCount) {
    return a.activeInstanceCount - b.activeInstanceCount;
  }
  if (a.lastHeartbeatAt !== b.lastHeartbeatAt) {
    return a.lastHeartbeatAt - b.lastHeartbeatAt;
  }
  if (a.registeredAt !== b.registeredAt) {
    return a.registeredAt - b.registeredAt;
  }
  return a.workerId < b.workerId ? -1 : a.workerId > b.workerId ? 1 : 0;
}

export class LeastActiveInstancesBalancer implements LoadBalancer {
  select(candidates: readonly WorkerRecord[]): WorkerRecord | undefined {
    let best: WorkerRecord | undefined;
    for (const candidate of candidates) {
      if (!best || compareByLoad(candidate, best) < 0) {
        best = candidate;
      }
    }
    return best;
  }
}
