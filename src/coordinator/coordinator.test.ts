import { describe, it, expect, beforeEach } from 'vitest';

import { createLogger } from '../logger.js';
import { Coordinator } from './coordinator.js';
import {
  InstanceNotBoundError,
  NoWorkerAvailableError,
  UnknownWorkerError,
  ValidationError,
  WorkerRequestError,
} from './errors.js';
import type { WorkerCall, WorkerClient, WorkerHealthCheck } from './worker-client.js';

class FakeWorkerClient implements WorkerClient {
  calls: WorkerCall[] = [];
  handler: (call: WorkerCall) => Promise<unknown> = async () => ({ success: true });

  healthChecks: WorkerHealthCheck[] = [];
  healthHandler: (check: WorkerHealthCheck) => Promise<unknown> = async () => ({ status: 'healthy' });

  async post(call: WorkerCall): Promise<unknown> {
    this.calls.push(call);
    return this.handler(call);
  }

  async get(check: WorkerHealthCheck): Promise<unknown> {
    this.healthChecks.push(check);
    return this.healthHandler(check);
  }

  paths(): string[] {
    return this.calls.map((call) => `${call.workerId} ${call.path}`);
  }
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('Coordinator', () => {
  let client: FakeWorkerClient;
  let clock: number;
  let nextId: number;
  let coordinator: Coordinator;

  beforeEach(() => {
    client = new FakeWorkerClient();
    clock = 1000;
    nextId = 0;
    coordinator = new Coordinator({
      workerClient: client,
      now: () => clock,
      generateInstanceId: () => `inst-${++nextId}`,
      declaredTools: ['calc', 'search'],
      logger: createLogger('Coordinator', 'silent'),
    });
  });

  async function registerTwo(): Promise<void> {
    await coordinator.registerWorker({ worker_id: 'w1', base_url: 'http://a:1', supported_tools: ['calc'] });
    await coordinator.registerWorker({ worker_id: 'w2', base_url: 'http://b:1', supported_tools: ['calc'] });
  }

  describe('worker lifecycle', () => {
    it('should register a worker and hand back heartbeat settings', async () => {
      const response = await coordinator.registerWorker({
        worker_id: 'w1',
        base_url: 'http://a:1',
        supported_tools: ['calc'],
        host_info: { hostname: 'box', port: 1 },
      });

      expect(response).toEqual({
        success: true,
        worker_id: 'w1',
        replaced: false,
        heartbeat_interval_ms: 30_000,
        heartbeat_timeout_ms: 60_000,
      });
      expect(coordinator.registry.getWorker('w1')?.hostInfo).toEqual({ hostname: 'box', port: 1 });
    });

    it('should reject malformed registrations', async () => {
      await expect(coordinator.registerWorker({ worker_id: 'w1', supported_tools: ['calc'] })).rejects.toThrow(
        ValidationError
      );
      await expect(coordinator.registerWorker({ base_url: 'http://a:1', supported_tools: [] })).rejects.toThrow(
        'supported_tools: supported_tools must list at least one tool'
      );
      await expect(
        coordinator.registerWorker({ base_url: 'ftp://a:1', supported_tools: ['calc'] })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(client.healthChecks).toHaveLength(0);
    });

    it('should check the worker health endpoint before registering', async () => {
      await coordinator.registerWorker({ worker_id: 'w1', base_url: 'http://a:1/', supported_tools: ['calc'] });

      expect(client.healthChecks).toEqual([{ workerId: 'w1', baseUrl: 'http://a:1', path: '/health', timeoutMs: 10_000 }]);
      expect(coordinator.registry.getWorker('w1')?.baseUrl).toBe('http://a:1');
    });

    it('should refuse a worker whose health endpoint does not answer', async () => {
      client.healthHandler = async (check) => {
        throw new WorkerRequestError(`Request to worker ${check.workerId} failed: connect ECONNREFUSED`, check.workerId);
      };

      const attempt = coordinator.registerWorker({ worker_id: 'w1', base_url: 'http://a:1', supported_tools: ['calc'] });

      await expect(attempt).rejects.toBeInstanceOf(WorkerRequestError);
      await expect(attempt).rejects.toThrow(
        'Worker at http://a:1 failed its health check: Request to worker w1 failed: connect ECONNREFUSED'
      );
      expect(coordinator.registry.workerCount).toBe(0);
    });

    it('should skip the health check when its timeout is zero', async () => {
      const unchecked = new Coordinator({
        workerClient: client,
        config: { healthCheckTimeoutMs: 0 },
        logger: createLogger('Coordinator', 'silent'),
      });

      await unchecked.registerWorker({ base_url: 'http://a:1', supported_tools: ['calc'] });

      expect(client.healthChecks).toHaveLength(0);
      expect(unchecked.registry.workerCount).toBe(1);
    });

    it('should generate an id for a blank worker_id', async () => {
      const response = await coordinator.registerWorker({ worker_id: '', base_url: 'http://a:1', supported_tools: ['calc'] });

      expect(response.worker_id).toMatch(/^wkr_[0-9a-f]{12}$/);
      expect(client.healthChecks[0]?.workerId).toBe('http://a:1');
    });

    it('should answer heartbeats with the server time', async () => {
      await registerTwo();
      clock = 2000;

      expect(coordinator.heartbeat('w1', { active_instances: 3 })).toEqual({
        success: true,
        worker_id: 'w1',
        server_time: '1970-01-01T00:00:02.000Z',
      });
      expect(coordinator.registry.getWorker('w1')?.lastHeartbeatAt).toBe(2000);
    });

    it('should reject heartbeats from unknown workers', () => {
      expect(() => coordinator.heartbeat('ghost')).toThrow(UnknownWorkerError);
    });

    it('should deregister a worker and report its dropped instances', async () => {
      await registerTwo();
      await coordinator.createInstance('calc', { instance_id: 'i1' });

      expect(coordinator.deregisterWorker('w1')).toEqual({
        success: true,
        worker_id: 'w1',
        invalidated_instances: ['i1'],
      });
      expect(() => coordinator.deregisterWorker('w1')).toThrow(UnknownWorkerError);
    });

    it('should start and stop the liveness sweep', () => {
      coordinator.start();
      expect(coordinator.running).toBe(true);
      expect(coordinator.monitor.running).toBe(true);

      coordinator.stop();
      expect(coordinator.running).toBe(false);
      expect(coordinator.monitor.running).toBe(false);
    });
  });

  describe('createInstance', () => {
    beforeEach(registerTwo);

    it('should forward the create to the chosen worker', async () => {
      const response = await coordinator.createInstance('calc', { instance_id: 'i1', identity: { user: 'u1' } });

      expect(response).toEqual({ success: true, instance_id: 'i1', worker_id: 'w1', created: true });
      expect(client.calls).toEqual([
        {
          workerId: 'w1',
          baseUrl: 'http://a:1',
          path: '/tools/calc/create',
          body: { instance_id: 'i1', identity: { user: 'u1' } },
          timeoutMs: 600_000,
        },
      ]);
      expect(coordinator.registry.resolveInstance('i1')).toMatchObject({ workerId: 'w1', state: 'active' });
    });

    it('should generate an instance id when none is given', async () => {
      const response = await coordinator.createInstance('calc', undefined);

      expect(response.instance_id).toBe('inst-1');
      expect(client.calls[0]?.body).toEqual({ instance_id: 'inst-1', identity: null });
    });

    it('should spread three sequential creates over two workers', async () => {
      const workers: string[] = [];
      for (let i = 0; i < 3; i++) {
        workers.push((await coordinator.createInstance('calc', {})).worker_id);
      }

      expect(workers).toEqual(['w1', 'w2', 'w1']);
      expect(coordinator.registry.getWorker('w1')?.activeInstanceCount).toBe(2);
      expect(coordinator.registry.getWorker('w2')?.activeInstanceCount).toBe(1);
    });

    it('should count concurrent creates before any worker answers', async () => {
      const gate = deferred<unknown>();
      client.handler = () => gate.promise;

      const creates = [
        coordinator.createInstance('calc', {}),
        coordinator.createInstance('calc', {}),
        coordinator.createInstance('calc', {}),
      ];
      gate.resolve({ success: true });
      const responses = await Promise.all(creates);

      expect(responses.map((r) => r.worker_id)).toEqual(['w1', 'w2', 'w1']);
      expect(Math.max(...coordinator.registry.listWorkers().map((w) => w.activeInstanceCount))).toBe(2);
    });

    it('should treat a repeated create as a no-op', async () => {
      await coordinator.createInstance('calc', { instance_id: 'i1' });
      const again = await coordinator.createInstance('calc', { instance_id: 'i1' });

      expect(again).toEqual({ success: true, instance_id: 'i1', worker_id: 'w1', created: false });
      expect(client.calls).toHaveLength(1);
      expect(coordinator.registry.getWorker('w1')?.activeInstanceCount).toBe(1);
      expect(coordinator.registry.instanceCount).toBe(1);
    });

    it('should let a concurrent duplicate create wait for the first one', async () => {
      const gate = deferred<unknown>();
      client.handler = () => gate.promise;

      const first = coordinator.createInstance('calc', { instance_id: 'i1' });
      const second = coordinator.createInstance('calc', { instance_id: 'i1' });
      gate.resolve({ success: true });

      expect(await first).toMatchObject({ worker_id: 'w1', created: true });
      expect(await second).toMatchObject({ worker_id: 'w1', created: false });
      expect(client.calls).toHaveLength(1);
    });

    it('should reject reusing an instance id under another tool', async () => {
      await coordinator.registerWorker({ worker_id: 'w3', base_url: 'http://c:1', supported_tools: ['search'] });
      await coordinator.createInstance('calc', { instance_id: 'i1' });

      await expect(coordinator.createInstance('search', { instance_id: 'i1' })).rejects.toThrow(
        'Instance i1 belongs to tool calc'
      );
    });

    it('should fail when no worker serves the tool', async () => {
      await expect(coordinator.createInstance('search', {})).rejects.toBeInstanceOf(NoWorkerAvailableError);
      expect(client.calls).toHaveLength(0);
    });

    it('should drop the binding when the worker rejects the create', async () => {
      client.handler = async (call) => {
        throw new WorkerRequestError('Worker w1 returned 500', call.workerId, 500);
      };

      await expect(coordinator.createInstance('calc', { instance_id: 'i1' })).rejects.toBeInstanceOf(
        WorkerRequestError
      );
      expect(coordinator.registry.getInstance('i1')).toBeUndefined();
      expect(coordinator.registry.getWorker('w1')?.activeInstanceCount).toBe(0);
    });

    it('should fail a create whose worker was removed mid-flight', async () => {
      const gate = deferred<unknown>();
      client.handler = () => gate.promise;

      const create = coordinator.createInstance('calc', { instance_id: 'i1' });
      coordinator.deregisterWorker('w1');
      gate.resolve({ success: true });

      await expect(create).rejects.toThrow('Instance i1 is not bound: worker w1 was removed during creation');
      expect(coordinator.registry.getInstance('i1')).toBeUndefined();
    });

    describe('when the same id is created again while an older create is in flight', () => {
      let firstGate: Deferred<unknown>;
      let secondGate: Deferred<unknown>;

      beforeEach(() => {
        firstGate = deferred<unknown>();
        secondGate = deferred<unknown>();
        const creates = [firstGate.promise, secondGate.promise];
        client.handler = (call) =>
          call.path.endsWith('/create') ? (creates.shift() ?? Promise.resolve({})) : Promise.resolve({ ok: call.workerId });
      });

      it('should let an execute wait for the newer create after the older one settles', async () => {
        const stale = coordinator.createInstance('calc', { instance_id: 'x' });
        coordinator.deregisterWorker('w1');
        const fresh = coordinator.createInstance('calc', { instance_id: 'x' });

        firstGate.resolve({ success: true });
        await expect(stale).rejects.toThrow('Instance x is not bound: worker w1 was removed during creation');

        const execute = coordinator.execute('calc', { instance_id: 'x' });
        secondGate.resolve({ success: true });

        expect(await fresh).toEqual({ success: true, instance_id: 'x', worker_id: 'w2', created: true });
        expect(await execute).toEqual({ ok: 'w2' });
      });

      it('should keep the newer binding when the older create fails on a re-registered worker', async () => {
        const stale = coordinator.createInstance('calc', { instance_id: 'x' });
        coordinator.deregisterWorker('w1');
        await coordinator.registerWorker({ worker_id: 'w1', base_url: 'http://a:1', supported_tools: ['calc'] });
        const fresh = coordinator.createInstance('calc', { instance_id: 'x' });

        firstGate.reject(new Error('boom'));
        await expect(stale).rejects.toThrow('boom');
        expect(coordinator.registry.getInstance('x')).toMatchObject({ workerId: 'w1', state: 'pending' });

        secondGate.resolve({ success: true });
        expect(await fresh).toEqual({ success: true, instance_id: 'x', worker_id: 'w1', created: true });
        expect(coordinator.registry.resolveInstance('x')?.workerId).toBe('w1');
        expect(coordinator.registry.getWorker('w1')?.activeInstanceCount).toBe(1);
      });

      it('should not activate the newer binding from the older create answer', async () => {
        const stale = coordinator.createInstance('calc', { instance_id: 'x' });
        coordinator.deregisterWorker('w1');
        await coordinator.registerWorker({ worker_id: 'w1', base_url: 'http://a:1', supported_tools: ['calc'] });
        const fresh = coordinator.createInstance('calc', { instance_id: 'x' });

        firstGate.resolve({ success: true });
        await expect(stale).rejects.toThrow('Instance x is not bound: worker w1 was removed during creation');
        expect(coordinator.registry.getInstance('x')?.state).toBe('pending');

        secondGate.resolve({ success: true });
        expect(await fresh).toMatchObject({ worker_id: 'w1', created: true });
        expect(coordinator.registry.getInstance('x')?.state).toBe('active');
      });
    });

    it('should pass a caller timeout through to the worker call', async () => {
      await coordinator.createInstance('calc', { instance_id: 'i1' }, 1234);
      expect(client.calls[0]?.timeoutMs).toBe(1234);
    });
  });

  describe('execute', () => {
    beforeEach(async () => {
      await registerTwo();
      await coordinator.createInstance('calc', { instance_id: 'i1' });
      await coordinator.createInstance('calc', { instance_id: 'i2' });
      client.calls = [];
    });

    it('should forward the body unchanged and relay the answer', async () => {
      const answer = { response: 'Result: 1 + 2 = 3', reward_score: 0.1, metrics: { result: 3 } };
      client.handler = async () => answer;
      const body = { instance_id: 'i2', parameters: { operation: 'add', operand1: 1, operand2: 2 }, trace: 'x' };

      const result = await coordinator.execute('calc', body, 5000);

      expect(result).toEqual(answer);
      expect(client.calls).toEqual([
        { workerId: 'w2', baseUrl: 'http://b:1', path: '/tools/calc/execute', body, timeoutMs: 5000 },
      ]);
    });

    it('should always reach the worker the instance was created on', async () => {
      for (let i = 0; i < 4; i++) {
        await coordinator.execute('calc', { instance_id: 'i1', parameters: {} });
        await coordinator.createInstance('calc', {});
      }

      const executes = client.calls.filter((call) => call.path.endsWith('/execute'));
      expect(executes.map((call) => call.workerId)).toEqual(['w1', 'w1', 'w1', 'w1']);
    });

    it('should refresh the last-used time', async () => {
      clock = 7000;
      await coordinator.execute('calc', { instance_id: 'i1' });
      expect(coordinator.registry.resolveInstance('i1')?.lastUsedAt).toBe(7000);
    });

    it('should reject unknown instances without calling a worker', async () => {
      await expect(coordinator.execute('calc', { instance_id: 'nope' })).rejects.toBeInstanceOf(InstanceNotBoundError);
      expect(client.calls).toHaveLength(0);
    });

    it('should require an instance id', async () => {
      await expect(coordinator.execute('calc', {})).rejects.toBeInstanceOf(ValidationError);
    });

    it('should not move an instance whose worker was evicted', async () => {
      coordinator.registry.heartbeat('w2', 50_000);
      clock = 61_001;
      coordinator.monitor.sweep();

      await expect(coordinator.execute('calc', { instance_id: 'i1' })).rejects.toThrow(
        'Instance i1 is not bound: no live binding'
      );
      expect(client.calls).toHaveLength(0);
      expect(coordinator.registry.getWorker('w2')?.activeInstanceCount).toBe(1);
    });

    it('should wait for a create still in flight', async () => {
      const gate = deferred<unknown>();
      client.handler = (call) => (call.path.endsWith('/create') ? gate.promise : Promise.resolve({ ok: call.path }));

      const create = coordinator.createInstance('calc', { instance_id: 'i3' });
      const execute = coordinator.execute('calc', { instance_id: 'i3' });
      gate.resolve({ success: true });

      await create;
      expect(await execute).toEqual({ ok: '/tools/calc/execute' });
      expect(client.calls.map((call) => call.path)).toEqual(['/tools/calc/create', '/tools/calc/execute']);
    });

    it('should fail an execute whose pending create failed', async () => {
      const gate = deferred<unknown>();
      client.handler = () => gate.promise;

      const create = coordinator.createInstance('calc', { instance_id: 'i3' });
      const execute = coordinator.execute('calc', { instance_id: 'i3' });
      gate.reject(new Error('boom'));
      const [created, executed] = await Promise.allSettled([create, execute]);

      expect(created).toMatchObject({ status: 'rejected', reason: expect.objectContaining({ message: 'boom' }) });
      expect(executed).toMatchObject({
        status: 'rejected',
        reason: expect.objectContaining({ message: 'Instance i3 is not bound: creation failed: boom' }),
      });
      expect(coordinator.registry.getInstance('i3')).toBeUndefined();
    });

    it('should forward reward requests to the owning worker', async () => {
      client.handler = async () => ({ reward_score: 1 });

      expect(await coordinator.calcReward('calc', { instance_id: 'i1' })).toEqual({ reward_score: 1 });
      expect(client.paths()).toEqual(['w1 /tools/calc/calc_reward']);
    });
  });

  describe('release', () => {
    beforeEach(async () => {
      await registerTwo();
      await coordinator.createInstance('calc', { instance_id: 'i1' });
      client.calls = [];
    });

    it('should release on the worker and drop the binding', async () => {
      const response = await coordinator.release('calc', { instance_id: 'i1' });

      expect(response).toEqual({ success: true, instance_id: 'i1', worker_id: 'w1', worker_released: true });
      expect(client.calls[0]?.body).toEqual({ instance_id: 'i1' });
      expect(client.paths()).toEqual(['w1 /tools/calc/release']);
      expect(coordinator.registry.getInstance('i1')).toBeUndefined();
      expect(coordinator.registry.getWorker('w1')?.activeInstanceCount).toBe(0);
    });

    it('should drop the binding even when the worker fails', async () => {
      client.handler = async () => {
        throw new Error('boom');
      };

      const response = await coordinator.release('calc', { instance_id: 'i1' });

      expect(response).toEqual({
        success: true,
        instance_id: 'i1',
        worker_id: 'w1',
        worker_released: false,
        worker_error: 'boom',
      });
      expect(coordinator.registry.getInstance('i1')).toBeUndefined();
    });

    it('should make later calls on the released id fail', async () => {
      await coordinator.release('calc', { instance_id: 'i1' });

      await expect(coordinator.execute('calc', { instance_id: 'i1' })).rejects.toBeInstanceOf(InstanceNotBoundError);
      await expect(coordinator.release('calc', { instance_id: 'i1' })).rejects.toBeInstanceOf(InstanceNotBoundError);
    });
  });

  describe('snapshot', () => {
    it('should include declared tools before any worker serves them', () => {
      const snapshot = coordinator.snapshot();

      expect(snapshot.generatedAt).toBe(1000);
      expect(snapshot.knownTools).toEqual(['calc', 'search']);
      expect(snapshot.tools).toEqual({});
      expect(snapshot.totalWorkers).toBe(0);
    });
  });
});
