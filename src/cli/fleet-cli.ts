/**
 * Fleet CLI - run the coordinator, worker agents, or both in one process
 */

import { randomUUID } from 'node:crypto';

import type { Command } from 'commander';
import { z } from 'zod';

import { resolveCoordinatorConfig } from '../config/settings.js';
import {
  DEFAULT_TIMEOUT_PER_QUERY,
  extractToolNames,
  loadToolDefinitions,
  mergeToolDefinitionRegistry,
  rewriteToolDefinitions,
  rewrittenConfigPath,
  writeToolDefinitions,
  type ToolDefinitionFile,
} from '../config/tool-definitions.js';
import { Coordinator } from '../coordinator/coordinator.js';
import { CoordinatorServer } from '../coordinator/coordinator-server.js';
import { ValidationError } from '../coordinator/errors.js';
import { HealthReportSchema, parseBody, toolPath, type HealthReport } from '../coordinator/protocol.js';
import type { ListenAddress } from '../http/json-server.js';
import { LogFile, createLogger } from '../logger.js';
import { loadTools } from '../worker/tool-loader.js';
import { WorkerAgent } from '../worker/worker-agent.js';

const log = createLogger('cli');

// ---------------------------------------------------------------------------
// Option schemas (commander hands over strings and booleans)
// ---------------------------------------------------------------------------

const port = z.coerce.number().int().min(0).max(65535);

const ToolSourceOptions = z.object({
  tools: z.string().optional(),
  registry: z.string().optional(),
  logDir: z.string().optional(),
});

const LivenessOptions = z.object({
  heartbeatTimeoutMs: z.string().optional(),
  sweepIntervalMs: z.string().optional(),
  heartbeatIntervalMs: z.string().optional(),
  requestTimeoutMs: z.string().optional(),
  instanceIdleTimeoutMs: z.string().optional(),
  healthCheckTimeoutMs: z.string().optional(),
});

const MasterOptionsSchema = ToolSourceOptions.merge(LivenessOptions).extend({
  host: z.string(),
  port,
  advertiseHost: z.string().optional(),
  outputDir: z.string().optional(),
  proxyClass: z.string().optional(),
  timeoutPerQuery: z.coerce.number().int().positive(),
});

const WorkerOptionsSchema = ToolSourceOptions.extend({
  masterUrl: z.string().url(),
  host: z.string(),
  port,
  numWorkers: z.coerce.number().int().positive(),
  workerId: z.string().optional(),
  advertiseHost: z.string().optional(),
});

const UnifiedOptionsSchema = MasterOptionsSchema.extend({
  workerPort: port.optional(),
  numWorkers: z.coerce.number().int().positive(),
  smokeTest: z.boolean().default(false),
  keepRunning: z.boolean().default(false),
});

const StatusOptionsSchema = z.object({
  masterUrl: z.string().url(),
  json: z.boolean().default(false),
});

const RewriteOptionsSchema = z.object({
  serverUrl: z.string().url(),
  outputDir: z.string().optional(),
  proxyClass: z.string().optional(),
  timeoutPerQuery: z.coerce.number().int().positive(),
});

type MasterOptions = z.infer<typeof MasterOptionsSchema>;
type WorkerOptions = z.infer<typeof WorkerOptionsSchema>;

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Format duration to human readable */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3600000) return `${(ms / 60000).toFixed(1)}m`;
  return `${(ms / 3600000).toFixed(1)}h`;
}

/** Format worker status with color */
function formatStatus(status: string): string {
  switch (status) {
    case 'online':
      return '\x1b[32monline\x1b[0m'; // green
    case 'offline':
      return '\x1b[31moffline\x1b[0m'; // red
    default:
      return status;
  }
}

/**
 * Render a coordinator health report as the plain-text table `status` prints
 */
export function formatStatusReport(report: HealthReport, now: number = Date.now()): string {
  const lines: string[] = [];
  lines.push('\n\x1b[1mCoordinator Status\x1b[0m');
  lines.push('─'.repeat(60));
  lines.push(`Workers online:   ${report.online_workers}/${report.total_workers}`);
  lines.push(`Active instances: ${report.total_instances}`);
  lines.push(`Known tools:      ${report.known_tools.join(', ') || '-'}`);
  lines.push('');

  lines.push('\x1b[1mWorkers\x1b[0m');
  lines.push('─'.repeat(60));
  lines.push('ID                State       Instances  Heartbeat  URL');
  for (const worker of report.workers) {
    const id = worker.worker_id.padEnd(17);
    const state = formatStatus(worker.status).padEnd(20); // Extra padding for ANSI codes
    const instances = String(worker.active_instances).padStart(9);
    const heartbeat = formatDuration(Math.max(0, now - Date.parse(worker.last_heartbeat_at))).padStart(10);
    lines.push(`${id} ${state} ${instances} ${heartbeat}  ${worker.base_url}`);
  }
  lines.push('');

  lines.push('\x1b[1mTools\x1b[0m');
  lines.push('─'.repeat(60));
  const toolNames = new Set([...report.known_tools, ...Object.keys(report.tools)]);
  for (const name of Array.from(toolNames).sort()) {
    lines.push(`${name.padEnd(30)} ${report.tools[name]?.length ?? 0} worker(s)`);
  }
  lines.push('');
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Shared steps
// ---------------------------------------------------------------------------

async function loadDefinitions(opts: z.infer<typeof ToolSourceOptions>): Promise<ToolDefinitionFile | null> {
  if (opts.tools && opts.registry) {
    throw new ValidationError('Pass either --tools or --registry, not both');
  }
  if (opts.tools) return loadToolDefinitions(opts.tools);
  if (opts.registry) return mergeToolDefinitionRegistry(opts.registry);
  return null;
}

function waitForShutdown(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

interface RunningMaster {
  server: CoordinatorServer;
  coordinator: Coordinator;
  address: ListenAddress;
  serverUrl: string;
  definitions: ToolDefinitionFile | null;
  rewrittenPath: string | null;
}

async function startMaster(opts: MasterOptions): Promise<RunningMaster> {
  const config = resolveCoordinatorConfig({
    heartbeatTimeoutMs: opts.heartbeatTimeoutMs,
    sweepIntervalMs: opts.sweepIntervalMs,
    heartbeatIntervalMs: opts.heartbeatIntervalMs,
    requestTimeoutMs: opts.requestTimeoutMs,
    instanceIdleTimeoutMs: opts.instanceIdleTimeoutMs,
    healthCheckTimeoutMs: opts.healthCheckTimeoutMs,
  });
  const definitions = await loadDefinitions(opts);

  const coordinator = new Coordinator({
    config,
    declaredTools: definitions ? extractToolNames(definitions) : [],
  });
  const server = new CoordinatorServer(coordinator);
  const address = await server.listen(opts.port, opts.host);
  const serverUrl = opts.advertiseHost ? `http://${opts.advertiseHost}:${address.port}` : address.url;

  let rewrittenPath: string | null = null;
  const source = opts.tools ?? opts.registry;
  if (definitions && source) {
    const rewritten = rewriteToolDefinitions(definitions, {
      serverUrl,
      proxyClassName: opts.proxyClass,
      timeoutPerQuery: opts.timeoutPerQuery,
    });
    rewrittenPath = await writeToolDefinitions(rewrittenConfigPath(source, opts.outputDir), rewritten);
    log.info(`Wrote tool definitions pointing at ${serverUrl}`, { path: rewrittenPath });
  }

  return { server, coordinator, address, serverUrl, definitions, rewrittenPath };
}

async function startWorkers(
  definitions: ToolDefinitionFile,
  opts: Pick<WorkerOptions, 'masterUrl' | 'host' | 'port' | 'numWorkers' | 'workerId' | 'advertiseHost'>
): Promise<WorkerAgent[]> {
  if (opts.workerId && opts.numWorkers > 1) {
    throw new ValidationError('--worker-id can only be used with a single worker');
  }

  const agents: WorkerAgent[] = [];
  try {
    for (let i = 0; i < opts.numWorkers; i++) {
      // Tools keep per-instance state, so each agent gets its own objects
      const agent = new WorkerAgent({
        masterUrl: opts.masterUrl,
        tools: await loadTools(definitions),
        host: opts.host,
        port: opts.port === 0 ? 0 : opts.port + i,
        advertiseHost: opts.advertiseHost,
        workerId: opts.workerId,
      });
      await agent.start();
      agents.push(agent);
    }
  } catch (error) {
    await stopAll(agents);
    throw error;
  }
  return agents;
}

async function stopAll(agents: readonly WorkerAgent[]): Promise<void> {
  const results = await Promise.allSettled(agents.map((agent) => agent.stop()));
  for (const result of results) {
    if (result.status === 'rejected') {
      log.warn('Worker agent did not stop cleanly', { error: result.reason });
    }
  }
}

function requireDefinitions(definitions: ToolDefinitionFile | null): ToolDefinitionFile {
  if (!definitions || definitions.tools.length === 0) {
    throw new ValidationError('No tools to serve: pass --tools <yaml> or --registry <jsonl>');
  }
  return definitions;
}

async function postJson(url: string, body: unknown, timeoutMs: number): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(timeoutMs),
  });
  const text = await response.text();
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = text;
  }
  return { status: response.status, body: parsed };
}

export interface SmokeTestResult {
  tool: string;
  ok: boolean;
  steps: Array<{ operation: string; status: number | null; error?: string }>;
}

/**
 * Run create → execute → release against every tool through the coordinator
 */
export async function runSmokeTest(serverUrl: string, toolNames: readonly string[], timeoutMs = 10_000): Promise<SmokeTestResult[]> {
  const results: SmokeTestResult[] = [];
  for (const tool of toolNames) {
    const instanceId = `smoke_${tool}_${randomUUID().slice(0, 8)}`;
    const result: SmokeTestResult = { tool, ok: true, steps: [] };
    const calls: Array<['create' | 'execute' | 'release', unknown]> = [
      ['create', { instance_id: instanceId, identity: { smoke_test: true } }],
      ['execute', { instance_id: instanceId, parameters: {} }],
      ['release', { instance_id: instanceId }],
    ];
    for (const [operation, body] of calls) {
      try {
        const response = await postJson(`${serverUrl}${toolPath(tool, operation)}`, body, timeoutMs);
        result.steps.push({ operation, status: response.status });
        if (response.status !== 200) result.ok = false;
      } catch (error) {
        result.steps.push({ operation, status: null, error: error instanceof Error ? error.message : String(error) });
        result.ok = false;
      }
    }
    results.push(result);
  }
  return results;
}

function printSmokeTest(results: readonly SmokeTestResult[]): void {
  console.log('\n\x1b[1mSmoke test\x1b[0m');
  console.log('─'.repeat(50));
  for (const result of results) {
    const mark = result.ok ? '\x1b[32m✓\x1b[0m' : '\x1b[31m✗\x1b[0m';
    const steps = result.steps.map((s) => `${s.operation}=${s.status ?? s.error ?? 'error'}`).join(' ');
    console.log(`${mark} ${result.tool.padEnd(30)} ${steps}`);
  }
  console.log('');
}

export async function fetchHealthReport(masterUrl: string, timeoutMs = 10_000): Promise<HealthReport> {
  const response = await fetch(`${masterUrl.replace(/\/+$/, '')}/health`, { signal: AbortSignal.timeout(timeoutMs) });
  if (!response.ok) {
    throw new ValidationError(`Coordinator answered ${response.status} for /health`);
  }
  return parseBody(HealthReportSchema, await response.json());
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function addLivenessOptions(command: Command): Command {
  return command
    .option('--heartbeat-timeout-ms <ms>', 'Evict workers silent for longer than this')
    .option('--sweep-interval-ms <ms>', 'Liveness sweep period')
    .option('--heartbeat-interval-ms <ms>', 'Heartbeat period handed to workers')
    .option('--request-timeout-ms <ms>', 'Default timeout for one proxied call')
    .option('--instance-idle-timeout-ms <ms>', 'Release instances idle this long (0 = never)')
    .option('--health-check-timeout-ms <ms>', 'Deadline for the health check at registration (0 = skip)');
}

function addToolSourceOptions(command: Command): Command {
  return command
    .option('-t, --tools <yaml>', 'Tool-definition YAML file')
    .option('-r, --registry <jsonl>', 'JSONL registry of tool-definition files')
    .option('--log-dir <dir>', 'Also append log lines to a timestamped file in this directory');
}

async function runCommand(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

/**
 * Run a command with every log line also appended to `<logDir>/<name>-<time>.log`
 */
async function withLogFile(logDir: string | undefined, name: string, action: () => Promise<void>): Promise<void> {
  if (!logDir) {
    return action();
  }
  const file = await LogFile.open(logDir, name);
  log.info(`Logging to ${file.path}`);
  try {
    await action();
  } finally {
    await file.close();
  }
}

/**
 * Register fleet CLI commands
 */
export function registerFleetCli(program: Command): void {
  const master = program
    .command('master')
    .description('Run the coordinator')
    .option('-H, --host <host>', 'Bind address', '0.0.0.0')
    .option('-p, --port <port>', 'Listen port', '8000')
    .option('--advertise-host <host>', 'Host name written into the rewritten tool definitions')
    .option('-o, --output-dir <dir>', 'Directory for the rewritten tool definitions')
    .option('--proxy-class <className>', 'Replace class_name in the rewritten tool definitions')
    .option(
      '--timeout-per-query <seconds>',
      'timeout_per_query written into the rewritten tool definitions',
      String(DEFAULT_TIMEOUT_PER_QUERY)
    );
  addToolSourceOptions(master);
  addLivenessOptions(master);
  master.action((raw: unknown) =>
    runCommand(async () => {
      const opts = parseBody(MasterOptionsSchema, raw);
      await withLogFile(opts.logDir, 'master', async () => {
        const running = await startMaster(opts);
        console.log(`\x1b[32m✓\x1b[0m Coordinator listening on ${running.address.url}`);
        console.log(`  Dashboard: ${running.serverUrl}/`);
        console.log(`  Health:    ${running.serverUrl}/health`);
        await waitForShutdown();
        await running.server.close();
      });
    })
  );

  const worker = program
    .command('worker')
    .description('Run worker agents that register with a coordinator')
    .requiredOption('-m, --master-url <url>', 'Coordinator URL')
    .option('-H, --host <host>', 'Bind address', '0.0.0.0')
    .option('-p, --port <port>', 'First listen port (0 = any free port)', '0')
    .option('-n, --num-workers <count>', 'Number of agents', '1')
    .option('--worker-id <id>', 'Fixed worker id (single agent only)')
    .option('--advertise-host <host>', 'Host name the coordinator should use to reach the agents');
  addToolSourceOptions(worker);
  worker.action((raw: unknown) =>
    runCommand(async () => {
      const opts = parseBody(WorkerOptionsSchema, raw);
      await withLogFile(opts.logDir, 'worker', async () => {
        const definitions = requireDefinitions(await loadDefinitions(opts));
        const agents = await startWorkers(definitions, opts);
        console.log(`\x1b[32m✓\x1b[0m ${agents.length} worker agent(s) registered with ${opts.masterUrl}`);
        await waitForShutdown();
        await stopAll(agents);
      });
    })
  );

  const unified = program
    .command('unified')
    .description('Run the coordinator and worker agents in one process')
    .option('-H, --host <host>', 'Bind address', '0.0.0.0')
    .option('-p, --port <port>', 'Coordinator port', '8000')
    .option('--worker-port <port>', 'First worker port (default: any free port)')
    .option('-n, --num-workers <count>', 'Number of agents', '1')
    .option('--advertise-host <host>', 'Host name written into the rewritten tool definitions')
    .option('-o, --output-dir <dir>', 'Directory for the rewritten tool definitions')
    .option('--proxy-class <className>', 'Replace class_name in the rewritten tool definitions')
    .option(
      '--timeout-per-query <seconds>',
      'timeout_per_query written into the rewritten tool definitions',
      String(DEFAULT_TIMEOUT_PER_QUERY)
    )
    .option('--smoke-test', 'Run create → execute → release against every tool once started', false)
    .option('--keep-running', 'Keep serving after the smoke test', false);
  addToolSourceOptions(unified);
  addLivenessOptions(unified);
  unified.action((raw: unknown) =>
    runCommand(async () => {
      const opts = parseBody(UnifiedOptionsSchema, raw);
      await withLogFile(opts.logDir, 'unified', async () => {
        const running = await startMaster(opts);
        let agents: WorkerAgent[] = [];
        try {
          const definitions = requireDefinitions(running.definitions);
          agents = await startWorkers(definitions, {
            masterUrl: running.address.url,
            host: opts.host,
            port: opts.workerPort ?? 0,
            numWorkers: opts.numWorkers,
            advertiseHost: opts.advertiseHost,
          });
          console.log(`\x1b[32m✓\x1b[0m Coordinator on ${running.address.url} with ${agents.length} worker agent(s)`);
          if (running.rewrittenPath) {
            console.log(`  Tool definitions: ${running.rewrittenPath}`);
          }

          if (opts.smokeTest) {
            const results = await runSmokeTest(running.address.url, extractToolNames(definitions));
            printSmokeTest(results);
            if (results.some((result) => !result.ok)) {
              process.exitCode = 1;
            }
          }
          if (!opts.smokeTest || opts.keepRunning) {
            await waitForShutdown();
          }
        } finally {
          await stopAll(agents);
          await running.server.close();
        }
      });
    })
  );

  program
    .command('status')
    .description('Show coordinator status')
    .option('-m, --master-url <url>', 'Coordinator URL', 'http://127.0.0.1:8000')
    .option('--json', 'Output as JSON', false)
    .action((raw: unknown) =>
      runCommand(async () => {
        const opts = parseBody(StatusOptionsSchema, raw);
        const report = await fetchHealthReport(opts.masterUrl);
        console.log(opts.json ? JSON.stringify(report, null, 2) : formatStatusReport(report));
      })
    );

  program
    .command('rewrite-config')
    .description('Rewrite a tool-definition file to route through a coordinator')
    .argument('<yaml>', 'Tool-definition YAML file')
    .requiredOption('-s, --server-url <url>', 'Coordinator URL')
    .option('-o, --output-dir <dir>', 'Output directory (default: beside the input)')
    .option('--proxy-class <className>', 'Replace class_name with this proxy class')
    .option('--timeout-per-query <seconds>', 'timeout_per_query to write', String(DEFAULT_TIMEOUT_PER_QUERY))
    .action((path: string, raw: unknown) =>
      runCommand(async () => {
        const opts = parseBody(RewriteOptionsSchema, raw);
        const rewritten = rewriteToolDefinitions(await loadToolDefinitions(path), {
          serverUrl: opts.serverUrl,
          proxyClassName: opts.proxyClass,
          timeoutPerQuery: opts.timeoutPerQuery,
        });
        const output = await writeToolDefinitions(rewrittenConfigPath(path, opts.outputDir), rewritten);
        console.log(`Wrote ${output}`);
      })
    );
}
