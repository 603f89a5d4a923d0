/**
 * Coordinator settings: command-line flags over environment over defaults
 */

import { z } from 'zod';

import { ValidationError } from '../coordinator/errors.js';
import { DEFAULT_COORDINATOR_CONFIG, type CoordinatorConfig } from '../coordinator/types.js';

const positiveMs = z.coerce.number().int().positive();

const CoordinatorConfigSchema = z.object({
  heartbeatTimeoutMs: positiveMs,
  sweepIntervalMs: positiveMs,
  heartbeatIntervalMs: positiveMs,
  requestTimeoutMs: positiveMs,
  instanceIdleTimeoutMs: z.coerce.number().int().nonnegative(),
  healthCheckTimeoutMs: z.coerce.number().int().nonnegative(),
});

export const CONFIG_ENV_VARS = {
  heartbeatTimeoutMs: 'TOOLFLEET_HEARTBEAT_TIMEOUT_MS',
  sweepIntervalMs: 'TOOLFLEET_SWEEP_INTERVAL_MS',
  heartbeatIntervalMs: 'TOOLFLEET_HEARTBEAT_INTERVAL_MS',
  requestTimeoutMs: 'TOOLFLEET_REQUEST_TIMEOUT_MS',
  instanceIdleTimeoutMs: 'TOOLFLEET_INSTANCE_IDLE_TIMEOUT_MS',
  healthCheckTimeoutMs: 'TOOLFLEET_HEALTH_CHECK_TIMEOUT_MS',
} as const satisfies Record<keyof CoordinatorConfig, string>;

const CONFIG_KEYS = Object.keys(CONFIG_ENV_VARS).filter(isConfigKey);

function isConfigKey(key: string): key is keyof CoordinatorConfig {
  return key in CONFIG_ENV_VARS;
}

/** Raw values as they arrive from flags (strings) or code (numbers) */
export type ConfigOverrides = Partial<Record<keyof CoordinatorConfig, string | number>>;

function present(value: string | number | undefined): string | number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

export function resolveCoordinatorConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): CoordinatorConfig {
  const merged: Record<string, unknown> = {};
  for (const key of CONFIG_KEYS) {
    merged[key] = present(overrides[key]) ?? present(env[CONFIG_ENV_VARS[key]]) ?? DEFAULT_COORDINATOR_CONFIG[key];
  }

  const result = CoordinatorConfigSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = String(issue.path[0] ?? '');
      const envVar = isConfigKey(key) ? ` (${CONFIG_ENV_VARS[key]})` : '';
      return `${key}${envVar}: ${issue.message}`;
    });
    throw new ValidationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const config = result.data;
  if (config.heartbeatIntervalMs >= config.heartbeatTimeoutMs) {
    throw new ValidationError(
      `Invalid configuration: heartbeatIntervalMs (${config.heartbeatIntervalMs}) must be below heartbeatTimeoutMs (${config.heartbeatTimeoutMs})`
    );
  }
  return config;
}
