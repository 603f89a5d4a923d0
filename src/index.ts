export * from './coordinator/index.js';
export * from './worker/index.js';
export * from './config/tool-definitions.js';
export { resolveCoordinatorConfig, CONFIG_ENV_VARS, type ConfigOverrides } from './config/settings.js';
export { createLogger, resolveLogLevel, type Logger, type LogLevel } from './logger.js';
