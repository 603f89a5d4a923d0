/**
 * Worker agent module - hosts tools and keeps them registered with a coordinator
 */

export { isTool, isToolConstructor, type Tool, type ToolConstructor, type ToolDefinitionConfig, type ToolResult } from './tool.js';
export { ToolHost, type ToolHostStatus } from './tool-host.js';
export { MasterClient, type MasterClientOptions, type RegistrationRequest } from './master-client.js';
export { withRetry, calculateDelay, sleep, DEFAULT_RETRY_CONFIG, type RetryConfig, type WithRetryOptions } from './retry.js';
export { WorkerAgent, type WorkerAgentOptions, type WorkerHealth } from './worker-agent.js';
export { BUILTIN_TOOLS, loadTool, loadTools, type ToolLoaderOptions } from './tool-loader.js';
export { ArithmeticTool } from './tools/arithmetic-tool.js';
