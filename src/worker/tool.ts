/**
 * Tool contract implemented by everything a worker agent can host
 */

/** Result of one tool execution */
export interface ToolResult {
  /** Text handed back to the model */
  response: string;
  /** Step reward for this call */
  rewardScore: number;
  metrics: Record<string, unknown>;
}

/** The `config` block of a tool definition */
export type ToolDefinitionConfig = Record<string, unknown>;

/**
 * A stateful tool. Per-session state is keyed by instance id; the coordinator
 * guarantees every call for an instance lands on the worker that created it.
 */
export interface Tool {
  readonly name: string;
  create(instanceId: string, identity: unknown): Promise<void> | void;
  execute(instanceId: string, parameters: Record<string, unknown>): Promise<ToolResult> | ToolResult;
  calcReward?(instanceId: string): Promise<number> | number;
  release?(instanceId: string): Promise<void> | void;
  /** Live instances, reported in the worker's /health */
  instanceCount?(): number;
}

export type ToolConstructor = new (config: ToolDefinitionConfig, name: string) => Tool;

export function isTool(value: unknown): value is Tool {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'create' in value &&
    typeof value.create === 'function' &&
    'execute' in value &&
    typeof value.execute === 'function'
  );
}

export function isToolConstructor(value: unknown): value is ToolConstructor {
  return typeof value === 'function' && typeof value.prototype === 'object' && value.prototype !== null;
}
