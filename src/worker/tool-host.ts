/**
 * Tool Host - the tools one worker agent serves, dispatched by name
 */

import { ValidationError } from '../coordinator/errors.js';
import type { ExecuteResponse } from '../coordinator/protocol.js';
import type { Tool } from './tool.js';

export interface ToolHostStatus {
  tools: string[];
  activeInstances: number;
  instancesByTool: Record<string, number>;
}

export class ToolHost {
  private tools: Map<string, Tool> = new Map();
  /** Instances created here and not yet released, for tools that do not count their own */
  private instances: Map<string, Set<string>> = new Map();

  constructor(tools: readonly Tool[] = []) {
    for (const tool of tools) {
      this.add(tool);
    }
  }

  add(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new ValidationError(`Tool ${tool.name} is already hosted`, { toolName: tool.name });
    }
    this.tools.set(tool.name, tool);
    this.instances.set(tool.name, new Set());
  }

  get toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  async create(toolName: string, instanceId: string, identity: unknown): Promise<void> {
    const tool = this.get(toolName);
    await tool.create(instanceId, identity);
    this.instances.get(toolName)?.add(instanceId);
  }

  async execute(toolName: string, instanceId: string, parameters: Record<string, unknown>): Promise<ExecuteResponse> {
    const result = await this.get(toolName).execute(instanceId, parameters);
    return { response: result.response, reward_score: result.rewardScore, metrics: result.metrics };
  }

  /** Tools without calcReward score 0 */
  async calcReward(toolName: string, instanceId: string): Promise<number> {
    const tool = this.get(toolName);
    return tool.calcReward ? tool.calcReward(instanceId) : 0;
  }

  async release(toolName: string, instanceId: string): Promise<void> {
    const tool = this.get(toolName);
    try {
      await tool.release?.(instanceId);
    } finally {
      this.instances.get(toolName)?.delete(instanceId);
    }
  }

  status(): ToolHostStatus {
    const instancesByTool: Record<string, number> = {};
    let activeInstances = 0;
    for (const [name, tool] of this.tools) {
      const count = tool.instanceCount?.() ?? this.instances.get(name)?.size ?? 0;
      instancesByTool[name] = count;
      activeInstances += count;
    }
    return { tools: this.toolNames, activeInstances, instancesByTool };
  }

  private get(toolName: string): Tool {
    const tool = this.tools.get(toolName);
    if (!tool) {
      throw new ValidationError(`Tool ${toolName} is not hosted on this worker`, {
        toolName,
        available: this.toolNames,
      });
    }
    return tool;
  }
}
