/**
 * Example stateful tool: basic arithmetic with a per-instance history
 */

import { InstanceNotBoundError } from '../../coordinator/errors.js';
import type { Tool, ToolDefinitionConfig, ToolResult } from '../tool.js';

export type ArithmeticOperation = 'add' | 'subtract' | 'multiply' | 'divide';

interface HistoryEntry {
  operation: ArithmeticOperation;
  operand1: number;
  operand2: number;
  result: number;
}

interface ArithmeticState {
  identity: unknown;
  history: HistoryEntry[];
}

const VALID_CALL_REWARD = 0.1;
const INVALID_CALL_PENALTY = -0.1;

function isOperation(value: unknown): value is ArithmeticOperation {
  return value === 'add' || value === 'subtract' || value === 'multiply' || value === 'divide';
}

function invalid(message: string): ToolResult {
  return { response: `Error: ${message}`, rewardScore: INVALID_CALL_PENALTY, metrics: {} };
}

export class ArithmeticTool implements Tool {
  private instances: Map<string, ArithmeticState> = new Map();

  constructor(
    readonly config: ToolDefinitionConfig = {},
    readonly name = 'ArithmeticTool'
  ) {}

  create(instanceId: string, identity: unknown): void {
    if (!this.instances.has(instanceId)) {
      this.instances.set(instanceId, { identity, history: [] });
    }
  }

  execute(instanceId: string, parameters: Record<string, unknown>): ToolResult {
    const state = this.instances.get(instanceId);
    if (!state) {
      throw new InstanceNotBoundError(instanceId, `no ${this.name} instance on this worker`);
    }

    const { operation, operand1 = 0, operand2 = 0 } = parameters;
    if (operation === undefined || operation === '') {
      return invalid('missing operation');
    }
    if (typeof operand1 !== 'number' || typeof operand2 !== 'number') {
      return invalid('operands must be numbers');
    }
    if (!isOperation(operation)) {
      return invalid(`unsupported operation '${String(operation)}'`);
    }

    let result: number;
    switch (operation) {
      case 'add':
        result = operand1 + operand2;
        break;
      case 'subtract':
        result = operand1 - operand2;
        break;
      case 'multiply':
        result = operand1 * operand2;
        break;
      case 'divide':
        if (operand2 === 0) {
          return invalid('division by zero');
        }
        result = operand1 / operand2;
        break;
    }

    state.history.push({ operation, operand1, operand2, result });
    return {
      response: `Result: ${operand1} ${operation} ${operand2} = ${result}`,
      rewardScore: VALID_CALL_REWARD,
      metrics: { operation, operand1, operand2, result, operation_count: state.history.length },
    };
  }

  /**
   * 1.0 for a single operation, 0.1 less for each additional one, floored at 0
   */
  calcReward(instanceId: string): number {
    const state = this.instances.get(instanceId);
    if (!state) {
      return 0;
    }
    return Math.min(Math.max(1 - 0.1 * (state.history.length - 1), 0), 1);
  }

  release(instanceId: string): void {
    this.instances.delete(instanceId);
  }

  instanceCount(): number {
    return this.instances.size;
  }

  /** Operations recorded for an instance */
  history(instanceId: string): readonly HistoryEntry[] {
    return this.instances.get(instanceId)?.history ?? [];
  }
}
