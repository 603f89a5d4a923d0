import { describe, it, expect, beforeEach } from 'vitest';

import { InstanceNotBoundError } from '../../coordinator/errors.js';
import { ArithmeticTool } from './arithmetic-tool.js';

describe('ArithmeticTool', () => {
  let tool: ArithmeticTool;

  beforeEach(() => {
    tool = new ArithmeticTool();
    tool.create('i1', null);
  });

  it('should default its name to the class name', () => {
    expect(tool.name).toBe('ArithmeticTool');
    expect(new ArithmeticTool({}, 'calc').name).toBe('calc');
  });

  describe('execute', () => {
    it('should perform each operation', () => {
      expect(tool.execute('i1', { operation: 'add', operand1: 2, operand2: 3 }).response).toBe('Result: 2 add 3 = 5');
      expect(tool.execute('i1', { operation: 'subtract', operand1: 2, operand2: 3 }).response).toBe(
        'Result: 2 subtract 3 = -1'
      );
      expect(tool.execute('i1', { operation: 'multiply', operand1: 4, operand2: 5 }).response).toBe(
        'Result: 4 multiply 5 = 20'
      );
      expect(tool.execute('i1', { operation: 'divide', operand1: 7, operand2: 2 }).response).toBe(
        'Result: 7 divide 2 = 3.5'
      );
    });

    it('should reward a valid call and report metrics', () => {
      expect(tool.execute('i1', { operation: 'add', operand1: 1, operand2: 1 })).toEqual({
        response: 'Result: 1 add 1 = 2',
        rewardScore: 0.1,
        metrics: { operation: 'add', operand1: 1, operand2: 1, result: 2, operation_count: 1 },
      });
    });

    it('should treat missing operands as zero', () => {
      expect(tool.execute('i1', { operation: 'subtract' }).response).toBe('Result: 0 subtract 0 = 0');
    });

    it('should penalize invalid calls without recording them', () => {
      const penalty = { rewardScore: -0.1, metrics: {} };

      expect(tool.execute('i1', {})).toEqual({ response: 'Error: missing operation', ...penalty });
      expect(tool.execute('i1', { operation: 'add', operand1: '2' })).toEqual({
        response: 'Error: operands must be numbers',
        ...penalty,
      });
      expect(tool.execute('i1', { operation: 'pow', operand1: 2, operand2: 3 })).toEqual({
        response: "Error: unsupported operation 'pow'",
        ...penalty,
      });
      expect(tool.execute('i1', { operation: 'divide', operand1: 1, operand2: 0 })).toEqual({
        response: 'Error: division by zero',
        ...penalty,
      });
      expect(tool.history('i1')).toHaveLength(0);
    });

    it('should refuse instances it never created', () => {
      expect(() => tool.execute('other', { operation: 'add' })).toThrow(InstanceNotBoundError);
    });

    it('should keep state per instance', () => {
      tool.create('i2', null);
      tool.execute('i1', { operation: 'add', operand1: 1, operand2: 2 });
      tool.execute('i1', { operation: 'add', operand1: 3, operand2: 4 });
      const result = tool.execute('i2', { operation: 'add', operand1: 5, operand2: 6 });

      expect(result.metrics.operation_count).toBe(1);
      expect(tool.history('i1').map((entry) => entry.result)).toEqual([3, 7]);
    });
  });

  describe('calcReward', () => {
    it('should give full reward for at most one operation', () => {
      expect(tool.calcReward('i1')).toBe(1);
      tool.execute('i1', { operation: 'add', operand1: 1, operand2: 1 });
      expect(tool.calcReward('i1')).toBe(1);
    });

    it('should lose a tenth for each extra operation', () => {
      for (let i = 0; i < 3; i++) {
        tool.execute('i1', { operation: 'add', operand1: i, operand2: 1 });
      }
      expect(tool.calcReward('i1')).toBeCloseTo(0.8);
    });

    it('should floor at zero', () => {
      for (let i = 0; i < 15; i++) {
        tool.execute('i1', { operation: 'add', operand1: i, operand2: 1 });
      }
      expect(tool.calcReward('i1')).toBe(0);
    });

    it('should score unknown instances zero', () => {
      expect(tool.calcReward('missing')).toBe(0);
    });
  });

  describe('lifecycle', () => {
    it('should keep state when created again', () => {
      tool.execute('i1', { operation: 'add', operand1: 1, operand2: 1 });
      tool.create('i1', null);
      expect(tool.history('i1')).toHaveLength(1);
    });

    it('should forget released instances', () => {
      tool.create('i2', null);
      expect(tool.instanceCount()).toBe(2);

      tool.release('i1');

      expect(tool.instanceCount()).toBe(1);
      expect(() => tool.execute('i1', { operation: 'add' })).toThrow(InstanceNotBoundError);
    });
  });
});
