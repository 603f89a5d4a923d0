import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import YAML from 'yaml';

import { ValidationError } from '../coordinator/errors.js';
import {
  extractToolNames,
  loadToolDefinitions,
  mergeToolDefinitionRegistry,
  parseToolDefinitions,
  rewriteToolDefinitions,
  rewrittenConfigPath,
  toolNameOf,
  writeToolDefinitions,
  type ToolDefinitionFile,
} from './tool-definitions.js';

describe('tool definitions', () => {
  describe('toolNameOf', () => {
    it('should use the class name itself', () => {
      expect(toolNameOf({ class_name: 'ArithmeticTool' })).toBe('ArithmeticTool');
    });

    it('should use the last dotted segment', () => {
      expect(toolNameOf({ class_name: 'tools.math.ArithmeticTool' })).toBe('ArithmeticTool');
    });

    it('should use the export name of a module reference', () => {
      expect(toolNameOf({ class_name: './tools/echo.js#EchoTool' })).toBe('EchoTool');
    });
  });

  describe('parseToolDefinitions', () => {
    it('should keep unknown fields', () => {
      const file = parseToolDefinitions({ version: 2, tools: [{ class_name: 'ArithmeticTool', note: 'x' }] });

      expect(file).toEqual({ version: 2, tools: [{ class_name: 'ArithmeticTool', note: 'x' }] });
      expect(extractToolNames(file)).toEqual(['ArithmeticTool']);
    });

    it('should reject entries without a class name', () => {
      expect(() => parseToolDefinitions({ tools: [{ config: {} }] }, 'tools.yaml')).toThrow(ValidationError);
      expect(() => parseToolDefinitions(null, 'tools.yaml')).toThrow(/^Invalid tools\.yaml: /);
    });
  });

  describe('rewriteToolDefinitions', () => {
    const file: ToolDefinitionFile = {
      tools: [
        {
          class_name: 'tools.math.ArithmeticTool',
          config: { precision: 2 },
          tool_schema: { type: 'function', function: { name: 'calc' } },
        },
        { class_name: 'web search' },
      ],
    };

    it('should point every tool at its coordinator route', () => {
      const rewritten = rewriteToolDefinitions(file, { serverUrl: 'http://10.0.0.5:8000/' });

      expect(rewritten.tools).toEqual([
        {
          class_name: 'tools.math.ArithmeticTool',
          config: {
            precision: 2,
            mcp_server_url: 'http://10.0.0.5:8000/tools/ArithmeticTool',
            timeout_per_query: 600,
          },
          tool_schema: { type: 'function', function: { name: 'calc' } },
        },
        {
          class_name: 'web search',
          config: { mcp_server_url: 'http://10.0.0.5:8000/tools/web%20search', timeout_per_query: 600 },
        },
      ]);
    });

    it('should leave its input untouched', () => {
      rewriteToolDefinitions(file, { serverUrl: 'http://10.0.0.5:8000' });
      expect(file.tools[0]?.config).toEqual({ precision: 2 });
    });

    it('should swap in a proxy class and query timeout', () => {
      const rewritten = rewriteToolDefinitions(file, {
        serverUrl: 'http://master:8000',
        proxyClassName: 'RemoteTool',
        timeoutPerQuery: 30,
      });

      expect(rewritten.tools[1]).toEqual({
        class_name: 'RemoteTool',
        config: { mcp_server_url: 'http://master:8000/tools/web%20search', timeout_per_query: 30 },
      });
    });
  });

  describe('rewrittenConfigPath', () => {
    it('should place the output beside the input by default', () => {
      expect(rewrittenConfigPath('/cfg/tools.yaml')).toBe('/cfg/tools_with_server_urls.yaml');
      expect(rewrittenConfigPath('/cfg/tools.yaml', '/out')).toBe('/out/tools_with_server_urls.yaml');
    });
  });

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'toolfleet-defs-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should load a YAML file', async () => {
      const path = join(dir, 'tools.yaml');
      await writeFile(path, 'tools:\n  - class_name: ArithmeticTool\n    config:\n      precision: 2\n');

      expect(await loadToolDefinitions(path)).toEqual({
        tools: [{ class_name: 'ArithmeticTool', config: { precision: 2 } }],
      });
    });

    it('should write YAML that reads back the same', async () => {
      const path = join(dir, 'nested', 'out.yaml');
      const file = { tools: [{ class_name: 'ArithmeticTool', config: { mcp_server_url: 'http://m:8000/tools/ArithmeticTool' } }] };

      await writeToolDefinitions(path, file);

      expect(YAML.parse(await readFile(path, 'utf-8'))).toEqual(file);
    });

    it('should report missing and malformed files', async () => {
      await expect(loadToolDefinitions(join(dir, 'missing.yaml'))).rejects.toThrow('Cannot read tool definitions at');

      const broken = join(dir, 'broken.yaml');
      await writeFile(broken, 'tools: [\n');
      await expect(loadToolDefinitions(broken)).rejects.toThrow('are not valid YAML');
    });

    it('should merge the files named by a registry', async () => {
      await writeFile(join(dir, 'a.yaml'), 'tools:\n  - class_name: ArithmeticTool\n');
      await writeFile(join(dir, 'b.yaml'), 'tools:\n  - class_name: pkg.SearchTool\n  - class_name: pkg.WeatherTool\n');
      const registry = join(dir, 'registry.jsonl');
      await writeFile(
        registry,
        [
          JSON.stringify({ yaml_tool_path: join(dir, 'a.yaml') }),
          '',
          JSON.stringify({ name: 'no path' }),
          JSON.stringify({ yaml_tool_path: join(dir, 'b.yaml') }),
        ].join('\n')
      );

      const merged = await mergeToolDefinitionRegistry(registry);

      expect(extractToolNames(merged)).toEqual(['ArithmeticTool', 'SearchTool', 'WeatherTool']);
    });

    it('should point at the line of a malformed registry entry', async () => {
      const registry = join(dir, 'registry.jsonl');
      await writeFile(registry, '\n{oops\n');

      await expect(mergeToolDefinitionRegistry(registry)).rejects.toThrow(`${registry}:2 is not valid JSON`);
    });
  });
});
