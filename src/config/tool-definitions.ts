/**
 * Tool-definition files
 *
 * A YAML document listing the tools a deployment serves:
 *
 *   tools:
 *     - class_name: ArithmeticTool
 *       config: {}
 *       tool_schema: { type: function, function: { name: calc, ... } }
 *
 * The coordinator rewrites such a file so every tool points at its proxy
 * endpoint (`config.mcp_server_url = <server>/tools/<name>`), and worker
 * agents load their tools from the original. None of this touches the registry.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';

import YAML from 'yaml';
import { z } from 'zod';

import { ValidationError } from '../coordinator/errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('ToolDefinitions');

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const ToolDefinitionSchema = z
  .object({
    /** Built-in class name, a dotted path ending in the class, or `module#Export` */
    class_name: z.string().trim().min(1),
    config: z.record(z.string(), z.unknown()).optional(),
    /** Function-calling schema shown to the model; carried through untouched */
    tool_schema: z.unknown().optional(),
  })
  .passthrough();

export const ToolDefinitionFileSchema = z
  .object({
    tools: z.array(ToolDefinitionSchema),
  })
  .passthrough();

export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;
export type ToolDefinitionFile = z.infer<typeof ToolDefinitionFileSchema>;

const RegistryEntrySchema = z
  .object({
    yaml_tool_path: z.string().min(1).optional(),
  })
  .passthrough();

/** Seconds the client-side proxy waits for one call (config.timeout_per_query) */
export const DEFAULT_TIMEOUT_PER_QUERY = 600;

export interface RewriteOptions {
  /** Coordinator base URL, e.g. http://10.0.0.5:8000 */
  serverUrl: string;
  /** Replace every class_name with this client-side proxy class */
  proxyClassName?: string;
  /** Written to config.timeout_per_query (default: 600) */
  timeoutPerQuery?: number;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Name under which a tool is advertised and routed
 */
export function toolNameOf(definition: Pick<ToolDefinition, 'class_name'>): string {
  const className = definition.class_name.trim();
  const hash = className.lastIndexOf('#');
  if (hash >= 0) {
    return className.slice(hash + 1);
  }
  const segments = className.split('.');
  return segments[segments.length - 1] ?? className;
}

export function extractToolNames(file: ToolDefinitionFile): string[] {
  return file.tools.map(toolNameOf);
}

export function parseToolDefinitions(value: unknown, source = 'tool definitions'): ToolDefinitionFile {
  const result = ToolDefinitionFileSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${source}: ${result.error.issues.map((i) => i.message).join('; ')}`, {
      source,
    });
  }
  return result.data;
}

/**
 * Point every tool at the coordinator through `config.mcp_server_url`, the key
 * the client-side proxy tool reads. Returns a new value; the input is left
 * untouched.
 */
export function rewriteToolDefinitions(file: ToolDefinitionFile, options: RewriteOptions): ToolDefinitionFile {
  const serverUrl = options.serverUrl.replace(/\/+$/, '');
  return {
    ...file,
    tools: file.tools.map((definition) => {
      const name = toolNameOf(definition);
      const config: Record<string, unknown> = {
        ...(definition.config ?? {}),
        mcp_server_url: `${serverUrl}/tools/${encodeURIComponent(name)}`,
        timeout_per_query: options.timeoutPerQuery ?? DEFAULT_TIMEOUT_PER_QUERY,
      };
      return {
        ...definition,
        class_name: options.proxyClassName ?? definition.class_name,
        config,
      };
    }),
  };
}

/**
 * `<dir>/<stem>_with_server_urls.yaml`, beside the input unless outputDir is given
 */
export function rewrittenConfigPath(inputPath: string, outputDir?: string): string {
  const stem = basename(inputPath, extname(inputPath));
  return join(outputDir ?? dirname(inputPath), `${stem}_with_server_urls.yaml`);
}

// ---------------------------------------------------------------------------
// File IO
// ---------------------------------------------------------------------------

export async function loadToolDefinitions(path: string): Promise<ToolDefinitionFile> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ValidationError(`Cannot read tool definitions at ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    throw new ValidationError(`Tool definitions at ${path} are not valid YAML`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return parseToolDefinitions(parsed, path);
}

export async function writeToolDefinitions(path: string, file: ToolDefinitionFile): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, YAML.stringify(file, { indent: 2 }), 'utf-8');
  return path;
}

/**
 * Concatenate the tools of every YAML file named by a JSONL registry.
 * Each line is an object whose `yaml_tool_path` names a tool-definition file;
 * relative paths resolve against the working directory.
 */
export async function mergeToolDefinitionRegistry(registryPath: string): Promise<ToolDefinitionFile> {
  let text: string;
  try {
    text = await readFile(registryPath, 'utf-8');
  } catch (error) {
    throw new ValidationError(`Cannot read tool registry at ${registryPath}`, {
      path: registryPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const tools: ToolDefinition[] = [];
  const lines = text.split(/\r?\n/);
  for (const [index, line] of lines.entries()) {
    if (!line.trim()) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      throw new ValidationError(`${registryPath}:${index + 1} is not valid JSON`, { path: registryPath, line: index + 1 });
    }
    const entry = RegistryEntrySchema.safeParse(raw);
    if (!entry.success || !entry.data.yaml_tool_path) {
      log.warn(`Registry entry without yaml_tool_path skipped`, { path: registryPath, line: index + 1 });
      continue;
    }

    const file = await loadToolDefinitions(resolve(entry.data.yaml_tool_path));
    if (file.tools.length === 0) {
      log.warn(`No tools in ${entry.data.yaml_tool_path}`);
      continue;
    }
    tools.push(...file.tools);
    log.info(`Loaded ${file.tools.length} tool(s) from ${entry.data.yaml_tool_path}`);
  }

  log.info(`Merged ${tools.length} tool definition(s) from ${registryPath}`);
  return { tools };
}
