/**
 * Build Tool instances from tool definitions
 *
 * `class_name` resolves as:
 *   - `path/to/module.js#ExportName`: dynamic import (relative paths against cwd)
 *   - anything else: the last dotted segment looked up among the built-in tools
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { toolNameOf, type ToolDefinition, type ToolDefinitionFile } from '../config/tool-definitions.js';
import { ValidationError } from '../coordinator/errors.js';
import { isTool, isToolConstructor, type Tool, type ToolConstructor } from './tool.js';
import { ArithmeticTool } from './tools/arithmetic-tool.js';

export const BUILTIN_TOOLS: Readonly<Record<string, ToolConstructor>> = {
  ArithmeticTool,
};

export interface ToolLoaderOptions {
  /** Base for relative module paths (default: process.cwd()) */
  cwd?: string;
  builtins?: Readonly<Record<string, ToolConstructor>>;
}

function moduleSpecifier(modulePath: string, cwd: string): string {
  if (modulePath.startsWith('.') || modulePath.startsWith('/')) {
    return pathToFileURL(resolve(cwd, modulePath)).href;
  }
  return modulePath;
}

async function importConstructor(className: string, cwd: string): Promise<ToolConstructor> {
  const hash = className.lastIndexOf('#');
  const modulePath = className.slice(0, hash);
  const exportName = className.slice(hash + 1);

  let mod: unknown;
  try {
    mod = await import(moduleSpecifier(modulePath, cwd));
  } catch (error) {
    throw new ValidationError(`Cannot import tool module ${modulePath}`, {
      className,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const exported: unknown = typeof mod === 'object' && mod !== null ? Reflect.get(mod, exportName) : undefined;
  if (!isToolConstructor(exported)) {
    throw new ValidationError(`${modulePath} has no class export ${exportName}`, { className });
  }
  return exported;
}

async function resolveConstructor(
  definition: ToolDefinition,
  builtins: Readonly<Record<string, ToolConstructor>>,
  cwd: string
): Promise<ToolConstructor> {
  if (definition.class_name.includes('#')) {
    return importConstructor(definition.class_name, cwd);
  }
  const builtin = builtins[toolNameOf(definition)];
  if (!builtin) {
    throw new ValidationError(`Unknown tool class ${definition.class_name}`, {
      className: definition.class_name,
      builtins: Object.keys(builtins),
    });
  }
  return builtin;
}

export async function loadTool(definition: ToolDefinition, options: ToolLoaderOptions = {}): Promise<Tool> {
  const name = toolNameOf(definition);
  const Ctor = await resolveConstructor(definition, options.builtins ?? BUILTIN_TOOLS, options.cwd ?? process.cwd());

  const instance: unknown = new Ctor(definition.config ?? {}, name);
  if (!isTool(instance)) {
    throw new ValidationError(`${definition.class_name} does not implement the tool interface`, {
      className: definition.class_name,
    });
  }
  if (instance.name !== name) {
    throw new ValidationError(`${definition.class_name} reports name ${instance.name}, expected ${name}`, {
      className: definition.class_name,
    });
  }
  return instance;
}

export async function loadTools(file: ToolDefinitionFile, options: ToolLoaderOptions = {}): Promise<Tool[]> {
  const tools: Tool[] = [];
  for (const definition of file.tools) {
    tools.push(await loadTool(definition, options));
  }
  return tools;
}
