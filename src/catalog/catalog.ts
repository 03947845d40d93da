/**
 * Tool Catalog
 *
 * Read-only registry of capability definitions. Validated once at construction;
 * a reload builds a new catalog instead of patching this one.
 */

import { ConfigError } from '../errors/types';
import { ERROR_CODES } from '../errors/codes';
import { isNonEmptyString, isValidUrl } from '../utils/validation';
import { isToolSentinel, ToolDefinition } from './types';

export class ToolCatalog {
  private readonly tools: readonly ToolDefinition[];
  private readonly byName: ReadonlyMap<string, ToolDefinition>;

  constructor(tools: readonly ToolDefinition[]) {
    const byName = new Map<string, ToolDefinition>();
    const frozen: ToolDefinition[] = [];

    tools.forEach((tool, index) => {
      validateDefinition(tool, index);

      if (byName.has(tool.name)) {
        throw new ConfigError(
          `Duplicate tool name '${tool.name}' at index ${index}`,
          ERROR_CODES.CATALOG_INVALID,
          { index, toolName: tool.name }
        );
      }

      const definition = freezeDefinition(tool);
      byName.set(definition.name, definition);
      frozen.push(definition);
    });

    this.tools = Object.freeze(frozen);
    this.byName = byName;
  }

  /**
   * @returns The definition, or undefined when no tool has that name
   */
  lookup(name: string): ToolDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * All definitions in load order
   */
  all(): readonly ToolDefinition[] {
    return this.tools;
  }

  names(): string[] {
    return this.tools.map((tool) => tool.name);
  }

  capabilities(): Record<string, readonly string[]> {
    const result: Record<string, readonly string[]> = {};
    for (const tool of this.tools) {
      result[tool.name] = tool.capabilities;
    }
    return result;
  }

  get size(): number {
    return this.tools.length;
  }
}

function fail(index: number, message: string): never {
  throw new ConfigError(`Invalid tool at index ${index}: ${message}`, ERROR_CODES.CATALOG_INVALID, {
    index,
  });
}

function validateDefinition(tool: ToolDefinition, index: number): void {
  if (!isNonEmptyString(tool.name)) {
    fail(index, 'name is required');
  }
  if (isToolSentinel(tool.name)) {
    fail(index, `'${tool.name}' is reserved`);
  }
  if (!isNonEmptyString(tool.description)) {
    fail(index, `description is required for '${tool.name}'`);
  }
  if (!isNonEmptyString(tool.endpoint) || !isValidUrl(tool.endpoint)) {
    fail(index, `endpoint of '${tool.name}' must be an http(s) URL`);
  }
  if (tool.capabilities.length === 0 || !tool.capabilities.every(isNonEmptyString)) {
    fail(index, `capabilities of '${tool.name}' must be a non-empty list of strings`);
  }

  const { required, optional } = tool.parameters;
  const seen = new Set<string>();
  for (const param of [...required, ...optional]) {
    if (!isNonEmptyString(param)) {
      fail(index, `parameter names of '${tool.name}' must be non-empty strings`);
    }
    if (seen.has(param)) {
      fail(index, `parameter '${param}' of '${tool.name}' is listed more than once`);
    }
    seen.add(param);
  }
}

function freezeDefinition(tool: ToolDefinition): ToolDefinition {
  return Object.freeze({
    name: tool.name,
    description: tool.description,
    endpoint: tool.endpoint,
    capabilities: Object.freeze([...tool.capabilities]),
    parameters: Object.freeze({
      required: Object.freeze([...tool.parameters.required]),
      optional: Object.freeze([...tool.parameters.optional]),
    }),
    examples: Object.freeze(tool.examples.map((example) => Object.freeze({ ...example }))),
  });
}
