/**
 * Tool catalog type definitions
 */

/**
 * Values the classifier may return instead of a catalog tool name.
 */
export enum ToolSentinel {
  NO_TOOL = 'NO_TOOL',
  CONVERSATIONAL = 'CONVERSATIONAL',
}

export const TOOL_SENTINELS: ReadonlySet<string> = new Set<string>(Object.values(ToolSentinel));

export function isToolSentinel(name: string): name is ToolSentinel {
  return TOOL_SENTINELS.has(name);
}

export interface ToolParameters {
  required: readonly string[];
  optional: readonly string[];
}

/**
 * Few-shot example shown to the classifier
 */
export interface ToolExample {
  prompt: string;
  reasoning: string;
}

/**
 * Catalog entry describing one capability handler
 */
export interface ToolDefinition {
  name: string;
  description: string;
  endpoint: string;
  capabilities: readonly string[];
  parameters: ToolParameters;
  examples: readonly ToolExample[];
}
