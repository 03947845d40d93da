/**
 * Classifier Gateway type definitions
 */

import type { ToolCatalog } from '../catalog/catalog';
import type { ConversationTurn } from '../session/types';

/**
 * Parameter values the classifier bound for a tool call
 */
export type ToolParameterValues = Record<string, unknown>;

/**
 * One ranked candidate returned by the classifier
 */
export interface SelectedTool {
  /** Catalog tool name, or a ToolSentinel value */
  toolName: string;
  /** 0.0 - 10.0 */
  confidence: number;
  reasoning: string;
  parameters: ToolParameterValues;
  /** Name of a tool in the same plan that must run first */
  dependsOn?: string;
  /** Fields this tool contributes, from its payload, to later tools */
  contextNeeded?: string[];
}

export interface ClassificationResult {
  /** In classifier order */
  candidates: SelectedTool[];
  confidence: number;
  /** Reply text for conversational turns */
  directResponse?: string;
}

/**
 * Adapter to the external reasoning oracle.
 *
 * Implementations throw ClassificationError with CLASSIFIER_UNAVAILABLE
 * (unreachable, throttled, timed out, aborted) or CLASSIFIER_MALFORMED_RESPONSE
 * (output failed schema validation).
 */
export interface ClassifierGateway {
  classify(
    query: string,
    history: readonly ConversationTurn[],
    catalog: ToolCatalog,
    signal?: AbortSignal
  ): Promise<ClassificationResult>;
}
