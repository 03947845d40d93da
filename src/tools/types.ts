/**
 * Tool Execution Types
 */

import type { ToolDefinition } from '../catalog/types';
import type { ToolParameterValues } from '../classifier/types';

export type ToolPayload = Record<string, unknown>;

/**
 * Data accumulated from completed tools and handed to later ones
 */
export type ExecutionContext = Record<string, unknown>;

/**
 * Body sent to a tool endpoint
 */
export interface ToolCallRequest {
  query: string;
  parameters: ToolParameterValues;
  callerContext: Record<string, string>;
  executionContext: ExecutionContext;
}

export interface ToolCallResponse {
  ok: boolean;
  payload: ToolPayload;
}

/**
 * Transport to a capability handler.
 *
 * Throws ToolInvocationError for a failed attempt, or RequestCancelledError
 * when `signal` aborted the call.
 */
export interface ToolEndpoint {
  invoke(tool: ToolDefinition, request: ToolCallRequest, signal?: AbortSignal): Promise<ToolCallResponse>;
}

/**
 * Outcome of one tool in a plan. Frozen once recorded.
 */
export interface ToolResult {
  readonly toolName: string;
  readonly success: boolean;
  readonly payload?: Readonly<ToolPayload>;
  readonly error?: string;
  readonly attempts: number;
}
