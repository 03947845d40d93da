/**
 * Response Composer
 *
 * Builds the outward response from a finished WorkflowState. Pure: the same
 * state and clock reading always give an equal response.
 */

import type { SelectedTool } from '../classifier/types';
import type { FallbackReason } from '../routing/types';
import { WorkflowRoute } from '../routing/types';
import type { ToolResult } from '../tools/types';
import type { WorkflowState } from './state';

export interface WorkflowResponse {
  success: true;
  sessionId: string;
  route: WorkflowRoute;
  selectedTool: SelectedTool[];
  confidence: number;
  responseText: string;
  reasonCode?: FallbackReason;
  awaitingClarification: boolean;
  toolResults: ToolResult[];
  executionTimeMs: number;
  timestamp: string;
}

const TEXT_FIELDS = ['answer', 'response', 'text', 'message'] as const;

/**
 * Text of the successful tool payloads, one paragraph per tool
 */
export function renderToolResults(results: readonly ToolResult[]): string {
  return results
    .filter((result) => result.success && result.payload !== undefined)
    .map((result) => {
      const payload = result.payload ?? {};
      for (const field of TEXT_FIELDS) {
        const value = payload[field];
        if (typeof value === 'string' && value.trim().length > 0) {
          return value.trim();
        }
      }
      return JSON.stringify(payload);
    })
    .join('\n\n');
}

export function composeResponse(state: WorkflowState, now: number): WorkflowResponse {
  const route = state.route ?? WorkflowRoute.FALLBACK;

  return {
    success: true,
    sessionId: state.sessionId,
    route,
    selectedTool: state.selectedTools.map((tool) => ({ ...tool })),
    confidence: state.confidence,
    responseText: state.responseText,
    ...(route === WorkflowRoute.FALLBACK && state.reasonCode ? { reasonCode: state.reasonCode } : {}),
    awaitingClarification: state.awaitingClarification,
    toolResults: [...state.toolResults],
    executionTimeMs: Math.max(0, now - state.startedAt),
    timestamp: new Date(now).toISOString(),
  };
}
