/**
 * Confidence Router
 *
 * Pure decision function from a classification to one of three routes.
 * No I/O, no clock, no configuration lookups: thresholds are passed in.
 */

import type { SelectedTool } from '../classifier/types';
import { ToolSentinel } from '../catalog/types';
import {
  DEFAULT_ROUTING_THRESHOLDS,
  FallbackReason,
  RouteDecision,
  RoutingThresholds,
  WorkflowRoute,
} from './types';

/**
 * First candidate holding the maximum confidence. Ties keep classifier order.
 */
export function selectTopCandidate(candidates: readonly SelectedTool[]): SelectedTool | undefined {
  let top: SelectedTool | undefined;
  for (const candidate of candidates) {
    if (!top || candidate.confidence > top.confidence) {
      top = candidate;
    }
  }
  return top;
}

export function route(
  confidence: number,
  candidates: readonly SelectedTool[],
  thresholds: RoutingThresholds = DEFAULT_ROUTING_THRESHOLDS
): RouteDecision {
  const top = selectTopCandidate(candidates);

  if (!top) {
    return { route: WorkflowRoute.FALLBACK, reason: FallbackReason.NO_TOOL_FOUND };
  }

  // Sentinels win over any confidence value
  switch (top.toolName) {
    case ToolSentinel.NO_TOOL:
      return { route: WorkflowRoute.FALLBACK, reason: FallbackReason.NO_TOOL_FOUND, top };
    case ToolSentinel.CONVERSATIONAL:
      return { route: WorkflowRoute.FALLBACK, reason: FallbackReason.CONVERSATIONAL, top };
  }

  if (confidence >= thresholds.high) {
    return { route: WorkflowRoute.EXECUTE, top };
  }

  if (confidence >= thresholds.low) {
    return { route: WorkflowRoute.CLARIFY, top };
  }

  return { route: WorkflowRoute.FALLBACK, reason: FallbackReason.LOW_CONFIDENCE, top };
}
