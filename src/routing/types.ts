/**
 * Routing type definitions
 */

import type { SelectedTool } from '../classifier/types';

/**
 * Terminal paths a turn can take after classification
 */
export enum WorkflowRoute {
  EXECUTE = 'EXECUTE',
  CLARIFY = 'CLARIFY',
  FALLBACK = 'FALLBACK',
}

/**
 * Machine-readable reason attached to every FALLBACK response
 */
export enum FallbackReason {
  NO_TOOL_FOUND = 'no_tool_found',
  LOW_CONFIDENCE = 'low_confidence',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  TOOL_FAILURE = 'tool_failure',
  CLARIFICATION_EXHAUSTED = 'clarification_exhausted',
  CONVERSATIONAL = 'conversational',
  TRANSIENT_FAILURE = 'transient_failure',
}

export interface RoutingThresholds {
  /** Confidence at or above which the plan is executed */
  high: number;
  /** Confidence at or above which (and below `high`) the user is asked to clarify */
  low: number;
}

export const DEFAULT_ROUTING_THRESHOLDS: Readonly<RoutingThresholds> = Object.freeze({
  high: 7.0,
  low: 5.0,
});

export type RouteDecision =
  | { route: WorkflowRoute.EXECUTE; top: SelectedTool }
  | { route: WorkflowRoute.CLARIFY; top: SelectedTool }
  | { route: WorkflowRoute.FALLBACK; reason: FallbackReason; top?: SelectedTool };
