/**
 * Per-turn workflow state
 *
 * Created when a turn starts, mutated only by the workflow engine, and
 * discarded once the turn's session write-back is done.
 */

import type { SelectedTool } from '../classifier/types';
import type { FallbackReason, WorkflowRoute } from '../routing/types';
import type { ToolResult } from '../tools/types';

export enum WorkflowNode {
  LOAD_SESSION = 'load_session',
  CLASSIFY = 'classify',
  ROUTE = 'route',
  EXECUTE_TOOLS = 'execute_tools',
  CLARIFY = 'clarify',
  FALLBACK = 'fallback',
  COMPOSE = 'compose',
  PERSIST = 'persist',
}

export interface WorkflowState {
  turnId: string;
  sessionId: string;
  /** Query as the caller sent it */
  query: string;
  /** Query handed to the classifier, merged with a pending clarification */
  effectiveQuery: string;
  callerContext: Record<string, string>;

  candidates: SelectedTool[];
  /** Tools reported in the response for the path taken */
  selectedTools: SelectedTool[];
  toolResults: ToolResult[];
  currentToolIndex: number;
  confidence: number;
  directResponse?: string;
  retryCounts: Record<string, number>;
  validationErrors: string[];

  route?: WorkflowRoute;
  reasonCode?: FallbackReason;
  awaitingClarification: boolean;
  clarificationQuestion?: string;
  responseText: string;
  completed: boolean;

  visitedNodes: WorkflowNode[];
  startedAt: number;
}

export function createWorkflowState(params: {
  turnId: string;
  sessionId: string;
  query: string;
  callerContext: Record<string, string>;
  startedAt: number;
}): WorkflowState {
  return {
    turnId: params.turnId,
    sessionId: params.sessionId,
    query: params.query,
    effectiveQuery: params.query,
    callerContext: { ...params.callerContext },
    candidates: [],
    selectedTools: [],
    toolResults: [],
    currentToolIndex: 0,
    confidence: 0,
    retryCounts: {},
    validationErrors: [],
    awaitingClarification: false,
    responseText: '',
    completed: false,
    visitedNodes: [],
    startedAt: params.startedAt,
  };
}
