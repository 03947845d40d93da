/**
 * Workflow Engine
 *
 * Coordinates one conversational turn through the graph:
 *
 *   load_session -> classify -> route -> execute_tools | clarify | fallback
 *                -> compose -> persist
 *
 * Turns for one session id are serialized through the session store's lock.
 * Every failure inside the graph becomes a routing decision; the only error
 * that can end a turn without a normal response is a repeated session write
 * conflict, which is answered with a transient-failure fallback.
 */

import type { ToolCatalog } from '../catalog/catalog';
import type { ClassificationResult, ClassifierGateway, SelectedTool } from '../classifier/types';
import { createErrorLogEntry } from '../errors/formatter';
import { ConcurrentModificationError } from '../errors/types';
import { getLogger, Logger } from '../monitoring/logger';
import { route as decideRoute } from '../routing/confidence-router';
import { FallbackReason, RouteDecision, RoutingThresholds, WorkflowRoute } from '../routing/types';
import type { ConversationTurn, Session } from '../session/types';
import type { SessionStore } from '../session/store';
import type { PlannedCall, ToolInvocationEngine } from '../tools/invocation-engine';
import { InvocationPhase } from '../tools/invocation-engine';
import { linkSignals, raceWithSignal } from '../utils/abort';
import { executeWithRetry } from '../utils/retry';
import { generateTurnId } from '../utils/uuid';
import { buildClarificationQuestion, clarificationOptions, mergeClarificationAnswer } from './clarification';
import { buildExecutionPlan } from './execution-plan';
import { fallbackMessage } from './fallback';
import type { InboundRequest } from './request-validator';
import { composeResponse, renderToolResults, WorkflowResponse } from './response-composer';
import { createWorkflowState, WorkflowNode, WorkflowState } from './state';

/**
 * Behaviour knobs passed in at construction, never read from global config
 */
export interface WorkflowConfig {
  thresholds: RoutingThresholds;
  maxClarificationRounds: number;
  requestTimeoutMs: number;
}

export interface WorkflowEngineDeps {
  catalog: ToolCatalog;
  sessions: SessionStore;
  classifier: ClassifierGateway;
  invoker: ToolInvocationEngine;
  config: WorkflowConfig;
  logger?: Logger;
  clock?: () => number;
}

export class WorkflowEngine {
  private readonly catalog: ToolCatalog;
  private readonly sessions: SessionStore;
  private readonly classifier: ClassifierGateway;
  private readonly invoker: ToolInvocationEngine;
  private readonly config: WorkflowConfig;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(deps: WorkflowEngineDeps) {
    this.catalog = deps.catalog;
    this.sessions = deps.sessions;
    this.classifier = deps.classifier;
    this.invoker = deps.invoker;
    this.config = deps.config;
    this.logger = deps.logger ?? getLogger();
    this.clock = deps.clock ?? (() => Date.now());
  }

  /**
   * Run one turn for a validated request.
   */
  async handle(request: InboundRequest): Promise<WorkflowResponse> {
    const startedAt = this.clock();
    const turnId = generateTurnId();
    try {
      return await this.sessions.withSessionLock(request.sessionId, () =>
        executeWithRetry(() => this.runTimedTurn(request, turnId, startedAt), {
          maxRetries: 1,
          baseDelay: 0,
          maxDelay: 0,
          retryableErrors: [ConcurrentModificationError],
          onRetry: () => {
            this.logger.warn('Session changed during turn, retrying with a fresh session', {
              event: 'session_conflict_retry',
              sessionId: request.sessionId,
              turnId,
            });
          },
        })
      );
    } catch (error) {
      if (!(error instanceof ConcurrentModificationError)) {
        throw error;
      }

      this.logger.error('Session conflict persisted after retry', {
        event: 'session_conflict_exhausted',
        sessionId: request.sessionId,
        turnId,
      });

      const state = createWorkflowState(this.stateParams(request, turnId, startedAt));
      this.fallback(state, FallbackReason.TRANSIENT_FAILURE);
      return composeResponse(state, this.clock());
    }
  }

  /**
   * The timeout is armed once the session lock is held, so time spent queued
   * behind another turn of the same session is not charged to this one.
   */
  private async runTimedTurn(request: InboundRequest, turnId: string, startedAt: number): Promise<WorkflowResponse> {
    const timeout = linkSignals([], this.config.requestTimeoutMs);
    try {
      return await this.runTurn(request, turnId, startedAt, timeout.signal);
    } finally {
      timeout.dispose();
    }
  }

  private stateParams(
    request: InboundRequest,
    turnId: string,
    startedAt: number
  ): Parameters<typeof createWorkflowState>[0] {
    return {
      turnId,
      sessionId: request.sessionId,
      query: request.query,
      callerContext: request.context,
      startedAt,
    };
  }

  private async runTurn(
    request: InboundRequest,
    turnId: string,
    startedAt: number,
    signal: AbortSignal
  ): Promise<WorkflowResponse> {
    const state = createWorkflowState(this.stateParams(request, turnId, startedAt));

    this.enter(state, WorkflowNode.LOAD_SESSION);
    const session = await this.sessions.getOrCreate(request.sessionId);

    const pendingQuery = session.pendingQuery;
    if (session.awaitingClarification && pendingQuery !== undefined) {
      state.effectiveQuery = mergeClarificationAnswer(pendingQuery, request.query);
      this.logger.info('Resuming after clarification', {
        event: 'clarification_resumed',
        sessionId: state.sessionId,
        turnId,
        round: session.clarificationRounds,
      });
    }

    const classification = await this.classify(state, session.conversationHistory, signal);

    if (classification) {
      const decision = this.route(state, classification);

      switch (decision.route) {
        case WorkflowRoute.EXECUTE:
          await this.executeTools(state, decision.top, signal);
          break;
        case WorkflowRoute.CLARIFY:
          this.clarify(state, session, decision.top);
          break;
        case WorkflowRoute.FALLBACK:
          this.fallback(state, decision.reason, decision.top ? [decision.top] : []);
          break;
      }
    }

    this.enter(state, WorkflowNode.COMPOSE);
    state.completed = true;
    const response = composeResponse(state, this.clock());

    this.enter(state, WorkflowNode.PERSIST);
    await this.persist(state, session);

    this.logger.info('Turn completed', {
      event: 'turn_completed',
      sessionId: state.sessionId,
      turnId,
      route: response.route,
      reasonCode: response.reasonCode,
      nodes: state.visitedNodes,
      executionTimeMs: response.executionTimeMs,
    });

    return response;
  }

  private async classify(
    state: WorkflowState,
    history: readonly ConversationTurn[],
    signal: AbortSignal
  ): Promise<ClassificationResult | undefined> {
    this.enter(state, WorkflowNode.CLASSIFY);

    try {
      const result = await raceWithSignal(
        this.classifier.classify(state.effectiveQuery, history, this.catalog, signal),
        signal
      );
      state.candidates = result.candidates;
      state.confidence = result.confidence;
      state.directResponse = result.directResponse;
      return result;
    } catch (error) {
      this.logger.warn('Classification failed', {
        ...createErrorLogEntry(error),
        event: 'classification_failed',
        sessionId: state.sessionId,
        turnId: state.turnId,
      });
      this.fallback(state, FallbackReason.SERVICE_UNAVAILABLE);
      return undefined;
    }
  }

  private route(state: WorkflowState, classification: ClassificationResult): RouteDecision {
    this.enter(state, WorkflowNode.ROUTE);
    const decision = decideRoute(classification.confidence, classification.candidates, this.config.thresholds);

    this.logger.info('Route decided', {
      event: 'route_decided',
      sessionId: state.sessionId,
      turnId: state.turnId,
      route: decision.route,
      confidence: classification.confidence,
      topTool: decision.top?.toolName,
      ...(decision.route === WorkflowRoute.FALLBACK ? { reason: decision.reason } : {}),
    });

    return decision;
  }

  private async executeTools(state: WorkflowState, top: SelectedTool, signal: AbortSignal): Promise<void> {
    this.enter(state, WorkflowNode.EXECUTE_TOOLS);

    let plan: PlannedCall[];
    try {
      plan = buildExecutionPlan(state.candidates, top, this.config.thresholds.high, this.catalog);
    } catch (error) {
      this.logger.warn('Execution plan rejected', {
        ...createErrorLogEntry(error),
        event: 'execution_plan_rejected',
        sessionId: state.sessionId,
        turnId: state.turnId,
      });
      this.fallback(state, FallbackReason.SERVICE_UNAVAILABLE, [top]);
      return;
    }

    state.selectedTools = plan.map((call) => call.selection);

    try {
      const outcome = await this.invoker.run({
        sessionId: state.sessionId,
        query: state.effectiveQuery,
        callerContext: state.callerContext,
        plan,
        signal,
      });

      state.toolResults = outcome.results;
      state.retryCounts = outcome.retryCounts;
      state.currentToolIndex = Math.max(0, outcome.results.length - 1);

      if (outcome.status === InvocationPhase.SUCCEEDED) {
        state.route = WorkflowRoute.EXECUTE;
        state.responseText = renderToolResults(outcome.results);
        return;
      }

      this.fallback(state, FallbackReason.TOOL_FAILURE);
    } catch (error) {
      this.logger.warn('Tool execution aborted', {
        ...createErrorLogEntry(error),
        event: 'tool_execution_aborted',
        sessionId: state.sessionId,
        turnId: state.turnId,
      });
      this.fallback(state, FallbackReason.SERVICE_UNAVAILABLE);
    }
  }

  private clarify(state: WorkflowState, session: Session, top: SelectedTool): void {
    if (session.clarificationRounds >= this.config.maxClarificationRounds) {
      this.logger.info('Clarification rounds exhausted', {
        event: 'clarification_exhausted',
        sessionId: state.sessionId,
        turnId: state.turnId,
        rounds: session.clarificationRounds,
      });
      this.fallback(state, FallbackReason.CLARIFICATION_EXHAUSTED, [top]);
      return;
    }

    this.enter(state, WorkflowNode.CLARIFY);
    state.route = WorkflowRoute.CLARIFY;
    state.selectedTools = clarificationOptions(state.candidates);
    state.clarificationQuestion = buildClarificationQuestion(state.candidates, this.catalog);
    state.responseText = state.clarificationQuestion;
    state.awaitingClarification = true;

    this.logger.info('Awaiting clarification', {
      event: 'clarification_suspended',
      sessionId: state.sessionId,
      turnId: state.turnId,
      round: session.clarificationRounds + 1,
      options: state.selectedTools.map((tool) => tool.toolName),
    });
  }

  /**
   * @param selected - Tools to report; left as they are when omitted
   */
  private fallback(state: WorkflowState, reason: FallbackReason, selected?: SelectedTool[]): void {
    this.enter(state, WorkflowNode.FALLBACK);
    state.route = WorkflowRoute.FALLBACK;
    state.reasonCode = reason;
    state.awaitingClarification = false;
    state.responseText = fallbackMessage(reason, state.directResponse);
    if (selected) {
      state.selectedTools = selected;
    }

    this.logger.info('Fallback response', {
      event: 'fallback',
      sessionId: state.sessionId,
      turnId: state.turnId,
      reason,
    });
  }

  /**
   * Single write-back of the turn. Throws ConcurrentModificationError when the
   * session was evicted or recreated since it was loaded.
   */
  private async persist(state: WorkflowState, session: Session): Promise<void> {
    const clarifying = state.route === WorkflowRoute.CLARIFY;
    const now = new Date(this.clock());

    const next: Session = {
      ...session,
      awaitingClarification: clarifying,
      pendingQuery: clarifying ? session.pendingQuery ?? state.query : undefined,
      clarificationRounds: clarifying ? session.clarificationRounds + 1 : 0,
    };

    const updated = this.sessions.appendHistory(
      next,
      { role: 'user', text: state.query, timestamp: now },
      { role: 'assistant', text: state.responseText, timestamp: now, route: state.route }
    );

    await this.sessions.save(state.sessionId, updated);
  }

  private enter(state: WorkflowState, node: WorkflowNode): void {
    state.visitedNodes.push(node);
    this.logger.debug('Workflow node entered', {
      event: 'workflow_node_entered',
      sessionId: state.sessionId,
      turnId: state.turnId,
      node,
    });
  }
}
