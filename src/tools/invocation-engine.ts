/**
 * Tool Invocation Engine
 *
 * Runs an execution plan one tool at a time, with bounded retry and
 * exponential backoff per tool. The retry cycle is an explicit state machine:
 *
 *   PENDING(i, a) --success--> ADVANCING(i+1) --> PENDING(i+1, 0)
 *                 --success, last tool--> SUCCEEDED
 *                 --failure--> RETRYING(i, a+1) --backoff--> PENDING(i, a+1)
 *                 --failure, budget spent--> EXHAUSTED
 *
 * `transition` is pure so the cycle bound can be checked without any I/O.
 */

import type { ToolDefinition } from '../catalog/types';
import type { SelectedTool } from '../classifier/types';
import { ERROR_CODES } from '../errors/codes';
import { OrchestratorError, RequestCancelledError, ToolInvocationError } from '../errors/types';
import { sanitizeErrorMessage } from '../errors/formatter';
import { getLogger, Logger } from '../monitoring/logger';
import { raceWithSignal } from '../utils/abort';
import { BackoffPolicy, computeBackoffDelay } from '../utils/retry';
import { sleepWithSignal } from '../utils/sleep';
import type { ExecutionContext, ToolEndpoint, ToolPayload, ToolResult } from './types';

export enum InvocationPhase {
  PENDING = 'PENDING',
  RETRYING = 'RETRYING',
  ADVANCING = 'ADVANCING',
  SUCCEEDED = 'SUCCEEDED',
  EXHAUSTED = 'EXHAUSTED',
}

/**
 * `attempt` counts the failed attempts of tool `index` so far.
 */
export type InvocationState =
  | { phase: InvocationPhase.PENDING; index: number; attempt: number }
  | { phase: InvocationPhase.RETRYING; index: number; attempt: number }
  | { phase: InvocationPhase.ADVANCING; index: number }
  | { phase: InvocationPhase.SUCCEEDED }
  | { phase: InvocationPhase.EXHAUSTED; index: number; attempts: number };

export type InvocationEvent =
  | { type: 'CALL_SUCCEEDED' }
  | { type: 'CALL_FAILED' }
  | { type: 'BACKOFF_ELAPSED' }
  | { type: 'ADVANCED' };

export interface TransitionLimits {
  toolCount: number;
  /** Total attempts allowed per tool */
  maxAttempts: number;
}

export function initialInvocationState(toolCount: number): InvocationState {
  return toolCount === 0
    ? { phase: InvocationPhase.SUCCEEDED }
    : { phase: InvocationPhase.PENDING, index: 0, attempt: 0 };
}

export function isTerminal(state: InvocationState): boolean {
  return state.phase === InvocationPhase.SUCCEEDED || state.phase === InvocationPhase.EXHAUSTED;
}

export function transition(
  state: InvocationState,
  event: InvocationEvent,
  limits: TransitionLimits
): InvocationState {
  switch (state.phase) {
    case InvocationPhase.PENDING:
      if (event.type === 'CALL_SUCCEEDED') {
        return state.index >= limits.toolCount - 1
          ? { phase: InvocationPhase.SUCCEEDED }
          : { phase: InvocationPhase.ADVANCING, index: state.index + 1 };
      }
      if (event.type === 'CALL_FAILED') {
        const failed = state.attempt + 1;
        return failed >= limits.maxAttempts
          ? { phase: InvocationPhase.EXHAUSTED, index: state.index, attempts: failed }
          : { phase: InvocationPhase.RETRYING, index: state.index, attempt: failed };
      }
      break;
    case InvocationPhase.RETRYING:
      if (event.type === 'BACKOFF_ELAPSED') {
        return { phase: InvocationPhase.PENDING, index: state.index, attempt: state.attempt };
      }
      break;
    case InvocationPhase.ADVANCING:
      if (event.type === 'ADVANCED') {
        return { phase: InvocationPhase.PENDING, index: state.index, attempt: 0 };
      }
      break;
    case InvocationPhase.SUCCEEDED:
    case InvocationPhase.EXHAUSTED:
      break;
  }

  throw new OrchestratorError(
    ERROR_CODES.INTERNAL_ERROR,
    `Invalid invocation transition: ${event.type} in ${state.phase}`,
    false
  );
}

/**
 * Fields a tool declared in `contextNeeded`, picked from its own payload.
 * Absent fields are left out, never set to null.
 */
export function extractContext(
  payload: Readonly<ToolPayload>,
  fields: readonly string[] | undefined
): ExecutionContext {
  const extracted: ExecutionContext = {};
  for (const field of fields ?? []) {
    if (Object.prototype.hasOwnProperty.call(payload, field) && payload[field] !== undefined) {
      extracted[field] = payload[field];
    }
  }
  return extracted;
}

export interface PlannedCall {
  tool: ToolDefinition;
  selection: SelectedTool;
}

export interface InvocationPolicy {
  maxAttempts: number;
  backoff: BackoffPolicy;
}

export interface InvocationRequest {
  sessionId: string;
  query: string;
  callerContext: Record<string, string>;
  plan: readonly PlannedCall[];
  signal?: AbortSignal;
}

export interface InvocationOutcome {
  status: InvocationPhase.SUCCEEDED | InvocationPhase.EXHAUSTED;
  results: ToolResult[];
  executionContext: ExecutionContext;
  /** Failed attempts per tool name */
  retryCounts: Record<string, number>;
  failedTool?: string;
}

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

export class ToolInvocationEngine {
  private readonly logger: Logger;

  constructor(
    private readonly endpoint: ToolEndpoint,
    private readonly policy: InvocationPolicy,
    logger?: Logger,
    private readonly sleep: SleepFunction = sleepWithSignal
  ) {
    this.logger = logger ?? getLogger();
  }

  /**
   * @throws RequestCancelledError when the request signal aborts mid-plan
   */
  async run(request: InvocationRequest): Promise<InvocationOutcome> {
    const { plan, sessionId, signal } = request;
    const limits: TransitionLimits = { toolCount: plan.length, maxAttempts: this.policy.maxAttempts };
    const results: ToolResult[] = [];
    const retryCounts: Record<string, number> = {};
    let executionContext: ExecutionContext = {};
    let lastError = '';
    let state = initialInvocationState(plan.length);

    while (state.phase !== InvocationPhase.SUCCEEDED && state.phase !== InvocationPhase.EXHAUSTED) {
      switch (state.phase) {
        case InvocationPhase.PENDING: {
          const call = plan[state.index];
          const toolName = call.tool.name;
          retryCounts[toolName] = state.attempt;

          this.logger.info('Tool attempt started', {
            event: 'tool_attempt_started',
            sessionId,
            toolName,
            attempt: state.attempt + 1,
            maxAttempts: this.policy.maxAttempts,
          });

          let payload: ToolPayload;
          try {
            payload = await this.attempt(call, request, executionContext);
          } catch (error) {
            if (error instanceof RequestCancelledError) {
              throw error;
            }
            lastError = sanitizeErrorMessage(error instanceof Error ? error.message : String(error));
            retryCounts[toolName] = state.attempt + 1;
            this.logger.warn('Tool attempt failed', {
              event: 'tool_attempt_failed',
              sessionId,
              toolName,
              attempt: state.attempt + 1,
              error: lastError,
            });
            state = transition(state, { type: 'CALL_FAILED' }, limits);
            break;
          }

          executionContext = {
            ...executionContext,
            ...extractContext(payload, call.selection.contextNeeded),
          };
          results.push(
            Object.freeze({
              toolName,
              success: true,
              payload: Object.freeze({ ...payload }),
              attempts: state.attempt + 1,
            })
          );
          this.logger.info('Tool succeeded', {
            event: 'tool_succeeded',
            sessionId,
            toolName,
            attempts: state.attempt + 1,
          });
          state = transition(state, { type: 'CALL_SUCCEEDED' }, limits);
          break;
        }

        case InvocationPhase.RETRYING: {
          const delayMs = computeBackoffDelay(state.attempt, this.policy.backoff);
          this.logger.info('Tool retry scheduled', {
            event: 'tool_retry_scheduled',
            sessionId,
            toolName: plan[state.index].tool.name,
            nextAttempt: state.attempt + 1,
            delayMs,
          });
          await this.sleep(delayMs, signal);
          state = transition(state, { type: 'BACKOFF_ELAPSED' }, limits);
          break;
        }

        case InvocationPhase.ADVANCING:
          state = transition(state, { type: 'ADVANCED' }, limits);
          break;
      }
    }

    if (state.phase === InvocationPhase.EXHAUSTED) {
      const failedTool = plan[state.index].tool.name;
      results.push(
        Object.freeze({
          toolName: failedTool,
          success: false,
          error: lastError,
          attempts: state.attempts,
        })
      );
      this.logger.error('Tool retries exhausted', {
        event: 'tool_exhausted',
        sessionId,
        toolName: failedTool,
        attempts: state.attempts,
        error: lastError,
      });
      return { status: InvocationPhase.EXHAUSTED, results, executionContext, retryCounts, failedTool };
    }

    return { status: InvocationPhase.SUCCEEDED, results, executionContext, retryCounts };
  }

  /**
   * One call to one tool. Resolves with the payload of an `ok` response.
   */
  private async attempt(
    call: PlannedCall,
    request: InvocationRequest,
    executionContext: ExecutionContext
  ): Promise<ToolPayload> {
    const response = await raceWithSignal(
      this.endpoint.invoke(
        call.tool,
        {
          query: request.query,
          parameters: { ...call.selection.parameters },
          callerContext: { ...request.callerContext },
          executionContext: { ...executionContext },
        },
        request.signal
      ),
      request.signal
    );

    if (!response.ok) {
      const detail = typeof response.payload.error === 'string' ? `: ${response.payload.error}` : '';
      throw new ToolInvocationError(call.tool.name, `Tool '${call.tool.name}' reported failure${detail}`);
    }

    return response.payload;
  }
}
