/**
 * Unit tests for the response composer
 */

import { FallbackReason, WorkflowRoute } from '../../../src/routing/types';
import type { ToolResult } from '../../../src/tools/types';
import { composeResponse, renderToolResults } from '../../../src/workflow/response-composer';
import { createWorkflowState, WorkflowState } from '../../../src/workflow/state';
import { candidate } from '../../helpers/fakes';

const STARTED_AT = Date.UTC(2024, 0, 1, 12, 0, 0);

function state(overrides: Partial<WorkflowState> = {}): WorkflowState {
  return {
    ...createWorkflowState({
      turnId: 'turn-1',
      sessionId: 'session-1',
      query: 'What are my dental benefits?',
      callerContext: {},
      startedAt: STARTED_AT,
    }),
    ...overrides,
  };
}

function success(toolName: string, payload: Record<string, unknown>): ToolResult {
  return { toolName, success: true, payload, attempts: 1 };
}

describe('renderToolResults', () => {
  it('should use the first text field present', () => {
    expect(renderToolResults([success('IBTAgent', { message: 'second', answer: ' first ' })])).toBe('first');
    expect(renderToolResults([success('IBTAgent', { text: 'from text', message: 'from message' })])).toBe('from text');
  });

  it('should fall back to the JSON payload', () => {
    expect(renderToolResults([success('IBTAgent', { planId: 'PLAN-7', answer: '' })])).toBe(
      '{"planId":"PLAN-7","answer":""}'
    );
  });

  it('should join several tools with a blank line and skip failures', () => {
    const results: ToolResult[] = [
      success('IBTAgent', { answer: 'Gold plan' }),
      { toolName: 'DocumentAgent', success: false, error: 'down', attempts: 3 },
      success('ClaimsAgent', { response: 'Claim approved' }),
    ];

    expect(renderToolResults(results)).toBe('Gold plan\n\nClaim approved');
  });
});

describe('composeResponse', () => {
  it('should build an execute response', () => {
    const ibt = candidate('IBTAgent', 9);
    const results = [success('IBTAgent', { answer: 'Covered' })];

    const response = composeResponse(
      state({
        route: WorkflowRoute.EXECUTE,
        selectedTools: [ibt],
        confidence: 9,
        responseText: 'Covered',
        toolResults: results,
      }),
      STARTED_AT + 250
    );

    expect(response).toEqual({
      success: true,
      sessionId: 'session-1',
      route: WorkflowRoute.EXECUTE,
      selectedTool: [ibt],
      confidence: 9,
      responseText: 'Covered',
      awaitingClarification: false,
      toolResults: results,
      executionTimeMs: 250,
      timestamp: '2024-01-01T12:00:00.250Z',
    });
  });

  it('should include the reason code on fallback only', () => {
    const fallback = composeResponse(
      state({ route: WorkflowRoute.FALLBACK, reasonCode: FallbackReason.LOW_CONFIDENCE }),
      STARTED_AT
    );
    const clarify = composeResponse(
      state({ route: WorkflowRoute.CLARIFY, reasonCode: FallbackReason.LOW_CONFIDENCE }),
      STARTED_AT
    );

    expect(fallback.reasonCode).toBe(FallbackReason.LOW_CONFIDENCE);
    expect('reasonCode' in clarify).toBe(false);
  });

  it('should report an unrouted state as a fallback', () => {
    expect(composeResponse(state(), STARTED_AT).route).toBe(WorkflowRoute.FALLBACK);
  });

  it('should never report a negative execution time', () => {
    expect(composeResponse(state(), STARTED_AT - 10).executionTimeMs).toBe(0);
  });

  it('should copy the selected tools', () => {
    const ibt = candidate('IBTAgent', 9);
    const response = composeResponse(state({ selectedTools: [ibt] }), STARTED_AT);

    response.selectedTool[0].confidence = 1;

    expect(ibt.confidence).toBe(9);
  });
});
