/**
 * Property-based tests for confidence routing
 *
 * **Property 1: Every classification maps to exactly one route**
 *
 * For any thresholds low <= high and any confidence in [0, 10], the route is
 * EXECUTE at or above high, CLARIFY in [low, high) and FALLBACK below low,
 * unless the top candidate is a sentinel.
 */

import * as fc from 'fast-check';
import type { SelectedTool } from '../../src/classifier/types';
import { route } from '../../src/routing/confidence-router';
import { FallbackReason, WorkflowRoute } from '../../src/routing/types';
import { candidate } from '../helpers/fakes';

describe('Property 1: Confidence routing', () => {
  const confidenceArb = fc.double({ min: 0, max: 10, noNaN: true });

  const thresholdsArb = fc
    .tuple(confidenceArb, confidenceArb)
    .map(([a, b]) => ({ low: Math.min(a, b), high: Math.max(a, b) }));

  /**
   * Arbitrary for catalog-tool candidates
   */
  const toolCandidateArb: fc.Arbitrary<SelectedTool> = fc
    .tuple(fc.constantFrom('IBTAgent', 'ClaimsAgent', 'DocumentAgent'), confidenceArb)
    .map(([toolName, confidence]) => candidate(toolName, confidence));

  it('should pick the route from the thresholds alone', () => {
    fc.assert(
      fc.property(
        confidenceArb,
        thresholdsArb,
        fc.array(toolCandidateArb, { minLength: 1, maxLength: 5 }),
        (confidence, thresholds, candidates) => {
          const decision = route(confidence, candidates, thresholds);

          if (confidence >= thresholds.high) {
            expect(decision.route).toBe(WorkflowRoute.EXECUTE);
          } else if (confidence >= thresholds.low) {
            expect(decision.route).toBe(WorkflowRoute.CLARIFY);
          } else {
            expect(decision).toMatchObject({
              route: WorkflowRoute.FALLBACK,
              reason: FallbackReason.LOW_CONFIDENCE,
            });
          }
        }
      ),
      { numRuns: 200 }
    );
  });

  it('should always route the highest-confidence candidate', () => {
    fc.assert(
      fc.property(confidenceArb, fc.array(toolCandidateArb, { minLength: 1, maxLength: 5 }), (confidence, candidates) => {
        const decision = route(confidence, candidates);
        const best = Math.max(...candidates.map((c) => c.confidence));

        expect(decision.top?.confidence).toBe(best);
        expect(decision.top).toBe(candidates.find((c) => c.confidence === best));
      }),
      { numRuns: 200 }
    );
  });

  it('should send a NO_TOOL top candidate to no_tool_found at any confidence', () => {
    fc.assert(
      fc.property(confidenceArb, thresholdsArb, (confidence, thresholds) => {
        const decision = route(confidence, [candidate('NO_TOOL', 10), candidate('IBTAgent', 9.9)], thresholds);

        expect(decision).toMatchObject({ route: WorkflowRoute.FALLBACK, reason: FallbackReason.NO_TOOL_FOUND });
      }),
      { numRuns: 100 }
    );
  });

  it('should split exactly at the default thresholds', () => {
    const ibt = [candidate('IBTAgent', 7)];

    expect(route(6.99, ibt).route).toBe(WorkflowRoute.CLARIFY);
    expect(route(7.0, ibt).route).toBe(WorkflowRoute.EXECUTE);
    expect(route(7.01, ibt).route).toBe(WorkflowRoute.EXECUTE);
    expect(route(4.99, ibt).route).toBe(WorkflowRoute.FALLBACK);
    expect(route(5.0, ibt).route).toBe(WorkflowRoute.CLARIFY);
  });
});
