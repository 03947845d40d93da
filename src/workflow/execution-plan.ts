/**
 * Execution plan for an EXECUTE turn.
 *
 * Every non-sentinel candidate at or above the high threshold runs, in
 * classifier order, stably reordered so a tool follows the tool it depends on.
 */

import type { ToolCatalog } from '../catalog/catalog';
import { isToolSentinel } from '../catalog/types';
import type { SelectedTool } from '../classifier/types';
import { ClassificationError } from '../errors/types';
import type { PlannedCall } from '../tools/invocation-engine';

/**
 * @throws ClassificationError (CLASSIFIER_MALFORMED_RESPONSE) for a dependency
 * outside the plan, a dependency cycle or an unknown tool
 */
export function buildExecutionPlan(
  candidates: readonly SelectedTool[],
  top: SelectedTool,
  highThreshold: number,
  catalog: ToolCatalog
): PlannedCall[] {
  const seen = new Set<string>();
  const calls: PlannedCall[] = [];

  for (const candidate of candidates) {
    const eligible = candidate === top || candidate.confidence >= highThreshold;
    if (!eligible || isToolSentinel(candidate.toolName) || seen.has(candidate.toolName)) {
      continue;
    }

    const tool = catalog.lookup(candidate.toolName);
    if (!tool) {
      throw ClassificationError.malformedResponse(`Unknown tool in plan: ${candidate.toolName}`);
    }

    seen.add(candidate.toolName);
    calls.push({ tool, selection: candidate });
  }

  for (const call of calls) {
    const dependency = call.selection.dependsOn;
    if (dependency !== undefined && (dependency === call.tool.name || !seen.has(dependency))) {
      throw ClassificationError.malformedResponse(
        `Tool '${call.tool.name}' depends on '${dependency}', which is not in the plan`,
        { toolName: call.tool.name, dependsOn: dependency }
      );
    }
  }

  return orderByDependency(calls);
}

function orderByDependency(calls: readonly PlannedCall[]): PlannedCall[] {
  const ordered: PlannedCall[] = [];
  const placed = new Set<string>();
  const remaining = [...calls];

  while (remaining.length > 0) {
    const nextIndex = remaining.findIndex((call) => {
      const dependency = call.selection.dependsOn;
      return dependency === undefined || placed.has(dependency);
    });

    if (nextIndex === -1) {
      throw ClassificationError.malformedResponse(
        `Dependency cycle between tools: ${remaining.map((call) => call.tool.name).join(', ')}`
      );
    }

    const [next] = remaining.splice(nextIndex, 1);
    ordered.push(next);
    placed.add(next.tool.name);
  }

  return ordered;
}
