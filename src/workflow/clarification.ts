/**
 * Clarification Handler
 *
 * Builds the disambiguation question for a CLARIFY turn and folds the user's
 * answer back into the original query on the next turn.
 */

import type { ToolCatalog } from '../catalog/catalog';
import { isToolSentinel } from '../catalog/types';
import type { SelectedTool } from '../classifier/types';

export const MAX_CLARIFICATION_OPTIONS = 3;

/**
 * Distinct non-sentinel candidates in classifier order, at most three
 */
export function clarificationOptions(candidates: readonly SelectedTool[]): SelectedTool[] {
  const seen = new Set<string>();
  const options: SelectedTool[] = [];

  for (const candidate of candidates) {
    if (isToolSentinel(candidate.toolName) || seen.has(candidate.toolName)) {
      continue;
    }
    seen.add(candidate.toolName);
    options.push(candidate);
    if (options.length === MAX_CLARIFICATION_OPTIONS) {
      break;
    }
  }

  return options;
}

export function buildClarificationQuestion(
  candidates: readonly SelectedTool[],
  catalog: ToolCatalog
): string {
  const options = clarificationOptions(candidates).map((candidate, index) => {
    const description = catalog.lookup(candidate.toolName)?.description.trim().replace(/\.+$/, '');
    return description
      ? `${index + 1}) ${description} (${candidate.toolName})`
      : `${index + 1}) ${candidate.toolName}`;
  });

  return (
    'I want to make sure I send your question to the right place. ' +
    `Are you asking about: ${options.join('; ')}? Please reply with a bit more detail.`
  );
}

/**
 * Query classified on the turn after a clarification question
 */
export function mergeClarificationAnswer(pendingQuery: string, answer: string): string {
  return `${pendingQuery}\nAdditional detail from the user: ${answer}`;
}
