/**
 * Unit tests for the clarification handler
 */

import {
  buildClarificationQuestion,
  clarificationOptions,
  mergeClarificationAnswer,
} from '../../../src/workflow/clarification';
import { candidate, createTestCatalog } from '../../helpers/fakes';

describe('clarificationOptions', () => {
  it('should keep distinct non-sentinel candidates in classifier order', () => {
    const options = clarificationOptions([
      candidate('ClaimsAgent', 6),
      candidate('NO_TOOL', 5),
      candidate('IBTAgent', 5.5),
      candidate('ClaimsAgent', 4),
    ]);

    expect(options.map((option) => option.toolName)).toEqual(['ClaimsAgent', 'IBTAgent']);
  });

  it('should offer at most three options', () => {
    const options = clarificationOptions([
      candidate('IBTAgent', 6),
      candidate('ClaimsAgent', 6),
      candidate('DocumentAgent', 6),
      candidate('SupportAgent', 6),
    ]);

    expect(options).toHaveLength(3);
  });
});

describe('buildClarificationQuestion', () => {
  it('should name each option by its catalog description', () => {
    const question = buildClarificationQuestion(
      [candidate('IBTAgent', 6), candidate('ClaimsAgent', 5.5)],
      createTestCatalog()
    );

    expect(question).toBe(
      'I want to make sure I send your question to the right place. ' +
        'Are you asking about: 1) Answers questions about insurance benefits and coverage (IBTAgent); ' +
        '2) Looks up claim status and history (ClaimsAgent)? Please reply with a bit more detail.'
    );
  });
});

describe('mergeClarificationAnswer', () => {
  it('should append the answer to the pending query', () => {
    expect(mergeClarificationAnswer('What about my coverage?', 'dental')).toBe(
      'What about my coverage?\nAdditional detail from the user: dental'
    );
  });
});
