/**
 * Unit tests for classifier output validation
 */

import { extractJsonObject, parseClassification } from '../../../src/classifier/schema';
import { ERROR_CODES } from '../../../src/errors/codes';
import { ClassificationError } from '../../../src/errors/types';
import { createTestCatalog } from '../../helpers/fakes';

describe('extractJsonObject', () => {
  it('should find JSON wrapped in prose and a code fence', () => {
    const text = 'Sure, here is my answer:\n```json\n{"confidence": 9, "candidates": []}\n```';

    expect(extractJsonObject(text)).toEqual({ confidence: 9, candidates: [] });
  });

  it('should reject text without an object', () => {
    expect(() => extractJsonObject('I cannot help with that.')).toThrow(
      'No JSON object found in classifier response'
    );
  });

  it('should reject an object that does not parse', () => {
    expect(() => extractJsonObject('{toolName: IBTAgent}')).toThrow(/^Classifier response is not valid JSON: /);
  });
});

describe('parseClassification', () => {
  const catalog = createTestCatalog();

  it('should fill defaults for optional candidate fields', () => {
    const result = parseClassification(
      { candidates: [{ toolName: 'IBTAgent', confidence: 9 }], confidence: 9 },
      catalog
    );

    expect(result).toEqual({
      candidates: [{ toolName: 'IBTAgent', confidence: 9, reasoning: '', parameters: {} }],
      confidence: 9,
    });
  });

  it('should keep dependencies, context fields and parameters', () => {
    const result = parseClassification(
      {
        candidates: [
          {
            toolName: 'IBTAgent',
            confidence: 9,
            reasoning: 'plan lookup',
            parameters: { planId: 'PLAN-7' },
            dependsOn: null,
            contextNeeded: ['planId'],
          },
          { toolName: 'ClaimsAgent', confidence: 8, reasoning: 'claims', dependsOn: 'IBTAgent' },
        ],
        confidence: 9,
      },
      catalog
    );

    expect(result.candidates).toEqual([
      {
        toolName: 'IBTAgent',
        confidence: 9,
        reasoning: 'plan lookup',
        parameters: { planId: 'PLAN-7' },
        contextNeeded: ['planId'],
      },
      { toolName: 'ClaimsAgent', confidence: 8, reasoning: 'claims', parameters: {}, dependsOn: 'IBTAgent' },
    ]);
  });

  it('should accept sentinels and a direct response', () => {
    const result = parseClassification(
      {
        candidates: [{ toolName: 'CONVERSATIONAL', confidence: 10 }],
        confidence: 10,
        directResponse: 'Hi there!',
      },
      catalog
    );

    expect(result.directResponse).toBe('Hi there!');
    expect(result.candidates[0].toolName).toBe('CONVERSATIONAL');
  });

  it('should reject tools missing from the catalog', () => {
    expect(() =>
      parseClassification(
        {
          candidates: [
            { toolName: 'BillingAgent', confidence: 9 },
            { toolName: 'IBTAgent', confidence: 5 },
          ],
          confidence: 9,
        },
        catalog
      )
    ).toThrow('Classifier selected unknown tools: BillingAgent');
  });

  it('should reject confidence outside 0-10', () => {
    expect(() =>
      parseClassification({ candidates: [{ toolName: 'IBTAgent', confidence: 9 }], confidence: 11 }, catalog)
    ).toThrow(/^Classifier response failed validation: confidence: /);
  });

  it('should reject an empty candidate list', () => {
    expect(() => parseClassification({ candidates: [], confidence: 9 }, catalog)).toThrow(
      /^Classifier response failed validation: candidates: /
    );
  });

  it('should raise a malformed-response error', () => {
    let caught: unknown;
    try {
      parseClassification({ confidence: 'high' }, catalog);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ClassificationError);
    expect(caught).toMatchObject({ code: ERROR_CODES.CLASSIFIER_MALFORMED_RESPONSE, isMalformedResponse: true });
  });
});
