/**
 * Classifier output validation.
 *
 * The model's text is the only untrusted input the core depends on; nothing
 * reaches the router until it passes this schema.
 */

import { z } from 'zod';
import type { ToolCatalog } from '../catalog/catalog';
import { isToolSentinel } from '../catalog/types';
import { ClassificationError } from '../errors/types';
import type { ClassificationResult } from './types';

const ConfidenceSchema = z.number().min(0).max(10);

const CandidateSchema = z.object({
  toolName: z.string().min(1),
  confidence: ConfidenceSchema,
  reasoning: z.string().default(''),
  parameters: z.record(z.unknown()).nullish().transform((v) => v ?? {}),
  dependsOn: z.string().min(1).nullish().transform((v) => v ?? undefined),
  contextNeeded: z.array(z.string().min(1)).nullish().transform((v) => v ?? undefined),
});

const ClassificationSchema = z.object({
  candidates: z.array(CandidateSchema).min(1),
  confidence: ConfidenceSchema,
  directResponse: z.string().nullish().transform((v) => v ?? undefined),
});

/**
 * Extract the outermost JSON object from model text, which may wrap it in
 * prose or a code fence.
 */
export function extractJsonObject(text: string): unknown {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw ClassificationError.malformedResponse('No JSON object found in classifier response', {
      responsePreview: text.substring(0, 200),
    });
  }

  try {
    return JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw ClassificationError.malformedResponse(
      `Classifier response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Validate a decoded classifier payload against the schema and the catalog.
 *
 * @throws ClassificationError (CLASSIFIER_MALFORMED_RESPONSE)
 */
export function parseClassification(raw: unknown, catalog: ToolCatalog): ClassificationResult {
  const parsed = ClassificationSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw ClassificationError.malformedResponse(
      `Classifier response failed validation: ${issues.join('; ')}`,
      { issues }
    );
  }

  const unknownTools = parsed.data.candidates
    .map((candidate) => candidate.toolName)
    .filter((name) => !isToolSentinel(name) && !catalog.has(name));

  if (unknownTools.length > 0) {
    throw ClassificationError.malformedResponse(
      `Classifier selected unknown tools: ${unknownTools.join(', ')}`,
      { unknownTools }
    );
  }

  const candidates = parsed.data.candidates.map((candidate) => ({
    toolName: candidate.toolName,
    confidence: candidate.confidence,
    reasoning: candidate.reasoning,
    parameters: candidate.parameters,
    ...(candidate.dependsOn !== undefined ? { dependsOn: candidate.dependsOn } : {}),
    ...(candidate.contextNeeded !== undefined ? { contextNeeded: candidate.contextNeeded } : {}),
  }));

  return {
    candidates,
    confidence: parsed.data.confidence,
    ...(parsed.data.directResponse !== undefined ? { directResponse: parsed.data.directResponse } : {}),
  };
}
