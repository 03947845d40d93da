/**
 * Inbound request validation
 *
 * Runs before the workflow graph. A request that fails here never touches
 * session state.
 */

import { ValidationError } from '../errors/types';
import { isNonEmptyString, isPlainObject, stripControlCharacters } from '../utils/validation';

export const MAX_QUERY_LENGTH = 4000;
export const MAX_SESSION_ID_LENGTH = 128;
export const MAX_CONTEXT_KEYS = 50;

const SESSION_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

export interface InboundRequest {
  query: string;
  sessionId: string;
  context: Record<string, string>;
}

/**
 * Validate and normalize an invocation body.
 * `userPrompt` is accepted when `query` is absent.
 *
 * @throws ValidationError listing every problem found
 */
export function validateInvocationRequest(body: unknown): InboundRequest {
  if (!isPlainObject(body)) {
    throw new ValidationError(['Request body must be a JSON object']);
  }

  const issues: string[] = [];
  const rawQuery = body.query !== undefined ? body.query : body.userPrompt;

  let query = '';
  if (typeof rawQuery !== 'string') {
    issues.push('query is required and must be a string');
  } else {
    query = stripControlCharacters(rawQuery).trim();
    if (query.length === 0) {
      issues.push('query must not be empty');
    } else if (query.length > MAX_QUERY_LENGTH) {
      issues.push(`query must be at most ${MAX_QUERY_LENGTH} characters`);
    }
  }

  const sessionId = body.sessionId;
  if (!isNonEmptyString(sessionId)) {
    issues.push('sessionId is required and must be a non-empty string');
  } else if (sessionId.length > MAX_SESSION_ID_LENGTH) {
    issues.push(`sessionId must be at most ${MAX_SESSION_ID_LENGTH} characters`);
  } else if (!SESSION_ID_PATTERN.test(sessionId)) {
    issues.push('sessionId may only contain letters, digits, ".", "_", ":" and "-"');
  }

  const context: Record<string, string> = {};
  if (body.context !== undefined && body.context !== null) {
    if (!isPlainObject(body.context)) {
      issues.push('context must be an object of string values');
    } else {
      const entries = Object.entries(body.context);
      if (entries.length > MAX_CONTEXT_KEYS) {
        issues.push(`context must have at most ${MAX_CONTEXT_KEYS} keys`);
      }
      for (const [key, value] of entries) {
        if (typeof value !== 'string') {
          issues.push(`context.${key} must be a string`);
        } else {
          context[key] = value;
        }
      }
    }
  }

  if (issues.length > 0 || !isNonEmptyString(sessionId)) {
    throw new ValidationError(issues);
  }

  return { query, sessionId, context };
}
