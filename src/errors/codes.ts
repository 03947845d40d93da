/**
 * Error codes for the orchestrator.
 * These codes identify specific failure kinds and map to user-facing messages
 * that are safe to return to callers.
 */

export const ERROR_CODES = {
  // Inbound request errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Classifier gateway errors
  CLASSIFIER_UNAVAILABLE: 'CLASSIFIER_UNAVAILABLE',
  CLASSIFIER_MALFORMED_RESPONSE: 'CLASSIFIER_MALFORMED_RESPONSE',

  // Tool invocation errors
  TOOL_EXECUTION_ERROR: 'TOOL_EXECUTION_ERROR',
  TOOL_TIMEOUT: 'TOOL_TIMEOUT',
  TOOL_BAD_RESPONSE: 'TOOL_BAD_RESPONSE',

  // Session errors
  SESSION_CONCURRENT_MODIFICATION: 'SESSION_CONCURRENT_MODIFICATION',

  // Startup errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  CATALOG_INVALID: 'CATALOG_INVALID',

  // General errors
  REQUEST_CANCELLED: 'REQUEST_CANCELLED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ERROR_CODES.VALIDATION_ERROR]:
    'Validation error. Please check your input and try again.',

  [ERROR_CODES.CLASSIFIER_UNAVAILABLE]:
    'The request classifier is unavailable. Please try again in a few moments.',
  [ERROR_CODES.CLASSIFIER_MALFORMED_RESPONSE]:
    'The request classifier returned an unexpected answer. Please try again.',

  [ERROR_CODES.TOOL_EXECUTION_ERROR]:
    'A downstream service failed while processing your request. Please try again.',
  [ERROR_CODES.TOOL_TIMEOUT]:
    'A downstream service timed out. Please try again.',
  [ERROR_CODES.TOOL_BAD_RESPONSE]:
    'A downstream service returned an unexpected answer. Please try again.',

  [ERROR_CODES.SESSION_CONCURRENT_MODIFICATION]:
    'Your conversation was updated by another request. Please send your message again.',

  [ERROR_CODES.CONFIG_INVALID]:
    'The service is misconfigured. Please contact support.',
  [ERROR_CODES.CATALOG_INVALID]:
    'The tool catalog is misconfigured. Please contact support.',

  [ERROR_CODES.REQUEST_CANCELLED]:
    'Request timed out. Please try again.',
  [ERROR_CODES.INTERNAL_ERROR]:
    'An unexpected error occurred. Please try again later.',
};

/**
 * Errors the caller can resolve by retrying the same request.
 */
export const RECOVERABLE_ERRORS: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ERROR_CODES.CLASSIFIER_UNAVAILABLE,
  ERROR_CODES.CLASSIFIER_MALFORMED_RESPONSE,
  ERROR_CODES.TOOL_EXECUTION_ERROR,
  ERROR_CODES.TOOL_TIMEOUT,
  ERROR_CODES.TOOL_BAD_RESPONSE,
  ERROR_CODES.SESSION_CONCURRENT_MODIFICATION,
  ERROR_CODES.REQUEST_CANCELLED,
]);

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ERROR_CODES));

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && KNOWN_CODES.has(value);
}

/**
 * Get the error code from an error object.
 * Returns INTERNAL_ERROR for unknown errors.
 */
export function getErrorCode(error: Error): ErrorCode {
  if ('code' in error && isErrorCode(error.code)) {
    return error.code;
  }
  return ERROR_CODES.INTERNAL_ERROR;
}

export function getUserFriendlyMessage(errorCode: ErrorCode): string {
  return ERROR_MESSAGES[errorCode] || ERROR_MESSAGES[ERROR_CODES.INTERNAL_ERROR];
}
