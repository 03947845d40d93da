/**
 * Error response formatting utilities.
 * Formats errors for HTTP callers and logs without leaking internal details.
 */

import { ErrorCode, ERROR_CODES, ERROR_MESSAGES } from './codes';
import { OrchestratorError, ValidationError } from './types';

/**
 * Error body returned by the HTTP layer.
 */
export interface ErrorResponse {
  success: false;
  timestamp: string;
  sessionId?: string;
  error: {
    errorCode: ErrorCode;
    errorMessage: string;
    recoverable: boolean;
    issues?: string[];
  };
}

export function formatErrorResponse(error: unknown, sessionId?: string): ErrorResponse {
  let errorCode: ErrorCode = ERROR_CODES.INTERNAL_ERROR;
  let recoverable = false;
  let issues: string[] | undefined;

  if (error instanceof OrchestratorError) {
    errorCode = error.code;
    recoverable = error.recoverable;
  }

  if (error instanceof ValidationError) {
    issues = error.issues.map(sanitizeErrorMessage);
  }

  return {
    success: false,
    timestamp: new Date().toISOString(),
    ...(sessionId ? { sessionId } : {}),
    error: {
      errorCode,
      errorMessage: ERROR_MESSAGES[errorCode],
      recoverable,
      ...(issues ? { issues } : {}),
    },
  };
}

/**
 * Sanitizes an error message before it leaves the service
 * (tool error descriptions, validation issues).
 */
export function sanitizeErrorMessage(message: string): string {
  if (!message || message.trim().length === 0) {
    return 'An error occurred';
  }

  let sanitized = message;

  // Stack frames
  sanitized = sanitized.replace(/at\s+\w+\s*\([^)]*\)/g, '');
  sanitized = sanitized.replace(/at\s+[^\n]+:\d+:\d+/g, '');

  // File paths
  sanitized = sanitized.replace(/\/[a-zA-Z0-9_\-./]+\.(ts|js):\d+/g, '[PATH]');
  sanitized = sanitized.replace(/node_modules[^\s]*/g, '[PATH]');
  sanitized = sanitized.replace(/\/(home|app|src)\/[^\s]+/g, '[PATH]');

  // Credentials
  sanitized = sanitized.replace(/password\s*=\s*[^\s]+/gi, 'password=[REDACTED]');
  sanitized = sanitized.replace(/secret\s*=\s*[^\s]+/gi, 'secret=[REDACTED]');
  sanitized = sanitized.replace(/api[_-]?key\s*=\s*[^\s]+/gi, 'api_key=[REDACTED]');
  sanitized = sanitized.replace(/token\s*=\s*[^\s]+/gi, 'token=[REDACTED]');
  sanitized = sanitized.replace(/AKIA[A-Z0-9]{16}/g, '[AWS_KEY]');

  // Internal addresses
  sanitized = sanitized.replace(/192\.168\.\d+\.\d+/g, '[INTERNAL_IP]');
  sanitized = sanitized.replace(/10\.\d+\.\d+\.\d+/g, '[INTERNAL_IP]');
  sanitized = sanitized.replace(/172\.(1[6-9]|2[0-9]|3[0-1])\.\d+\.\d+/g, '[INTERNAL_IP]');
  sanitized = sanitized.replace(/localhost:\d+/g, '[LOCALHOST]');
  sanitized = sanitized.replace(/127\.0\.0\.1(:\d+)?/g, '[LOCALHOST]');

  sanitized = sanitized.replace(/ECONNREFUSED/g, 'connection refused');
  sanitized = sanitized.replace(/ETIMEDOUT/g, 'connection timed out');
  sanitized = sanitized.replace(/ENOTFOUND/g, 'not found');

  sanitized = sanitized.replace(/\s+/g, ' ').trim();

  if (sanitized.length > 200) {
    sanitized = sanitized.substring(0, 197) + '...';
  }

  if (sanitized.length === 0 || sanitized === '[PATH]' || sanitized === '[REDACTED]') {
    return 'An error occurred';
  }

  return sanitized;
}

/**
 * Structured log fields for an error.
 */
export function createErrorLogEntry(
  error: unknown,
  additionalContext?: Record<string, unknown>
): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return {
      errorCode: ERROR_CODES.INTERNAL_ERROR,
      errorMessage: String(error),
      ...additionalContext,
    };
  }

  const entry: Record<string, unknown> = {
    errorCode: error instanceof OrchestratorError ? error.code : ERROR_CODES.INTERNAL_ERROR,
    errorName: error.name,
    errorMessage: error.message,
  };

  if (error instanceof OrchestratorError) {
    entry.recoverable = error.recoverable;
    if (error.context) {
      entry.errorContext = error.context;
    }
  }

  return { ...entry, ...additionalContext };
}
