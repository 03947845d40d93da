/**
 * Custom error types for the orchestrator.
 */

import { ErrorCode, ERROR_CODES, RECOVERABLE_ERRORS } from './codes';

export type ErrorContext = Record<string, unknown>;

/**
 * Base error class for all orchestrator errors.
 */
export class OrchestratorError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly context?: ErrorContext;

  constructor(
    code: ErrorCode,
    message: string,
    recoverable?: boolean,
    context?: ErrorContext
  ) {
    super(message);
    this.name = 'OrchestratorError';
    this.code = code;
    this.recoverable = recoverable ?? RECOVERABLE_ERRORS.has(code);
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed inbound request. Rejected before the workflow starts.
 */
export class ValidationError extends OrchestratorError {
  public readonly issues: string[];

  constructor(issues: string[], context?: ErrorContext) {
    super(
      ERROR_CODES.VALIDATION_ERROR,
      `Invalid request: ${issues.join('; ')}`,
      false,
      context
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Classifier gateway failure.
 *
 * `CLASSIFIER_UNAVAILABLE` covers an unreachable or timed-out oracle,
 * `CLASSIFIER_MALFORMED_RESPONSE` covers output that fails schema validation.
 */
export class ClassificationError extends OrchestratorError {
  constructor(
    message: string,
    code: ErrorCode = ERROR_CODES.CLASSIFIER_UNAVAILABLE,
    context?: ErrorContext
  ) {
    super(code, message, true, context);
    this.name = 'ClassificationError';
  }

  static serviceUnavailable(message: string, context?: ErrorContext): ClassificationError {
    return new ClassificationError(message, ERROR_CODES.CLASSIFIER_UNAVAILABLE, context);
  }

  static malformedResponse(message: string, context?: ErrorContext): ClassificationError {
    return new ClassificationError(message, ERROR_CODES.CLASSIFIER_MALFORMED_RESPONSE, context);
  }

  get isMalformedResponse(): boolean {
    return this.code === ERROR_CODES.CLASSIFIER_MALFORMED_RESPONSE;
  }
}

/**
 * A single failed tool call attempt.
 */
export class ToolInvocationError extends OrchestratorError {
  public readonly toolName: string;

  constructor(
    toolName: string,
    message: string,
    code: ErrorCode = ERROR_CODES.TOOL_EXECUTION_ERROR,
    context?: ErrorContext
  ) {
    super(code, message, true, { toolName, ...context });
    this.name = 'ToolInvocationError';
    this.toolName = toolName;
  }

  static timeout(toolName: string, timeoutMs: number): ToolInvocationError {
    return new ToolInvocationError(
      toolName,
      `Tool '${toolName}' timed out after ${timeoutMs}ms`,
      ERROR_CODES.TOOL_TIMEOUT,
      { timeoutMs }
    );
  }

  static badResponse(toolName: string, detail: string): ToolInvocationError {
    return new ToolInvocationError(
      toolName,
      `Tool '${toolName}' returned an invalid response: ${detail}`,
      ERROR_CODES.TOOL_BAD_RESPONSE
    );
  }
}

/**
 * The session was evicted or recreated between read and write.
 */
export class ConcurrentModificationError extends OrchestratorError {
  public readonly sessionId: string;

  constructor(sessionId: string, message?: string) {
    super(
      ERROR_CODES.SESSION_CONCURRENT_MODIFICATION,
      message ?? `Session '${sessionId}' was modified or evicted during the turn`,
      true,
      { sessionId }
    );
    this.name = 'ConcurrentModificationError';
    this.sessionId = sessionId;
  }
}

/**
 * Invalid configuration or tool catalog. Fatal at startup.
 */
export class ConfigError extends OrchestratorError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.CONFIG_INVALID, context?: ErrorContext) {
    super(code, message, false, context);
    this.name = 'ConfigError';
  }
}

/**
 * The turn was cancelled by the request-level timeout.
 */
export class RequestCancelledError extends OrchestratorError {
  constructor(message: string = 'Request cancelled', context?: ErrorContext) {
    super(ERROR_CODES.REQUEST_CANCELLED, message, true, context);
    this.name = 'RequestCancelledError';
  }
}
