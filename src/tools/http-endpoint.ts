/**
 * HTTP tool endpoint
 *
 * POSTs the tool request as JSON to the endpoint named in the catalog.
 */

import { z } from 'zod';
import type { ToolDefinition } from '../catalog/types';
import { ERROR_CODES } from '../errors/codes';
import { RequestCancelledError, ToolInvocationError } from '../errors/types';
import { getLogger, Logger } from '../monitoring/logger';
import { linkSignals, TimeoutSignalReason } from '../utils/abort';
import type { ToolCallRequest, ToolCallResponse, ToolEndpoint } from './types';

const ToolResponseSchema = z.object({
  ok: z.boolean(),
  payload: z.record(z.unknown()).nullish().transform((v) => v ?? {}),
});

export interface HttpToolEndpointOptions {
  /** Per-call timeout (milliseconds) */
  timeoutMs: number;
}

export class HttpToolEndpoint implements ToolEndpoint {
  private readonly logger: Logger;

  constructor(private readonly options: HttpToolEndpointOptions, logger?: Logger) {
    this.logger = logger ?? getLogger();
  }

  async invoke(
    tool: ToolDefinition,
    request: ToolCallRequest,
    signal?: AbortSignal
  ): Promise<ToolCallResponse> {
    const linked = linkSignals([signal], this.options.timeoutMs);
    const startTime = Date.now();

    try {
      let body: string;
      let status: number;
      try {
        const response = await fetch(tool.endpoint, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
          body: JSON.stringify(request),
          signal: linked.signal,
        });
        status = response.status;
        body = await response.text();
      } catch (error) {
        throw this.mapTransportError(tool.name, error, linked.signal, signal);
      }

      this.logger.debug('Tool endpoint responded', {
        event: 'tool_http_response',
        toolName: tool.name,
        status,
        durationMs: Date.now() - startTime,
      });

      if (status < 200 || status >= 300) {
        throw new ToolInvocationError(
          tool.name,
          `Tool '${tool.name}' returned HTTP ${status}`,
          ERROR_CODES.TOOL_EXECUTION_ERROR,
          { status }
        );
      }

      let decoded: unknown;
      try {
        decoded = JSON.parse(body);
      } catch {
        throw ToolInvocationError.badResponse(tool.name, 'body is not valid JSON');
      }

      const parsed = ToolResponseSchema.safeParse(decoded);
      if (!parsed.success) {
        throw ToolInvocationError.badResponse(
          tool.name,
          parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
        );
      }

      return parsed.data;
    } finally {
      linked.dispose();
    }
  }

  private mapTransportError(
    toolName: string,
    error: unknown,
    linkedSignal: AbortSignal,
    requestSignal?: AbortSignal
  ): Error {
    if (requestSignal?.aborted) {
      return new RequestCancelledError(`Call to tool '${toolName}' cancelled`, { toolName });
    }

    if (linkedSignal.aborted && linkedSignal.reason instanceof TimeoutSignalReason) {
      return ToolInvocationError.timeout(toolName, this.options.timeoutMs);
    }

    return new ToolInvocationError(
      toolName,
      `Tool '${toolName}' request failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
