/**
 * Mock tool endpoint for local runs without downstream services.
 * Canned payloads are keyed by tool name.
 */

import * as fs from 'fs';
import { z } from 'zod';
import type { ToolDefinition } from '../catalog/types';
import { ConfigError, RequestCancelledError } from '../errors/types';
import type { ToolCallRequest, ToolCallResponse, ToolEndpoint, ToolPayload } from './types';

const MockResponsesSchema = z.record(z.record(z.unknown()));

export class MockToolEndpoint implements ToolEndpoint {
  private readonly responses: ReadonlyMap<string, ToolPayload>;

  constructor(responses: Record<string, ToolPayload> = {}) {
    this.responses = new Map(Object.entries(responses));
  }

  static fromFile(filePath: string): MockToolEndpoint {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        `Failed to read mock tool responses from ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = MockResponsesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Mock tool responses in ${filePath} must map tool names to objects`);
    }
    return new MockToolEndpoint(parsed.data);
  }

  async invoke(
    tool: ToolDefinition,
    request: ToolCallRequest,
    signal?: AbortSignal
  ): Promise<ToolCallResponse> {
    if (signal?.aborted) {
      throw new RequestCancelledError(`Call to tool '${tool.name}' cancelled`, { toolName: tool.name });
    }

    const canned = this.responses.get(tool.name);
    return {
      ok: true,
      payload: canned
        ? { ...canned }
        : { answer: `${tool.name} received your request: ${request.query}` },
    };
  }
}
