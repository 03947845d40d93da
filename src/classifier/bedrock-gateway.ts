/**
 * Bedrock Classifier Gateway
 *
 * Asks a Bedrock model (Converse API) to rank catalog tools for a query.
 * The model's wire format never leaves this module.
 */

import { BedrockRuntimeClient, ConverseCommand } from '@aws-sdk/client-bedrock-runtime';
import type { Message } from '@aws-sdk/client-bedrock-runtime';
import type { ToolCatalog } from '../catalog/catalog';
import { ClassificationError } from '../errors/types';
import { getLogger, Logger } from '../monitoring/logger';
import type { ConversationTurn } from '../session/types';
import { buildClassifierSystemPrompt } from './prompt';
import { extractJsonObject, parseClassification } from './schema';
import type { ClassificationResult, ClassifierGateway } from './types';

export interface BedrockGatewayOptions {
  region: string;
  modelId: string;
  temperature: number;
  maxTokens: number;
  /** SDK-level attempts for throttling and transient network errors */
  maxAttempts: number;
}

/**
 * Converse requires alternating roles starting with a user message, so the
 * history is trimmed of leading assistant turns and same-role runs are merged.
 */
export function buildConverseMessages(
  history: readonly ConversationTurn[],
  query: string
): Message[] {
  const messages: Message[] = [];
  const turns = [...history, { role: 'user' as const, text: query }];

  for (const turn of turns) {
    if (messages.length === 0 && turn.role !== 'user') {
      continue;
    }

    const previous = messages[messages.length - 1];
    if (previous && previous.role === turn.role) {
      previous.content = [...(previous.content ?? []), { text: turn.text }];
      continue;
    }

    messages.push({ role: turn.role, content: [{ text: turn.text }] });
  }

  return messages;
}

export class BedrockClassifierGateway implements ClassifierGateway {
  private readonly client: BedrockRuntimeClient;
  private readonly logger: Logger;

  constructor(
    private readonly options: BedrockGatewayOptions,
    client?: BedrockRuntimeClient,
    logger?: Logger
  ) {
    this.client =
      client ??
      new BedrockRuntimeClient({
        region: options.region,
        maxAttempts: options.maxAttempts,
      });
    this.logger = logger ?? getLogger();
  }

  async classify(
    query: string,
    history: readonly ConversationTurn[],
    catalog: ToolCatalog,
    signal?: AbortSignal
  ): Promise<ClassificationResult> {
    if (signal?.aborted) {
      throw ClassificationError.serviceUnavailable('Classification cancelled before start');
    }

    const startTime = Date.now();
    const command = new ConverseCommand({
      modelId: this.options.modelId,
      system: [{ text: buildClassifierSystemPrompt(catalog) }],
      messages: buildConverseMessages(history, query),
      inferenceConfig: {
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
      },
    });

    let responseText: string;
    try {
      const response = await this.client.send(command, { abortSignal: signal });
      responseText = (response.output?.message?.content ?? [])
        .map((block) => block.text ?? '')
        .join('');

      this.logger.debug('Classifier response received', {
        event: 'classifier_response',
        modelId: this.options.modelId,
        durationMs: Date.now() - startTime,
        stopReason: response.stopReason,
        responseLength: responseText.length,
      });
    } catch (error) {
      const errorName = error instanceof Error ? error.name : 'UnknownError';
      this.logger.warn('Classifier call failed', {
        event: 'classifier_unavailable',
        modelId: this.options.modelId,
        durationMs: Date.now() - startTime,
        errorName,
        error: error instanceof Error ? error.message : String(error),
      });
      throw ClassificationError.serviceUnavailable(
        `Bedrock model ${this.options.modelId} could not be reached (${errorName})`,
        { errorName }
      );
    }

    if (!responseText.trim()) {
      throw ClassificationError.malformedResponse('Empty response from classifier model');
    }

    return parseClassification(extractJsonObject(responseText), catalog);
  }
}
