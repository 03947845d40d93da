import * as dotenv from 'dotenv';
import * as path from 'path';
import { ConfigError } from '../errors/types';
import { isLogLevel, LogLevel } from '../monitoring/logger';

// Load environment variables from .env file
dotenv.config();

export type ToolMode = 'http' | 'mock';

export interface Config {
  server: {
    port: number;
    logLevel: LogLevel;
    nodeEnv: string;
  };
  bedrock: {
    region: string;
    modelId: string;
    temperature: number;
    maxTokens: number;
    maxAttempts: number;
  };
  routing: {
    highThreshold: number;
    lowThreshold: number;
    maxClarificationRounds: number;
  };
  tools: {
    catalogPath: string;
    mode: ToolMode;
    mockResponsesPath: string;
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
  };
  sessions: {
    ttlSeconds: number;
    maxConversationHistory: number;
    cleanupIntervalSeconds: number;
  };
  timeouts: {
    requestTimeoutMs: number;
  };
}

function getEnvVar(name: string, required: boolean = true, defaultValue?: string): string {
  const value = process.env[name] || defaultValue;

  if (required && !value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }

  return value || '';
}

function getEnvVarAsInt(name: string, required: boolean = true, defaultValue?: number): number {
  const value = process.env[name];

  if (!value) {
    if (required && defaultValue === undefined) {
      throw new ConfigError(`Missing required environment variable: ${name}`);
    }
    return defaultValue || 0;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Environment variable ${name} must be a valid integer, got: ${value}`);
  }

  return parsed;
}

function getEnvVarAsNumber(name: string, defaultValue: number): number {
  const value = process.env[name];

  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Environment variable ${name} must be a valid number, got: ${value}`);
  }

  return parsed;
}

function getToolMode(): ToolMode {
  const mode = getEnvVar('TOOL_MODE', false, 'http').toLowerCase();
  if (mode !== 'http' && mode !== 'mock') {
    throw new ConfigError(`Invalid TOOL_MODE: ${mode}. Must be one of: http, mock`);
  }
  return mode;
}

function getLogLevel(): LogLevel {
  const level = getEnvVar('LOG_LEVEL', false, 'INFO').toUpperCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${level}. Must be one of: DEBUG, INFO, WARN, ERROR`);
  }
  return level;
}

function validateConfig(config: Config): void {
  if (config.server.port < 1 || config.server.port > 65535) {
    throw new ConfigError(`Invalid PORT: ${config.server.port}. Must be between 1 and 65535.`);
  }

  const { highThreshold, lowThreshold } = config.routing;
  for (const [name, value] of [
    ['CONFIDENCE_THRESHOLD_HIGH', highThreshold],
    ['CONFIDENCE_THRESHOLD_LOW', lowThreshold],
  ] as const) {
    if (value < 0 || value > 10) {
      throw new ConfigError(`${name} must be between 0 and 10, got: ${value}`);
    }
  }
  if (lowThreshold > highThreshold) {
    throw new ConfigError('CONFIDENCE_THRESHOLD_LOW must not exceed CONFIDENCE_THRESHOLD_HIGH');
  }

  if (config.routing.maxClarificationRounds < 0) {
    throw new ConfigError('MAX_CLARIFICATION_ROUNDS must be at least 0');
  }

  if (config.bedrock.maxTokens < 1) {
    throw new ConfigError('BEDROCK_MAX_TOKENS must be at least 1');
  }

  if (config.bedrock.maxAttempts < 1) {
    throw new ConfigError('BEDROCK_MAX_ATTEMPTS must be at least 1');
  }

  if (config.tools.maxRetries < 1) {
    throw new ConfigError('TOOL_MAX_RETRIES must be at least 1');
  }

  if (config.tools.timeoutMs < 1) {
    throw new ConfigError('TOOL_TIMEOUT_MS must be at least 1');
  }

  if (config.tools.retryBaseDelayMs < 0 || config.tools.retryMaxDelayMs < 0) {
    throw new ConfigError('TOOL_RETRY_BASE_DELAY_MS and TOOL_RETRY_MAX_DELAY_MS must not be negative');
  }

  if (config.tools.retryBaseDelayMs > config.tools.retryMaxDelayMs) {
    throw new ConfigError('TOOL_RETRY_BASE_DELAY_MS must not exceed TOOL_RETRY_MAX_DELAY_MS');
  }

  if (config.sessions.ttlSeconds < 1) {
    throw new ConfigError('SESSION_TTL_SECONDS must be at least 1');
  }

  if (config.sessions.maxConversationHistory < 1) {
    throw new ConfigError('MAX_CONVERSATION_HISTORY must be at least 1');
  }

  if (config.sessions.cleanupIntervalSeconds < 1) {
    throw new ConfigError('SESSION_CLEANUP_INTERVAL_SECONDS must be at least 1');
  }

  if (config.timeouts.requestTimeoutMs < 1) {
    throw new ConfigError('REQUEST_TIMEOUT_MS must be at least 1');
  }
}

export function loadConfig(): Config {
  const config: Config = {
    server: {
      port: getEnvVarAsInt('PORT', false, 8080),
      logLevel: getLogLevel(),
      nodeEnv: getEnvVar('NODE_ENV', false, 'development'),
    },
    bedrock: {
      region: getEnvVar('AWS_REGION', false, 'us-east-1'),
      modelId: getEnvVar('BEDROCK_MODEL_ID', false, 'us.anthropic.claude-haiku-4-5-20251001-v1:0'),
      temperature: getEnvVarAsNumber('BEDROCK_TEMPERATURE', 0),
      maxTokens: getEnvVarAsInt('BEDROCK_MAX_TOKENS', false, 1024),
      maxAttempts: getEnvVarAsInt('BEDROCK_MAX_ATTEMPTS', false, 3),
    },
    routing: {
      highThreshold: getEnvVarAsNumber('CONFIDENCE_THRESHOLD_HIGH', 7.0),
      lowThreshold: getEnvVarAsNumber('CONFIDENCE_THRESHOLD_LOW', 5.0),
      maxClarificationRounds: getEnvVarAsInt('MAX_CLARIFICATION_ROUNDS', false, 2),
    },
    tools: {
      catalogPath: getEnvVar('TOOL_CATALOG_PATH', false, path.join(process.cwd(), 'config', 'tools.yaml')),
      mode: getToolMode(),
      mockResponsesPath: getEnvVar(
        'MOCK_TOOL_RESPONSES_PATH',
        false,
        path.join(process.cwd(), 'config', 'mock-tool-responses.json')
      ),
      timeoutMs: getEnvVarAsInt('TOOL_TIMEOUT_MS', false, 30000),
      maxRetries: getEnvVarAsInt('TOOL_MAX_RETRIES', false, 3),
      retryBaseDelayMs: getEnvVarAsInt('TOOL_RETRY_BASE_DELAY_MS', false, 250),
      retryMaxDelayMs: getEnvVarAsInt('TOOL_RETRY_MAX_DELAY_MS', false, 4000),
    },
    sessions: {
      ttlSeconds: getEnvVarAsInt('SESSION_TTL_SECONDS', false, 1800),
      maxConversationHistory: getEnvVarAsInt('MAX_CONVERSATION_HISTORY', false, 20),
      cleanupIntervalSeconds: getEnvVarAsInt('SESSION_CLEANUP_INTERVAL_SECONDS', false, 60),
    },
    timeouts: {
      requestTimeoutMs: getEnvVarAsInt('REQUEST_TIMEOUT_MS', false, 60000),
    },
  };

  validateConfig(config);

  return config;
}
