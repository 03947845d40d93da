import { createServer, Server } from 'http';
import { loadCatalogFromFile } from '../catalog/loader';
import { BedrockClassifierGateway } from '../classifier/bedrock-gateway';
import { HealthCheck } from '../monitoring/health';
import { createLogger } from '../monitoring/logger';
import { startEvictionInterval, stopEvictionInterval } from '../session/cleanup';
import { InMemorySessionStorage } from '../session/storage';
import { SessionStore } from '../session/store';
import { HttpToolEndpoint } from '../tools/http-endpoint';
import { ToolInvocationEngine } from '../tools/invocation-engine';
import { MockToolEndpoint } from '../tools/mock-endpoint';
import type { ToolEndpoint } from '../tools/types';
import { WorkflowEngine } from '../workflow/engine';
import { createApp } from './app';
import { loadConfig } from './config';
import { ShutdownHandler } from './shutdown';

let httpServer: Server | undefined;
let shutdownHandler: ShutdownHandler | undefined;
let healthCheck: HealthCheck | undefined;
let evictionHandle: NodeJS.Timeout | undefined;

async function main(): Promise<void> {
  // Fatal on invalid configuration or catalog
  const config = loadConfig();

  const logger = createLogger(config.server.logLevel);

  logger.info('Intent orchestrator starting...', {
    event: 'server_starting',
  });

  logger.info('Configuration validated successfully', {
    event: 'config_loaded',
    region: config.bedrock.region,
    port: config.server.port,
    modelId: config.bedrock.modelId,
    toolMode: config.tools.mode,
  });

  const catalog = loadCatalogFromFile(config.tools.catalogPath);

  const sessions = new SessionStore(
    {
      ttlMs: config.sessions.ttlSeconds * 1000,
      maxHistory: config.sessions.maxConversationHistory,
    },
    new InMemorySessionStorage(),
    logger
  );
  evictionHandle = startEvictionInterval(sessions, {
    intervalMs: config.sessions.cleanupIntervalSeconds * 1000,
  });

  const classifier = new BedrockClassifierGateway(
    {
      region: config.bedrock.region,
      modelId: config.bedrock.modelId,
      temperature: config.bedrock.temperature,
      maxTokens: config.bedrock.maxTokens,
      maxAttempts: config.bedrock.maxAttempts,
    },
    undefined,
    logger
  );

  const endpoint: ToolEndpoint =
    config.tools.mode === 'mock'
      ? MockToolEndpoint.fromFile(config.tools.mockResponsesPath)
      : new HttpToolEndpoint({ timeoutMs: config.tools.timeoutMs }, logger);

  const invoker = new ToolInvocationEngine(
    endpoint,
    {
      maxAttempts: config.tools.maxRetries,
      backoff: {
        baseDelayMs: config.tools.retryBaseDelayMs,
        maxDelayMs: config.tools.retryMaxDelayMs,
      },
    },
    logger
  );

  const engine = new WorkflowEngine({
    catalog,
    sessions,
    classifier,
    invoker,
    config: {
      thresholds: {
        high: config.routing.highThreshold,
        low: config.routing.lowThreshold,
      },
      maxClarificationRounds: config.routing.maxClarificationRounds,
      requestTimeoutMs: config.timeouts.requestTimeoutMs,
    },
    logger,
  });

  const health = new HealthCheck(
    () => sessions.getSessionCount(),
    () => catalog.size
  );
  healthCheck = health;

  const app = createApp({ engine, healthCheck: health, logger });
  const server = createServer(app);
  httpServer = server;
  shutdownHandler = new ShutdownHandler(server, sessions, logger);

  await new Promise<void>((resolve) => {
    server.listen(config.server.port, () => {
      logger.info('Intent orchestrator started successfully', {
        event: 'server_started',
        port: config.server.port,
        catalogTools: catalog.names(),
      });
      resolve();
    });
  });
}

async function shutdown(signal: string): Promise<void> {
  const logger = createLogger();
  logger.info(`${signal} received, shutting down gracefully...`, {
    event: 'shutdown_initiated',
    signal,
  });

  try {
    if (evictionHandle) {
      stopEvictionInterval(evictionHandle);
    }

    if (healthCheck) {
      healthCheck.markShuttingDown();
    }

    if (shutdownHandler && httpServer?.listening) {
      await shutdownHandler.shutdown();
    }

    logger.info('Graceful shutdown complete', {
      event: 'shutdown_complete',
    });
    process.exit(0);
  } catch (error) {
    logger.error(
      'Error during shutdown',
      { event: 'shutdown_error' },
      error instanceof Error ? error : undefined
    );
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

main().catch((error: unknown) => {
  createLogger().error(
    'Failed to start server',
    { event: 'server_start_failed', error: error instanceof Error ? error.message : String(error) },
    error instanceof Error ? error : undefined
  );
  process.exit(1);
});
