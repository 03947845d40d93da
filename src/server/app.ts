/**
 * HTTP transport
 *
 *   POST /invocations  run one conversational turn
 *   GET  /ping         liveness
 *   GET  /health       health checks (503 when unhealthy or shutting down)
 */

import express, { ErrorRequestHandler, Express } from 'express';
import { formatErrorResponse } from '../errors/formatter';
import { ValidationError } from '../errors/types';
import { HealthCheck } from '../monitoring/health';
import { getLogger, Logger } from '../monitoring/logger';
import { isPlainObject } from '../utils/validation';
import type { WorkflowEngine } from '../workflow/engine';
import { InboundRequest, validateInvocationRequest } from '../workflow/request-validator';

export interface AppDependencies {
  engine: WorkflowEngine;
  healthCheck: HealthCheck;
  logger?: Logger;
}

export function createApp(deps: AppDependencies): Express {
  const { engine, healthCheck } = deps;
  const logger = deps.logger ?? getLogger();
  const app = express();

  app.use(express.json({ limit: '100kb' }));

  app.get('/ping', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/health', async (req, res) => {
    await healthCheck.handleHealthCheck(req, res);
  });

  app.post('/invocations', async (req, res) => {
    let request: InboundRequest;
    try {
      request = validateInvocationRequest(req.body);
    } catch (error) {
      const body: unknown = req.body;
      const sessionId = isPlainObject(body) && typeof body.sessionId === 'string' ? body.sessionId : undefined;

      logger.warn('Invalid invocation request', {
        event: 'request_rejected',
        sessionId,
        issues: error instanceof ValidationError ? error.issues : undefined,
      });
      res.status(400).json(formatErrorResponse(error, sessionId));
      return;
    }

    try {
      const response = await engine.handle(request);
      res.status(200).json(response);
    } catch (error) {
      logger.error(
        'Invocation failed',
        { event: 'invocation_failed', sessionId: request.sessionId },
        error instanceof Error ? error : undefined
      );
      res.status(500).json(formatErrorResponse(error, request.sessionId));
    }
  });

  // Body parser failures (malformed JSON, oversized body)
  const handleParseError: ErrorRequestHandler = (error, _req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const detail = error instanceof Error ? error.message : String(error);
    logger.warn('Unreadable request body', { event: 'request_body_invalid', error: detail });
    res.status(400).json(formatErrorResponse(new ValidationError(['Request body must be valid JSON'])));
  };
  app.use(handleParseError);

  return app;
}
