import { Request, Response } from 'express';
import { getLogger } from './logger';

const logger = getLogger();

export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  activeSessions: number;
  catalogTools: number;
  checks: {
    [key: string]: {
      status: 'pass' | 'fail';
      message?: string;
    };
  };
}

export class HealthCheck {
  private isShuttingDown: boolean = false;
  private healthChecks: Map<string, () => Promise<boolean>> = new Map();
  private getActiveSessionsCount: () => number | Promise<number>;
  private getCatalogToolCount: () => number;

  constructor(
    getActiveSessionsCount: () => number | Promise<number> = () => 0,
    getCatalogToolCount: () => number = () => 0
  ) {
    this.getActiveSessionsCount = getActiveSessionsCount;
    this.getCatalogToolCount = getCatalogToolCount;

    this.registerCheck('server', async () => true);
    this.registerCheck('catalog', async () => this.getCatalogToolCount() > 0);
  }

  registerCheck(name: string, checkFn: () => Promise<boolean>): void {
    this.healthChecks.set(name, checkFn);
    logger.debug(`Health check registered: ${name}`);
  }

  markShuttingDown(): void {
    this.isShuttingDown = true;
    logger.info('Service marked as shutting down', { event: 'service_shutting_down' });
  }

  isServiceShuttingDown(): boolean {
    return this.isShuttingDown;
  }

  async performHealthChecks(): Promise<HealthCheckResult> {
    const activeSessionsCount = await Promise.resolve(this.getActiveSessionsCount());

    const result: HealthCheckResult = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      activeSessions: activeSessionsCount,
      catalogTools: this.getCatalogToolCount(),
      checks: {},
    };

    // If shutting down, return unhealthy immediately
    if (this.isShuttingDown) {
      result.status = 'unhealthy';
      result.checks.shutdown = {
        status: 'fail',
        message: 'Service is shutting down',
      };
      return result;
    }

    for (const [name, checkFn] of this.healthChecks.entries()) {
      try {
        const passed = await checkFn();
        result.checks[name] = {
          status: passed ? 'pass' : 'fail',
        };

        if (!passed) {
          result.status = 'unhealthy';
        }
      } catch (error) {
        result.checks[name] = {
          status: 'fail',
          message: error instanceof Error ? error.message : 'Unknown error',
        };
        result.status = 'unhealthy';

        logger.error(
          `Health check failed: ${name}`,
          { event: 'health_check_failed', checkName: name },
          error instanceof Error ? error : undefined
        );
      }
    }

    return result;
  }

  /**
   * Express handler for the health check endpoint
   */
  async handleHealthCheck(_req: Request, res: Response): Promise<void> {
    const result = await this.performHealthChecks();

    const statusCode = result.status === 'healthy' ? 200 : 503;

    res.status(statusCode).json(result);

    logger.debug('Health check performed', {
      event: 'health_check',
      status: result.status,
      statusCode,
    });
  }
}

export default HealthCheck;
