/**
 * Graceful Shutdown Handler
 *
 * Stops accepting connections, waits for in-flight turns to release their
 * session locks, then closes the HTTP server.
 */

import type { Server } from 'http';
import { Logger } from '../monitoring/logger';
import type { SessionStore } from '../session/store';
import { sleep } from '../utils/sleep';

/**
 * Graceful shutdown timeout in milliseconds (30 seconds)
 */
const GRACEFUL_SHUTDOWN_TIMEOUT_MS = 30000;

const IN_FLIGHT_POLL_INTERVAL_MS = 100;

export class ShutdownHandler {
  private shuttingDown: boolean = false;

  constructor(
    private readonly httpServer: Server,
    private readonly sessions: SessionStore,
    private readonly logger: Logger,
    private readonly timeoutMs: number = GRACEFUL_SHUTDOWN_TIMEOUT_MS
  ) {}

  public isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  public async shutdown(): Promise<void> {
    const startTime = Date.now();
    this.shuttingDown = true;

    this.logger.info('Starting graceful shutdown', {
      event: 'shutdown_started',
      inFlightTurns: this.sessions.locks.activeCount,
    });

    const closed = new Promise<void>((resolve, reject) => {
      this.httpServer.close((error) => (error ? reject(error) : resolve()));
    });

    const drained = await this.waitForInFlightTurns(startTime + this.timeoutMs);
    if (!drained) {
      this.logger.warn('Graceful shutdown timeout reached', {
        event: 'shutdown_timeout',
        timeoutMs: this.timeoutMs,
        inFlightTurns: this.sessions.locks.activeCount,
      });
      this.httpServer.closeAllConnections();
    } else {
      this.httpServer.closeIdleConnections();
    }

    await closed;

    this.logger.info('Graceful shutdown completed', {
      event: 'shutdown_completed',
      shutdownTime: Date.now() - startTime,
      withinTimeout: drained,
    });
  }

  private async waitForInFlightTurns(deadline: number): Promise<boolean> {
    while (this.sessions.locks.activeCount > 0) {
      if (Date.now() >= deadline) {
        return false;
      }
      await sleep(IN_FLIGHT_POLL_INTERVAL_MS);
    }
    return true;
  }

  public static getShutdownTimeout(): number {
    return GRACEFUL_SHUTDOWN_TIMEOUT_MS;
  }
}
