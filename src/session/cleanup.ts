/**
 * Session Cleanup Utilities
 *
 * Periodic eviction of expired sessions.
 */

import { getLogger } from '../monitoring/logger';
import { SessionStore } from './store';

export interface CleanupConfig {
  /**
   * Interval between cleanup runs (milliseconds)
   * Default: 60 seconds
   */
  intervalMs?: number;
}

/**
 * Start automatic session eviction
 *
 * @returns Cleanup interval handle
 */
export function startEvictionInterval(
  store: SessionStore,
  config: CleanupConfig = {}
): NodeJS.Timeout {
  const intervalMs = config.intervalMs || 60 * 1000;
  const logger = getLogger();

  const handle = setInterval(() => {
    store
      .evictExpired()
      .then((evictedCount) => {
        if (evictedCount > 0) {
          logger.info(`Evicted ${evictedCount} expired sessions`, {
            event: 'session_cleanup',
            evictedCount,
          });
        }
      })
      .catch((error: unknown) => {
        logger.error('Error during session cleanup', {
          event: 'session_cleanup_failed',
          error: error instanceof Error ? error.message : String(error),
        });
      });
  }, intervalMs);

  // A pending sweep never keeps the process alive
  handle.unref();
  return handle;
}

export function stopEvictionInterval(intervalHandle: NodeJS.Timeout): void {
  clearInterval(intervalHandle);
}
