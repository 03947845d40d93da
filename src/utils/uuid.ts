/**
 * UUID generation utilities
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generation token stamped on a session when it is created.
 */
export function generateSessionGeneration(): string {
  return uuidv4();
}

/**
 * Identifier for one workflow turn, used to correlate log lines.
 */
export function generateTurnId(): string {
  return `turn-${uuidv4()}`;
}
