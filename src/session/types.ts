/**
 * Type definitions for session management
 */

import type { WorkflowRoute } from '../routing/types';

export type ConversationRole = 'user' | 'assistant';

/**
 * One entry of a session's conversation history
 */
export interface ConversationTurn {
  role: ConversationRole;
  text: string;
  timestamp: Date;
  route?: WorkflowRoute;
}

/**
 * Persisted per-conversation state
 */
export interface Session {
  sessionId: string;

  /**
   * Stamped at creation. A session recreated under the same id gets a new
   * generation, which is how `save` detects an eviction mid-turn.
   */
  generation: string;

  // Bounded, oldest first
  conversationHistory: ConversationTurn[];

  // Clarification state
  awaitingClarification: boolean;
  pendingQuery?: string;
  clarificationRounds: number;

  // Timing
  createdAt: Date;
  lastAccessedAt: Date;
  expiresAt: Date;
}

export interface SessionStoreOptions {
  /** Time-to-live measured from the last access (milliseconds) */
  ttlMs: number;
  /** Maximum number of history entries kept per session */
  maxHistory: number;
  /** Clock used for expiry checks, defaults to Date.now */
  clock?: () => number;
}
