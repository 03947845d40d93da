/**
 * Session Storage Abstraction
 *
 * The store talks to storage only through this interface. The in-memory
 * implementation hands out copies so no caller holds a live reference.
 */

import { Session } from './types';

export interface SessionStorage {
  set(sessionId: string, session: Session): Promise<void>;

  /**
   * @returns Session if found, null otherwise
   */
  get(sessionId: string): Promise<Session | null>;

  delete(sessionId: string): Promise<void>;

  getAll(): Promise<Session[]>;
}

/**
 * In-memory session storage for single-instance deployments.
 */
export class InMemorySessionStorage implements SessionStorage {
  private sessions: Map<string, Session> = new Map();

  async set(sessionId: string, session: Session): Promise<void> {
    this.sessions.set(sessionId, cloneSession(session));
  }

  async get(sessionId: string): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }
    return cloneSession(session);
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  async getAll(): Promise<Session[]> {
    return Array.from(this.sessions.values()).map(cloneSession);
  }
}

export function cloneSession(session: Session): Session {
  return {
    ...session,
    conversationHistory: session.conversationHistory.map((turn) => ({
      ...turn,
      timestamp: new Date(turn.timestamp),
    })),
    createdAt: new Date(session.createdAt),
    lastAccessedAt: new Date(session.lastAccessedAt),
    expiresAt: new Date(session.expiresAt),
  };
}
