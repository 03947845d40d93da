/**
 * Session Store
 *
 * Keyed session container with TTL eviction and bounded history. Sessions
 * expire lazily when read after their TTL, and in bulk through evictExpired().
 * All access goes through storage copies, never through a shared reference.
 */

import { ConcurrentModificationError } from '../errors/types';
import { Logger } from '../monitoring/logger';
import { generateSessionGeneration } from '../utils/uuid';
import { SessionLock } from './lock';
import { InMemorySessionStorage } from './storage';
import type { SessionStorage } from './storage';
import type { ConversationTurn, Session, SessionStoreOptions } from './types';

/**
 * Append entries to a history, dropping the oldest ones past `maxHistory`.
 */
export function appendToHistory(
  history: readonly ConversationTurn[],
  entries: readonly ConversationTurn[],
  maxHistory: number
): ConversationTurn[] {
  const combined = [...history, ...entries];
  return combined.length > maxHistory ? combined.slice(combined.length - maxHistory) : combined;
}

export class SessionStore {
  private readonly storage: SessionStorage;
  private readonly ttlMs: number;
  private readonly maxHistory: number;
  private readonly clock: () => number;
  private readonly logger?: Logger;
  readonly locks = new SessionLock();

  constructor(options: SessionStoreOptions, storage?: SessionStorage, logger?: Logger) {
    this.storage = storage || new InMemorySessionStorage();
    this.ttlMs = options.ttlMs;
    this.maxHistory = options.maxHistory;
    this.clock = options.clock ?? (() => Date.now());
    this.logger = logger;
  }

  /**
   * Returns the live session for this id, or a fresh one when the id is unseen
   * or its session expired. Every call extends the TTL.
   */
  async getOrCreate(sessionId: string): Promise<Session> {
    const now = this.clock();
    const existing = await this.storage.get(sessionId);

    if (existing && !this.isExpired(existing, now)) {
      const touched: Session = {
        ...existing,
        lastAccessedAt: new Date(now),
        expiresAt: new Date(now + this.ttlMs),
      };
      await this.storage.set(sessionId, touched);
      return touched;
    }

    if (existing) {
      this.logger?.info('Expired session replaced', {
        event: 'session_expired',
        sessionId,
        data: { lastAccessedAt: existing.lastAccessedAt.toISOString() },
      });
    }

    const session: Session = {
      sessionId,
      generation: generateSessionGeneration(),
      conversationHistory: [],
      awaitingClarification: false,
      clarificationRounds: 0,
      createdAt: new Date(now),
      lastAccessedAt: new Date(now),
      expiresAt: new Date(now + this.ttlMs),
    };

    await this.storage.set(sessionId, session);

    this.logger?.info('Session created', {
      event: 'session_created',
      sessionId,
    });

    return session;
  }

  /**
   * Atomically replace a session.
   *
   * @throws ConcurrentModificationError if the session was evicted, expired or
   * recreated since `updated` was read
   */
  async save(sessionId: string, updated: Session): Promise<void> {
    const now = this.clock();
    const current = await this.storage.get(sessionId);

    if (!current || current.generation !== updated.generation || this.isExpired(current, now)) {
      throw new ConcurrentModificationError(sessionId);
    }

    await this.storage.set(sessionId, {
      ...updated,
      sessionId,
      conversationHistory: appendToHistory([], updated.conversationHistory, this.maxHistory),
      lastAccessedAt: new Date(now),
      expiresAt: new Date(now + this.ttlMs),
    });

    this.logger?.debug('Session saved', {
      event: 'session_saved',
      sessionId,
      historyLength: Math.min(updated.conversationHistory.length, this.maxHistory),
      awaitingClarification: updated.awaitingClarification,
    });
  }

  /**
   * Add history entries to a session value (not persisted until save()).
   */
  appendHistory(session: Session, ...entries: ConversationTurn[]): Session {
    return {
      ...session,
      conversationHistory: appendToHistory(session.conversationHistory, entries, this.maxHistory),
    };
  }

  /**
   * Remove every session whose last access + TTL has elapsed.
   *
   * Sessions held by an in-flight turn are skipped, and each candidate is
   * re-read before deletion so a session touched after the sweep started survives.
   *
   * @param now - Sweep time, defaults to the store clock
   * @returns Number of sessions evicted
   */
  async evictExpired(now?: number): Promise<number> {
    const sweepStartedAt = now ?? this.clock();
    const candidates = (await this.storage.getAll()).filter((session) =>
      this.isExpired(session, sweepStartedAt)
    );
    let evicted = 0;

    for (const candidate of candidates) {
      if (this.locks.isLocked(candidate.sessionId)) {
        continue;
      }

      const current = await this.storage.get(candidate.sessionId);
      if (
        !current ||
        current.generation !== candidate.generation ||
        !this.isExpired(current, sweepStartedAt)
      ) {
        continue;
      }

      await this.storage.delete(candidate.sessionId);
      evicted++;

      this.logger?.info('Expired session evicted', {
        event: 'session_evicted',
        sessionId: candidate.sessionId,
        inactiveMs: sweepStartedAt - current.lastAccessedAt.getTime(),
      });
    }

    return evicted;
  }

  async evict(sessionId: string): Promise<void> {
    await this.storage.delete(sessionId);
    this.logger?.info('Session evicted', { event: 'session_evicted_explicitly', sessionId });
  }

  /**
   * Read a session without extending its TTL. Expired sessions read as null.
   */
  async peek(sessionId: string): Promise<Session | null> {
    const session = await this.storage.get(sessionId);
    if (!session || this.isExpired(session, this.clock())) {
      return null;
    }
    return session;
  }

  async getSessionCount(): Promise<number> {
    const now = this.clock();
    const sessions = await this.storage.getAll();
    return sessions.filter((session) => !this.isExpired(session, now)).length;
  }

  /**
   * Serialize work for one session id.
   */
  withSessionLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(sessionId, fn);
  }

  private isExpired(session: Session, now: number): boolean {
    return session.lastAccessedAt.getTime() + this.ttlMs <= now;
  }
}
