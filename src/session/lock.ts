/**
 * Per-session mutual exclusion.
 *
 * Turns for the same session id run one after another in arrival order;
 * different session ids never wait on each other.
 */
export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(sessionId, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    }
  }

  /**
   * True while a turn holds or waits for the lock of this session
   */
  isLocked(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }

  get activeCount(): number {
    return this.tails.size;
  }
}
