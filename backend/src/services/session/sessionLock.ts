/**
 * Serializes work per session id: a turn for a session starts only after the
 * previous one has settled. Different sessions never wait on each other.
 */
export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(sessionId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    }
  }

  isLocked(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }
}
