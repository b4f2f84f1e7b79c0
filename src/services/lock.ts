/**
 * KeyedLock - runs tasks one at a time per key, in arrival order
 */

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Whether a task for this key is running or queued
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    // The tail only orders the queue; callers see the outcome through current
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
