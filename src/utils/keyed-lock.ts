/**
 * In-process FIFO locks keyed by string (e.g. `invoice:<id>`, `product:<id>`).
 *
 * `acquire` takes every key in ascending order, so two callers locking
 * overlapping key sets can never wait on each other in a cycle.
 */
export class LockTimeoutError extends Error {
  constructor(public readonly key: string, public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${key}`);
    this.name = 'LockTimeoutError';
  }
}

export type ReleaseLock = () => void;

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Acquire all `keys` (duplicates ignored). Resolves with a function that
   * releases every acquired key.
   */
  async acquire(keys: readonly string[], timeoutMs: number): Promise<ReleaseLock> {
    const ordered = [...new Set(keys)].sort();
    const releases: ReleaseLock[] = [];

    try {
      for (const key of ordered) {
        releases.push(await this.acquireOne(key, timeoutMs));
      }
    } catch (error) {
      releases.reverse().forEach((release) => release());
      throw error;
    }

    return () => {
      releases.reverse().forEach((release) => release());
    };
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  private async acquireOne(key: string, timeoutMs: number): Promise<ReleaseLock> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseCurrent: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseCurrent = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    const release = (): void => {
      releaseCurrent();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };

    const acquired = await new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void previous.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });

    if (!acquired) {
      // Keep the queue moving: our slot is handed on as soon as the holder leaves
      void previous.then(release);
      throw new LockTimeoutError(key, timeoutMs);
    }

    return release;
  }
}
