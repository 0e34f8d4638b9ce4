export type Release = () => void;

/**
 * FIFO async lock. Ownership passes straight to the next waiter on release.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<(release: Release) => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Resolves with a release function, or undefined if the lock was not
   * obtained within `timeoutMs` or `signal` aborted first.
   */
  acquire(timeoutMs: number, signal?: AbortSignal): Promise<Release | undefined> {
    if (signal?.aborted) {
      return Promise.resolve(undefined);
    }
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise(resolve => {
      const giveUp = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', giveUp);
        this.waiters = this.waiters.filter(w => w !== waiter);
        resolve(undefined);
      };
      const waiter = (release: Release) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', giveUp);
        resolve(release);
      };
      const timer = setTimeout(giveUp, timeoutMs);
      signal?.addEventListener('abort', giveUp, { once: true });
      this.waiters.push(waiter);
    });
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
