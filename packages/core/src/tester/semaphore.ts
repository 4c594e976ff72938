/**
 * Counting semaphore with abortable acquisition
 *
 * @module packages/core/tester/semaphore
 */

export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
  cancel: () => void;
}

export class Semaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(permits: number) {
    this.available = Math.max(1, Math.floor(permits));
  }

  /**
   * Wait for a permit. Resolves with a release function, or with `null` if
   * the signal aborts first. Release functions are idempotent.
   */
  acquire(signal?: AbortSignal): Promise<Release | null> {
    if (signal?.aborted) {
      return Promise.resolve(null);
    }
    if (this.available > 0) {
      this.available -= 1;
      return Promise.resolve(this.makeRelease());
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
        cancel: () => resolve(null),
      };
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        waiter.cancel();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Permits currently free */
  get free(): number {
    return this.available;
  }

  private makeRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand the permit straight to the next waiter.
        next.grant(this.makeRelease());
      } else {
        this.available += 1;
      }
    };
  }
}
