import type { IExclusiveGuard } from '../../application/ports/IExclusiveGuard.ts';

/**
 * FIFO mutex for remote calls
 *
 * Waiters are woken in arrival order. Release hands the guard straight to
 * the next waiter, so a newcomer can never jump the queue.
 */
export class ExclusiveGuard implements IExclusiveGuard {
  private locked = false;
  private waiters: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Number of callers waiting for the guard
   */
  get pending(): number {
    return this.waiters.length;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Acquire the guard, waiting for the current holder if needed
   */
  private async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Release the guard to the next waiter, or unlock it
   */
  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
