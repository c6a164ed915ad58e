/**
 * CommLock: async mutual exclusion for one physical channel
 *
 * Every exchange with an instrument (and every housekeeping cycle) runs
 * inside runExclusive(), so bytes from two callers never interleave on the
 * wire. Waiters are served in FIFO order.
 *
 * A driver creates its own lock unless one is passed in. Passing the same
 * instance to several drivers extends the exclusion across all of them,
 * which is how devices on one shared bus are kept apart.
 */

export class CommLock {
  readonly name: string;

  private tail: Promise<void> = Promise.resolve();
  private held = false;
  private waiters = 0;

  constructor(name = 'comm') {
    this.name = name;
  }

  /** Whether an operation currently holds the lock */
  get isLocked(): boolean {
    return this.held;
  }

  /** Number of operations queued behind the current holder */
  get pending(): number {
    return this.waiters;
  }

  /**
   * Run fn with the lock held. The lock is released on every exit path,
   * including a rejected fn.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const prev = this.tail;
    this.tail = prev.then(() => next);

    this.waiters++;
    await prev;
    this.waiters--;
    this.held = true;

    try {
      return await fn();
    } finally {
      this.held = false;
      release();
    }
  }
}
