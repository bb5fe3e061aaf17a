/**
 * @fileoverview Exclusive lock for in-process critical sections
 * @module lib/mutex
 */

/**
 * Promise-chained mutual exclusion lock
 *
 * @class Mutex
 * @description Callers queue in arrival order. A section that throws
 * releases the lock and rethrows to its own caller only.
 *
 * @example
 * ```typescript
 * const mutex = new Mutex();
 * const value = await mutex.runExclusive(() => record.read());
 * ```
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  /**
   * Whether a critical section is currently running
   */
  get locked(): boolean {
    return this.held;
  }

  /**
   * Runs `section` once every earlier section has finished
   *
   * @param {Function} section - Work to perform while holding the lock
   * @returns {Promise<T>} The section's result
   */
  runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      this.held = true;
      try {
        return await section();
      } finally {
        this.held = false;
      }
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
