/**
 * Exclusive Lock - Synchronous Critical Section
 *
 * Guards a group of in-memory structures that must only ever be mutated
 * together. The critical section is a synchronous callback: it cannot await,
 * so the lock can never be held across a network call or store I/O, and no
 * other request's continuation can run while it is held.
 *
 * Re-entrant acquisition is a programming error and throws, as does handing
 * the lock a callback that returns a promise.
 */

export class ExclusiveLock {
  private held = false;

  constructor(private readonly name: string = 'lock') {}

  /**
   * Run `section` while holding the lock and return its result.
   *
   * @throws Error if the lock is already held or `section` returns a promise
   */
  run<T>(section: () => T): T {
    if (this.held) {
      throw new Error(`[ExclusiveLock] re-entrant acquisition of ${this.name}`);
    }

    this.held = true;
    try {
      const result = section();
      if (result instanceof Promise) {
        throw new Error(`[ExclusiveLock] ${this.name} critical section must be synchronous`);
      }
      return result;
    } finally {
      this.held = false;
    }
  }

  isHeld(): boolean {
    return this.held;
  }
}
