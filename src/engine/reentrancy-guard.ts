/**
 * Scoped lock around every code path that moves value out of the market.
 *
 * Outbound transfers are awaited, so recipient-controlled code may run before the
 * enclosing operation finishes. While the lock is held any other guarded call fails
 * fast with REENTRANT_CALL; nothing queues. The lock is released on every exit path.
 */

import { LedgerError } from "./errors.js";

export class ReentrancyGuard {
  private entered = false;

  get locked(): boolean {
    return this.entered;
  }

  /** Throws REENTRANT_CALL while a guarded operation is in flight. */
  assertUnlocked(): void {
    if (this.entered) {
      throw new LedgerError("REENTRANT_CALL", "another value-moving operation is in progress");
    }
  }

  async run<T>(operation: () => Promise<T>): Promise<T> {
    this.assertUnlocked();
    this.entered = true;
    try {
      return await operation();
    } finally {
      this.entered = false;
    }
  }
}
