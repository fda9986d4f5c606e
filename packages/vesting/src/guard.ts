/**
 * Reentrancy guard.
 *
 * One flag per component instance. The flag is set for the full
 * duration of a guarded operation and cleared on every exit path, so a
 * callback from an external dependency cannot enter any guarded
 * operation of the same instance.
 */

import { StateError } from "./errors.js";

export class ReentrancyGuard {
  private current: string | undefined;

  run<T>(operation: string, fn: () => T): T {
    if (this.current !== undefined) {
      throw new StateError(
        "REENTRANT_CALL",
        `Re-entrant call to '${operation}' rejected while '${this.current}' is in progress`,
      );
    }

    this.current = operation;
    try {
      return fn();
    } finally {
      this.current = undefined;
    }
  }

  get entered(): boolean {
    return this.current !== undefined;
  }
}
