import { ProxyError } from "./errors.js";

/**
 * Single-entry lock shared by every guarded operation of one proxy.
 * The flag is cleared in `finally`, so a failed operation never leaves
 * the proxy locked.
 */
export class ReentrancyGuard {
  private _entered = false;

  get entered(): boolean {
    return this._entered;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this._entered) {
      throw new ProxyError("REENTRANT_CALL", `Reentrant call to ${operation}`);
    }
    this._entered = true;
    try {
      return fn();
    } finally {
      this._entered = false;
    }
  }
}
