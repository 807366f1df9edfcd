/**
 * @yield-proxy/proxy — InMemoryCallRouter.
 *
 * Hosts external targets (vaults, reward distributors, bundlers) by
 * address and dispatches raw calldata to them. Handlers run
 * synchronously and may call back into any proxy they hold a reference
 * to, which is how reentrancy is exercised in-process.
 *
 * The router is itself a journal participant: every hosted handler that
 * implements `Checkpointable` is checkpointed and restored with it.
 */

import { getAddress } from "viem";
import type { Address, Hex } from "@yield-proxy/types";
import type { CallDispatcher } from "../collaborators.js";
import { CallError } from "../errors.js";
import type { Checkpointable } from "../journal.js";

/**
 * Code living at an address of the in-process world.
 */
export interface ContractHandler {
  handle(caller: Address, data: Hex): Hex;
}

type CheckpointableHandler = ContractHandler & Checkpointable;

function isCheckpointable(handler: ContractHandler): handler is CheckpointableHandler {
  return (
    "checkpoint" in handler &&
    typeof handler.checkpoint === "function" &&
    "restore" in handler &&
    typeof handler.restore === "function"
  );
}

export class InMemoryCallRouter
  implements CallDispatcher, Checkpointable<ReadonlyMap<string, unknown>>
{
  private readonly _handlers = new Map<string, ContractHandler>();

  /**
   * Host `handler` at `address`. Replaces any handler already there.
   */
  register(address: Address, handler: ContractHandler): void {
    this._handlers.set(address.toLowerCase(), handler);
  }

  hasCode(address: Address): boolean {
    return this._handlers.has(address.toLowerCase());
  }

  call(caller: Address, target: Address, data: Hex): Hex {
    const handler = this._handlers.get(target.toLowerCase());
    if (handler === undefined) {
      throw new CallError("NO_CODE", getAddress(target), `No code at ${getAddress(target)}`);
    }
    return handler.handle(getAddress(caller), data);
  }

  // ─── Checkpoint (Rollback) ───────────────────────────────────────────

  checkpoint(): ReadonlyMap<string, unknown> {
    const saved = new Map<string, unknown>();
    for (const [address, handler] of this._handlers) {
      if (isCheckpointable(handler)) {
        saved.set(address, handler.checkpoint());
      }
    }
    return saved;
  }

  restore(checkpoint: ReadonlyMap<string, unknown>): void {
    for (const [address, saved] of checkpoint) {
      const handler = this._handlers.get(address);
      if (handler !== undefined && isCheckpointable(handler)) {
        handler.restore(saved);
      }
    }
  }

  commit(): void {
    for (const handler of this._handlers.values()) {
      if (isCheckpointable(handler)) {
        handler.commit?.();
      }
    }
  }
}
