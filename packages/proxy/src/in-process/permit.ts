/**
 * @yield-proxy/proxy — InProcessPermitTransfer.
 *
 * Signature-based transfer primitive. Owners grant this contract a
 * standing allowance once; each transfer then needs a fresh
 * authorization (unused nonce, deadline not passed). The signature is
 * carried through unchecked.
 */

import { getAddress } from "viem";
import type { Address } from "@yield-proxy/types";
import type { PermitAuthorization, PermitTransfer } from "../collaborators.js";
import { CallError } from "../errors.js";
import type { Checkpointable } from "../journal.js";
import type { InMemoryTokenBook } from "./token-book.js";

export interface InProcessPermitOptions {
  /** Current time in unix seconds */
  readonly now?: () => bigint;
}

function nonceKey(owner: Address, nonce: bigint): string {
  return `${owner.toLowerCase()}:${nonce}`;
}

export class InProcessPermitTransfer
  implements PermitTransfer, Checkpointable<ReadonlySet<string>>
{
  readonly address: Address;
  private readonly _tokens: InMemoryTokenBook;
  private readonly _now: () => bigint;
  private _usedNonces = new Set<string>();

  constructor(address: Address, tokens: InMemoryTokenBook, options: InProcessPermitOptions = {}) {
    this.address = getAddress(address);
    this._tokens = tokens;
    this._now = options.now ?? (() => BigInt(Math.floor(Date.now() / 1000)));
  }

  isNonceUsed(owner: Address, nonce: bigint): boolean {
    return this._usedNonces.has(nonceKey(owner, nonce));
  }

  permitTransferFrom(
    owner: Address,
    authorization: PermitAuthorization,
    recipient: Address,
  ): void {
    if (authorization.deadline < this._now()) {
      throw new CallError(
        "REVERTED",
        this.address,
        `Permit expired at ${authorization.deadline}`,
      );
    }
    const key = nonceKey(owner, authorization.nonce);
    if (this._usedNonces.has(key)) {
      throw new CallError(
        "REVERTED",
        this.address,
        `Permit nonce ${authorization.nonce} already used by ${getAddress(owner)}`,
      );
    }

    this._usedNonces.add(key);
    this._tokens.transferFrom(
      authorization.token,
      this.address,
      owner,
      recipient,
      authorization.amount,
    );
  }

  // ─── Checkpoint (Rollback) ───────────────────────────────────────────

  checkpoint(): ReadonlySet<string> {
    return new Set(this._usedNonces);
  }

  restore(checkpoint: ReadonlySet<string>): void {
    this._usedNonces = new Set(checkpoint);
  }
}
