/**
 * @yield-proxy/proxy — InMemoryTokenBook.
 *
 * Fungible-token balances and allowances for every token in the
 * in-process world. Tokens are identified by address; a vault's share
 * token is the vault's own address.
 *
 * `maxUint256` is an infinite allowance: `transferFrom` does not spend it.
 */

import { getAddress, maxUint256 } from "viem";
import type { Address } from "@yield-proxy/types";
import { TokenError } from "../errors.js";
import type { Checkpointable } from "../journal.js";
import type { TokenBook } from "../collaborators.js";

export interface TokenBookCheckpoint {
  readonly balances: ReadonlyMap<string, bigint>;
  readonly allowances: ReadonlyMap<string, bigint>;
  readonly supplies: ReadonlyMap<string, bigint>;
}

function balanceKey(token: Address, holder: Address): string {
  return `${token.toLowerCase()}:${holder.toLowerCase()}`;
}

function allowanceKey(token: Address, owner: Address, spender: Address): string {
  return `${token.toLowerCase()}:${owner.toLowerCase()}:${spender.toLowerCase()}`;
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new TokenError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount}`);
  }
}

export class InMemoryTokenBook
  implements TokenBook, Checkpointable<TokenBookCheckpoint>
{
  private _balances = new Map<string, bigint>();
  private _allowances = new Map<string, bigint>();
  private _supplies = new Map<string, bigint>();

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(token: Address, holder: Address): bigint {
    return this._balances.get(balanceKey(token, holder)) ?? 0n;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this._allowances.get(allowanceKey(token, owner, spender)) ?? 0n;
  }

  totalSupply(token: Address): bigint {
    return this._supplies.get(token.toLowerCase()) ?? 0n;
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  mint(token: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    this._credit(token, to, amount);
    this._supplies.set(token.toLowerCase(), this.totalSupply(token) + amount);
  }

  burn(token: Address, from: Address, amount: bigint): void {
    assertAmount(amount);
    this._debit(token, from, amount);
    this._supplies.set(token.toLowerCase(), this.totalSupply(token) - amount);
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    this._debit(token, from, amount);
    this._credit(token, to, amount);
  }

  /**
   * Move `amount` from `from` to `to` on behalf of `spender`, spending
   * the allowance `from` granted `spender`.
   */
  transferFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): void {
    assertAmount(amount);
    this._spendAllowance(token, from, spender, amount);
    this._debit(token, from, amount);
    this._credit(token, to, amount);
  }

  // ─── Allowances ──────────────────────────────────────────────────────

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    assertAmount(amount);
    this._allowances.set(allowanceKey(token, owner, spender), amount);
  }

  /**
   * Raise an allowance by `amount`, saturating at `maxUint256`.
   */
  increaseAllowance(
    token: Address,
    owner: Address,
    spender: Address,
    amount: bigint,
  ): void {
    assertAmount(amount);
    const next = this.allowance(token, owner, spender) + amount;
    this._allowances.set(
      allowanceKey(token, owner, spender),
      next > maxUint256 ? maxUint256 : next,
    );
  }

  private _spendAllowance(
    token: Address,
    owner: Address,
    spender: Address,
    amount: bigint,
  ): void {
    const current = this.allowance(token, owner, spender);
    if (current === maxUint256) return;
    if (current < amount) {
      throw new TokenError(
        "INSUFFICIENT_ALLOWANCE",
        `${getAddress(spender)} may spend ${current} of ${getAddress(owner)}'s ${getAddress(token)}, needs ${amount}`,
      );
    }
    this._allowances.set(allowanceKey(token, owner, spender), current - amount);
  }

  private _debit(token: Address, holder: Address, amount: bigint): void {
    const balance = this.balanceOf(token, holder);
    if (balance < amount) {
      throw new TokenError(
        "INSUFFICIENT_BALANCE",
        `${getAddress(holder)} holds ${balance} of ${getAddress(token)}, needs ${amount}`,
      );
    }
    this._balances.set(balanceKey(token, holder), balance - amount);
  }

  private _credit(token: Address, holder: Address, amount: bigint): void {
    this._balances.set(balanceKey(token, holder), this.balanceOf(token, holder) + amount);
  }

  // ─── Checkpoint (Rollback) ───────────────────────────────────────────

  checkpoint(): TokenBookCheckpoint {
    return {
      balances: new Map(this._balances),
      allowances: new Map(this._allowances),
      supplies: new Map(this._supplies),
    };
  }

  restore(checkpoint: TokenBookCheckpoint): void {
    this._balances = new Map(checkpoint.balances);
    this._allowances = new Map(checkpoint.allowances);
    this._supplies = new Map(checkpoint.supplies);
  }
}
