/**
 * @yield-proxy/proxy — InProcessRewardDistributor.
 *
 * Cumulative reward distribution: each (account, reward) pair has an
 * entitlement that only grows, and a claim pays out the difference
 * between the submitted cumulative amount and what was already paid.
 * Entitlements stand in for merkle roots; the submitted proof is not
 * inspected.
 */

import { decodeFunctionData, encodeFunctionResult, getAddress } from "viem";
import type { Address, Hex } from "@yield-proxy/types";
import { REWARD_DISTRIBUTOR_ABI } from "../abis.js";
import { CallError } from "../errors.js";
import type { Checkpointable } from "../journal.js";
import type { ContractHandler } from "./call-router.js";
import type { InMemoryTokenBook } from "./token-book.js";

function claimKey(account: Address, reward: Address): string {
  return `${account.toLowerCase()}:${reward.toLowerCase()}`;
}

export class InProcessRewardDistributor
  implements ContractHandler, Checkpointable<ReadonlyMap<string, bigint>>
{
  readonly address: Address;
  private readonly _tokens: InMemoryTokenBook;
  private readonly _entitlements = new Map<string, bigint>();
  private _claimed = new Map<string, bigint>();

  constructor(address: Address, tokens: InMemoryTokenBook) {
    this.address = getAddress(address);
    this._tokens = tokens;
  }

  /**
   * Raise the cumulative amount `account` may claim of `reward`.
   */
  setEntitlement(account: Address, reward: Address, cumulative: bigint): void {
    const key = claimKey(account, reward);
    const current = this._entitlements.get(key) ?? 0n;
    if (cumulative < current) {
      throw new CallError(
        "REVERTED",
        this.address,
        `Entitlement cannot decrease (${current} -> ${cumulative})`,
      );
    }
    this._entitlements.set(key, cumulative);
  }

  claimed(account: Address, reward: Address): bigint {
    return this._claimed.get(claimKey(account, reward)) ?? 0n;
  }

  handle(_caller: Address, data: Hex): Hex {
    const { args } = decodeFunctionData({ abi: REWARD_DISTRIBUTOR_ABI, data });
    const [account, reward, claimable] = args;
    const key = claimKey(account, reward);

    if (claimable > (this._entitlements.get(key) ?? 0n)) {
      throw new CallError("REVERTED", this.address, "Claimable amount exceeds entitlement");
    }

    const already = this._claimed.get(key) ?? 0n;
    const amount = claimable > already ? claimable - already : 0n;
    if (amount > 0n) {
      this._claimed.set(key, claimable);
      this._tokens.transfer(reward, this.address, account, amount);
    }

    return encodeFunctionResult({
      abi: REWARD_DISTRIBUTOR_ABI,
      functionName: "claim",
      result: amount,
    });
  }

  // ─── Checkpoint (Rollback) ───────────────────────────────────────────

  checkpoint(): ReadonlyMap<string, bigint> {
    return new Map(this._claimed);
  }

  restore(checkpoint: ReadonlyMap<string, bigint>): void {
    this._claimed = new Map(checkpoint);
  }
}
