/**
 * @yield-proxy/proxy — InProcessVault.
 *
 * A minimal ERC-4626 vault hosted on the call router. Its share token is
 * its own address in the token book; its assets are whatever the book
 * says it holds. `accrue()` mints assets into the vault to simulate
 * yield.
 *
 * Deposits pull assets through the allowance the depositor granted
 * `pullVia` (the permit executor in a standard setup, the vault itself
 * otherwise).
 */

import {
  decodeFunctionData,
  encodeFunctionResult,
  getAddress,
  isAddressEqual,
} from "viem";
import type { Address, Hex } from "@yield-proxy/types";
import { CallError } from "../errors.js";
import type { InMemoryTokenBook } from "./token-book.js";
import type { ContractHandler } from "./call-router.js";
import { ERC4626_ABI } from "../abis.js";

export interface InProcessVaultOptions {
  readonly address: Address;
  readonly asset: Address;
  readonly tokens: InMemoryTokenBook;
  readonly pullVia?: Address;
}

export class InProcessVault implements ContractHandler {
  readonly address: Address;
  readonly asset: Address;
  private readonly _tokens: InMemoryTokenBook;
  private readonly _pullVia: Address;

  constructor(options: InProcessVaultOptions) {
    this.address = getAddress(options.address);
    this.asset = getAddress(options.asset);
    this._tokens = options.tokens;
    this._pullVia = getAddress(options.pullVia ?? options.address);
  }

  totalAssets(): bigint {
    return this._tokens.balanceOf(this.asset, this.address);
  }

  totalSupply(): bigint {
    return this._tokens.totalSupply(this.address);
  }

  /** Mint `amount` of the asset into the vault. */
  accrue(amount: bigint): void {
    this._tokens.mint(this.asset, this.address, amount);
  }

  /** One-to-one while the vault has no shares or no assets. */
  convertToShares(assets: bigint): bigint {
    const supply = this.totalSupply();
    const totalAssets = this.totalAssets();
    return supply === 0n || totalAssets === 0n ? assets : (assets * supply) / totalAssets;
  }

  convertToAssets(shares: bigint): bigint {
    const supply = this.totalSupply();
    return supply === 0n ? shares : (shares * this.totalAssets()) / supply;
  }

  /** Shares burned to release exactly `assets`, rounded up. */
  previewWithdraw(assets: bigint): bigint {
    const supply = this.totalSupply();
    if (supply === 0n) return assets;
    const totalAssets = this.totalAssets();
    if (totalAssets === 0n) {
      if (assets === 0n) return 0n;
      throw new CallError("REVERTED", this.address, "Vault holds no assets to withdraw");
    }
    return (assets * supply + totalAssets - 1n) / totalAssets;
  }

  handle(caller: Address, data: Hex): Hex {
    const decoded = decodeFunctionData({ abi: ERC4626_ABI, data });

    switch (decoded.functionName) {
      case "asset":
        return encodeFunctionResult({
          abi: ERC4626_ABI,
          functionName: "asset",
          result: this.asset,
        });

      case "deposit": {
        const [assets, receiver] = decoded.args;
        const shares = this.convertToShares(assets);
        this._tokens.transferFrom(this.asset, this._pullVia, caller, this.address, assets);
        this._tokens.mint(this.address, receiver, shares);
        return encodeFunctionResult({
          abi: ERC4626_ABI,
          functionName: "deposit",
          result: shares,
        });
      }

      case "withdraw": {
        const [assets, receiver, owner] = decoded.args;
        const shares = this.previewWithdraw(assets);
        this._exit(caller, owner, receiver, shares, assets);
        return encodeFunctionResult({
          abi: ERC4626_ABI,
          functionName: "withdraw",
          result: shares,
        });
      }

      case "redeem": {
        const [shares, receiver, owner] = decoded.args;
        const assets = this.convertToAssets(shares);
        this._exit(caller, owner, receiver, shares, assets);
        return encodeFunctionResult({
          abi: ERC4626_ABI,
          functionName: "redeem",
          result: assets,
        });
      }

      default:
        throw new CallError("REVERTED", this.address, "Unsupported vault function");
    }
  }

  private _exit(
    caller: Address,
    owner: Address,
    receiver: Address,
    shares: bigint,
    assets: bigint,
  ): void {
    if (isAddressEqual(caller, owner)) {
      this._tokens.burn(this.address, owner, shares);
    } else {
      this._tokens.transferFrom(this.address, caller, owner, this.address, shares);
      this._tokens.burn(this.address, this.address, shares);
    }
    this._tokens.transfer(this.asset, this.address, receiver, assets);
  }
}
