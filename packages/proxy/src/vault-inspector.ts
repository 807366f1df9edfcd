import { decodeFunctionResult, encodeFunctionData, zeroAddress } from "viem";
import type { Address } from "@yield-proxy/types";
import type { CallDispatcher, VaultInspector } from "./collaborators.js";
import { ERC4626_ABI } from "./abis.js";

/**
 * Reads a vault's underlying asset by calling `asset()` through the
 * dispatcher, as a static call from the zero address.
 */
export class DispatcherVaultInspector implements VaultInspector {
  constructor(private readonly dispatcher: CallDispatcher) {}

  asset(vault: Address): Address {
    const result = this.dispatcher.call(
      zeroAddress,
      vault,
      encodeFunctionData({ abi: ERC4626_ABI, functionName: "asset" }),
    );
    return decodeFunctionResult({ abi: ERC4626_ABI, functionName: "asset", data: result });
  }
}
