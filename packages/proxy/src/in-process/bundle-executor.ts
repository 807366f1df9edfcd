import { encodeFunctionData, getAddress } from "viem";
import type { Address } from "@yield-proxy/types";
import { REWARD_DISTRIBUTOR_ABI } from "../abis.js";
import type {
  BundleExecutor,
  BundleInstruction,
  CallDispatcher,
} from "../collaborators.js";

/**
 * Runs each instruction of a bundle in order as a call from the
 * executor's own address. A failing instruction fails the bundle.
 */
export class InProcessBundleExecutor implements BundleExecutor {
  readonly address: Address;
  private readonly _dispatcher: CallDispatcher;

  constructor(address: Address, dispatcher: CallDispatcher) {
    this.address = getAddress(address);
    this._dispatcher = dispatcher;
  }

  multicall(_caller: Address, bundle: readonly BundleInstruction[]): void {
    for (const instruction of bundle) {
      switch (instruction.kind) {
        case "claimReward":
          this._dispatcher.call(
            this.address,
            instruction.distributor,
            encodeFunctionData({
              abi: REWARD_DISTRIBUTOR_ABI,
              functionName: "claim",
              args: [
                instruction.account,
                instruction.reward,
                instruction.amount,
                instruction.proof,
              ],
            }),
          );
          break;
      }
    }
  }
}
