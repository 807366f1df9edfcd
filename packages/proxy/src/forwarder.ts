/**
 * @yield-proxy/proxy — CalldataForwarder.
 *
 * Splits calldata into selector and argument bytes for allow-list
 * checks, and forwards it verbatim to its target as the proxy.
 */

import { getAddress } from "viem";
import { isHexBytes } from "@yield-proxy/types";
import type { Address, Call, Hex, Selector } from "@yield-proxy/types";
import type { CallDispatcher } from "./collaborators.js";
import { ProxyError } from "./errors.js";

const SELECTOR_HEX_LENGTH = 10;

export interface SplitCalldata {
  readonly selector: Selector;
  readonly remainder: Hex;
}

/**
 * First four bytes and the rest. Throws `INVALID_CALLDATA` for
 * malformed hex or fewer than four bytes.
 */
export function splitCalldata(data: Hex): SplitCalldata {
  if (!isHexBytes(data)) {
    throw new ProxyError("INVALID_CALLDATA", `Calldata is not whole hex bytes: ${data}`);
  }
  if (data.length < SELECTOR_HEX_LENGTH) {
    throw new ProxyError(
      "INVALID_CALLDATA",
      `Calldata must be at least 4 bytes, got ${(data.length - 2) / 2}`,
    );
  }
  return {
    selector: `0x${data.slice(2, SELECTOR_HEX_LENGTH).toLowerCase()}`,
    remainder: `0x${data.slice(SELECTOR_HEX_LENGTH)}`,
  };
}

export class CalldataForwarder {
  readonly from: Address;

  constructor(from: Address, private readonly dispatcher: CallDispatcher) {
    this.from = getAddress(from);
  }

  /**
   * Send `call.data` to `call.target` unmodified. Target failures
   * propagate unchanged.
   */
  forward(call: Call): Hex {
    return this.dispatcher.call(this.from, call.target, call.data);
  }
}
