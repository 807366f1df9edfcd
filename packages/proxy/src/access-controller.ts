/**
 * @yield-proxy/proxy — AccessController.
 *
 * Role checks against the identities held by a proxy's ledger.
 * Rejections carry both the caller and the address the operation is
 * restricted to.
 */

import { getAddress, isAddressEqual, zeroAddress } from "viem";
import type { ProxyLedger } from "@yield-proxy/ledger";
import { isFeeBps } from "@yield-proxy/types";
import type { Address, FeeBps } from "@yield-proxy/types";
import { ProxyError } from "./errors.js";

export class AccessController {
  constructor(private readonly ledger: ProxyLedger) {}

  /**
   * The current client, or the zero address before initialization, so
   * that every client-only check fails until a client is set.
   */
  get client(): Address {
    return this.ledger.client ?? zeroAddress;
  }

  isFactory(caller: Address): boolean {
    return isAddressEqual(caller, this.ledger.factory);
  }

  isClient(caller: Address): boolean {
    return this.ledger.client !== undefined && isAddressEqual(caller, this.ledger.client);
  }

  assertFactory(caller: Address): void {
    if (!this.isFactory(caller)) {
      throw unauthorized(caller, this.ledger.factory, "factory");
    }
  }

  assertClient(caller: Address): void {
    if (!this.isClient(caller)) {
      throw unauthorized(caller, this.client, "client");
    }
  }

  assertFeeBps(feeBps: FeeBps): void {
    if (!isFeeBps(feeBps)) {
      throw new ProxyError(
        "INVALID_FEE_BPS",
        `Fee rate must be an integer in (0, 10000], got ${feeBps}`,
      );
    }
  }
}

export function unauthorized(caller: Address, expected: Address, role: string): ProxyError {
  return new ProxyError(
    "UNAUTHORIZED_CALLER",
    `Caller ${getAddress(caller)} is not the ${role} (${getAddress(expected)})`,
    { caller: getAddress(caller), expected: getAddress(expected) },
  );
}
