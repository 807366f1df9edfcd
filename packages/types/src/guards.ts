/**
 * Runtime Type Guards
 *
 * Narrowing functions for proxy domain types, used where values arrive
 * untyped: restored ledger snapshots, forwarded calldata and fee rates.
 */

import type { FeeBps } from "./financial.js";
import { BPS_DENOMINATOR } from "./financial.js";

// =============================================================================
// Byte-string guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const HEX_PATTERN = /^0x([0-9a-fA-F]{2})*$/;

export function isAddressLike(value: unknown): value is `0x${string}` {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isHexBytes(value: unknown): value is `0x${string}` {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

// =============================================================================
// Financial guards
// =============================================================================

/**
 * A fee rate is valid when it is an integer in (0, 10000].
 */
export function isFeeBps(value: unknown): value is FeeBps {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value > 0 &&
    value <= BPS_DENOMINATOR
  );
}
