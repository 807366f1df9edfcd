/**
 * @yield-proxy/ledger — Basis-point arithmetic.
 *
 * All arithmetic uses bigint. Division always rounds toward zero,
 * which for the non-negative values used here is floor.
 *
 * Rules:
 * - No floating-point operations
 * - Negative amounts are rejected at every entry point
 */

import { BPS_DENOMINATOR } from "@yield-proxy/types";
import type { FeeBps } from "@yield-proxy/types";
import { LedgerError } from "./types.js";

/** BPS_DENOMINATOR as bigint. */
export const BPS = BigInt(BPS_DENOMINATOR);

/**
 * Throw unless `value` is >= 0.
 */
export function assertNonNegative(value: bigint, label: string): void {
  if (value < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be non-negative, got ${value.toString()}`,
    );
  }
}

/**
 * Throw unless `feeBps` is an integer in (0, 10000].
 */
export function assertFeeBps(feeBps: FeeBps): void {
  if (!Number.isInteger(feeBps) || feeBps <= 0 || feeBps > BPS_DENOMINATOR) {
    throw new LedgerError(
      "INVALID_FEE_BPS",
      `Fee rate must be an integer in (0, ${String(BPS_DENOMINATOR)}], got ${String(feeBps)}`,
    );
  }
}

/**
 * max(0, a - b)
 */
export function positiveDelta(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

/**
 * floor(value * numerator / denominator) for non-negative operands.
 */
export function mulDivDown(value: bigint, numerator: bigint, denominator: bigint): bigint {
  assertNonNegative(value, "value");
  assertNonNegative(numerator, "numerator");
  if (denominator <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Denominator must be positive");
  }
  return (value * numerator) / denominator;
}

/**
 * Treasury's share in bps: the complement of the client's fee rate.
 *
 * 8700 → 1300n
 */
export function treasuryShareBps(feeBps: FeeBps): bigint {
  assertFeeBps(feeBps);
  return BPS - BigInt(feeBps);
}

/**
 * Convert base units to a decimal string for display.
 *
 * 10261000n with decimals=6 → "10.261000"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}
