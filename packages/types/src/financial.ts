/**
 * Financial Types
 *
 * Fee-rate and operation primitives for the proxy ledger.
 *
 * Rules:
 * - All on-ledger amounts are bigint base units (no decimals, no floats)
 * - Rates are integer basis points (1/10000th)
 */

/**
 * Basis-point denominator. 10000 bps = 100%.
 */
export const BPS_DENOMINATOR = 10_000;

/**
 * Fee rate in basis points.
 *
 * This is the client's retained share of realised profit. The treasury
 * takes the complement: `10000 - feeBps`.
 */
export type FeeBps = number;

/**
 * The kind of operation an instruction is forwarded under.
 * Allow-list checkers apply kind-specific rules.
 */
export type OperationKind = "deposit" | "withdrawal" | "any";

/**
 * Lifecycle status of a proxy instance.
 */
export type ProxyStatus = "uninitialized" | "active";

/**
 * A two-way split of a realised amount.
 */
export interface AmountSplit {
  /** Amount routed to the treasury */
  readonly feeAmount: bigint;

  /** Amount routed to the client */
  readonly clientAmount: bigint;
}
