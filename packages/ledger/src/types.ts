/**
 * @yield-proxy/ledger — Internal types for the proxy ledger.
 *
 * Rules:
 * - Identity fields are readonly and set at construction
 * - Totals are bigint base units and only ever grow
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { Address, AmountSplit, FeeBps, ProxyStatus } from "@yield-proxy/types";

// ─── Identity ────────────────────────────────────────────────────────────

/**
 * Fixed identity of a proxy instance. Injected once, never reassigned.
 */
export interface ProxyIdentity {
  /** Address the proxy itself holds funds at */
  readonly address: Address;
  /** Entity that runs bundled external calls (reward claims) */
  readonly executor: Address;
  /** The only caller allowed to initialize and deposit */
  readonly factory: Address;
  /** Destination for fee proceeds */
  readonly treasury: Address;
}

// ─── Checkpoint & Snapshot ───────────────────────────────────────────────

/**
 * In-memory copy of the mutable ledger state, used for rollback.
 */
export interface LedgerCheckpoint {
  readonly client: Address | undefined;
  readonly feeBps: FeeBps;
  readonly deposited: ReadonlyMap<Address, bigint>;
  readonly withdrawn: ReadonlyMap<Address, bigint>;
}

/**
 * Serializable snapshot of a proxy ledger.
 * Totals are base-10 strings keyed by checksummed asset address.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly identity: ProxyIdentity;
  readonly client: Address | null;
  readonly feeBps: FeeBps;
  readonly totalDeposited: Readonly<Record<string, string>>;
  readonly totalWithdrawn: Readonly<Record<string, string>>;
  readonly createdAt: string;
}

export type { ProxyStatus };

// ─── Fee Split ───────────────────────────────────────────────────────────

/**
 * Input to the withdrawal split: the asset's totals before the call
 * and the amount the call released.
 */
export interface WithdrawalSplitInput {
  readonly deposited: bigint;
  readonly withdrawnBefore: bigint;
  readonly newAmount: bigint;
  readonly feeBps: FeeBps;
}

/**
 * Result of the withdrawal split, including the profit band it crossed.
 */
export interface WithdrawalSplit extends AmountSplit {
  readonly withdrawnAfter: bigint;
  readonly profitBefore: bigint;
  readonly profitAfter: bigint;
  /** Profit newly realised by this withdrawal */
  readonly newProfit: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_FEE_BPS"
  | "ZERO_ADDRESS_CLIENT"
  | "ALREADY_INITIALIZED"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
