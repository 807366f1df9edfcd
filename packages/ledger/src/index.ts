/**
 * @yield-proxy/ledger — Per-asset principal ledger and fee split engine.
 *
 * Enforces the proxy accounting invariants:
 * - Deposited and withdrawn totals only ever grow
 * - Realised profit is max(0, withdrawn - deposited) and never shrinks
 * - Profit is taxed once, on the band each withdrawal newly crosses
 * - All arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - Identity is readonly after construction
 * - Client and fee rate are set exactly once
 * - Fail-closed: invalid input throws, never silently succeeds
 */

// Core ledger
export { ProxyLedger } from "./ledger.js";

// Fee split engine
export { computeWithdrawalSplit, computeRewardSplit } from "./fee-split.js";

// Basis-point arithmetic
export {
  BPS,
  assertNonNegative,
  assertFeeBps,
  positiveDelta,
  mulDivDown,
  treasuryShareBps,
  formatAmount,
} from "./bps-math.js";

// Types
export type {
  ProxyIdentity,
  LedgerCheckpoint,
  LedgerSnapshot,
  WithdrawalSplitInput,
  WithdrawalSplit,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
