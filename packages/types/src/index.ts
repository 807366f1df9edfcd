/**
 * @yield-proxy/types — Shared domain types for the yield proxy stack.
 *
 * These types are used across all packages:
 * - Address and calldata primitives
 * - Fee-rate and operation kinds
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies beyond type imports
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Chain types
export type {
  Address,
  Hex,
  Call,
  Selector,
} from "./chain.js";

// Financial types
export { BPS_DENOMINATOR } from "./financial.js";
export type {
  FeeBps,
  OperationKind,
  ProxyStatus,
  AmountSplit,
} from "./financial.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isAddressLike,
  isHexBytes,
  isFeeBps,
} from "./guards.js";
