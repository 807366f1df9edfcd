/**
 * @yield-proxy/proxy — Collaborator contracts.
 *
 * Everything the proxy talks to but does not own. The proxy depends only
 * on these interfaces; `in-process/` supplies implementations that run
 * against an in-memory token book and call router.
 */

import type { Address, Hex, OperationKind, Selector } from "@yield-proxy/types";

// =============================================================================
// Tokens
// =============================================================================

/**
 * Balances and allowances for fungible tokens, keyed by token address.
 */
export interface TokenBook {
  balanceOf(token: Address, holder: Address): bigint;
  allowance(token: Address, owner: Address, spender: Address): bigint;
  transfer(token: Address, from: Address, to: Address, amount: bigint): void;
  transferFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): void;
  approve(token: Address, owner: Address, spender: Address, amount: bigint): void;
  increaseAllowance(token: Address, owner: Address, spender: Address, amount: bigint): void;
}

// =============================================================================
// Calls
// =============================================================================

/**
 * Executes an opaque call against a target on behalf of `caller` and
 * returns the raw result bytes. Failures are thrown.
 */
export interface CallDispatcher {
  call(caller: Address, target: Address, data: Hex): Hex;
  /** Whether a contract is hosted at `target`. */
  hasCode(target: Address): boolean;
}

/**
 * Decides whether a (target, selector, remainder) triple may be
 * forwarded for the given operation kind.
 */
export interface AllowListChecker {
  check(target: Address, selector: Selector, remainder: Hex, kind: OperationKind): boolean;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * The proxy's view of the factory that created it.
 */
export interface FactoryPort {
  readonly address: Address;
  checkCalldata(target: Address, selector: Selector, remainder: Hex, kind: OperationKind): boolean;
  /** Whether `caller` may claim rewards on behalf of `proxy`. */
  isClaimAuthorized(caller: Address, proxy: Address): boolean;
}

// =============================================================================
// Permit
// =============================================================================

/**
 * A signed, single-use authorization to pull `amount` of `token` from
 * its owner.
 */
export interface PermitAuthorization {
  readonly token: Address;
  readonly amount: bigint;
  readonly nonce: bigint;
  /** Unix seconds */
  readonly deadline: bigint;
  readonly signature: Hex;
}

export interface PermitTransfer {
  /** The spender protocols pull the proxy's deposited assets through */
  readonly address: Address;
  permitTransferFrom(owner: Address, authorization: PermitAuthorization, recipient: Address): void;
}

// =============================================================================
// Bundling executor
// =============================================================================

export interface ClaimRewardInstruction {
  readonly kind: "claimReward";
  readonly distributor: Address;
  readonly account: Address;
  readonly reward: Address;
  /** Cumulative claimable amount */
  readonly amount: bigint;
  readonly proof: readonly Hex[];
}

export type BundleInstruction = ClaimRewardInstruction;

/**
 * Executes a sequence of typed instructions atomically on behalf of
 * `caller`.
 */
export interface BundleExecutor {
  readonly address: Address;
  multicall(caller: Address, bundle: readonly BundleInstruction[]): void;
}

// =============================================================================
// Vault & signatures
// =============================================================================

export interface VaultInspector {
  /** The underlying asset of an ERC-4626 vault. */
  asset(vault: Address): Address;
}

export interface SignatureVerifier {
  verify(signer: Address, hash: Hex, signature: Hex): Promise<boolean>;
}
