/**
 * Chain Types
 *
 * Address and calldata primitives shared by every package.
 *
 * Rules:
 * - Addresses and byte strings use viem's template-literal types
 * - Calls are opaque: target + payload, no interpretation here
 */

import type { Address, Hex } from "viem";

export type { Address, Hex };

/**
 * An opaque instruction: raw calldata aimed at an external target.
 */
export interface Call {
  /** Contract the calldata is sent to */
  readonly target: Address;

  /** ABI-encoded calldata (4-byte selector followed by arguments) */
  readonly data: Hex;
}

/**
 * The first four bytes of calldata, identifying the function called.
 */
export type Selector = Hex;
