/**
 * @yield-proxy/proxy — Error types.
 *
 * Every failure is a thrown class with a string-union `code`.
 * Collaborator errors (token book, call router, permit primitive) are
 * rethrown unchanged by the proxy.
 */

import type { Address } from "@yield-proxy/types";

// =============================================================================
// Proxy
// =============================================================================

export type ProxyErrorCode =
  // Validation
  | "ZERO_ADDRESS_ASSET"
  | "ZERO_ASSET_AMOUNT"
  | "ZERO_SHARES"
  | "INVALID_FEE_BPS"
  | "ZERO_ADDRESS_CLIENT"
  | "INVALID_CALLDATA"
  | "NOT_INITIALIZED"
  | "ALREADY_INITIALIZED"
  // Authorization
  | "UNAUTHORIZED_CALLER"
  | "CALLDATA_NOT_ALLOWED"
  | "INVALID_SIGNATURE"
  | "REENTRANT_CALL"
  // External outcome
  | "NOTHING_CLAIMED";

export interface ProxyErrorDetails {
  /** The address that attempted the operation */
  readonly caller?: Address;
  /** The address the operation is restricted to */
  readonly expected?: Address;
  readonly cause?: unknown;
}

export class ProxyError extends Error {
  public readonly code: ProxyErrorCode;
  public readonly caller: Address | undefined;
  public readonly expected: Address | undefined;

  constructor(code: ProxyErrorCode, message: string, details: ProxyErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = "ProxyError";
    this.code = code;
    this.caller = details.caller;
    this.expected = details.expected;
  }
}

// =============================================================================
// Factory
// =============================================================================

export type FactoryErrorCode =
  | "UNAUTHORIZED_CALLER"
  | "PROXY_EXISTS"
  | "ADDRESS_IN_USE"
  | "PROXY_NOT_FOUND"
  | "CALLDATA_NOT_ALLOWED";

export class FactoryError extends Error {
  public readonly code: FactoryErrorCode;

  constructor(code: FactoryErrorCode, message: string) {
    super(message);
    this.name = "FactoryError";
    this.code = code;
  }
}

// =============================================================================
// In-process world
// =============================================================================

export type TokenErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_AMOUNT";

export class TokenError extends Error {
  public readonly code: TokenErrorCode;

  constructor(code: TokenErrorCode, message: string) {
    super(message);
    this.name = "TokenError";
    this.code = code;
  }
}

export type CallErrorCode = "NO_CODE" | "REVERTED";

/**
 * A forwarded call that could not be executed, or that the target
 * refused.
 */
export class CallError extends Error {
  public readonly code: CallErrorCode;
  public readonly target: Address;

  constructor(code: CallErrorCode, target: Address, message: string) {
    super(message);
    this.name = "CallError";
    this.code = code;
    this.target = target;
  }
}

export type JournalErrorCode = "DUPLICATE_PARTICIPANT" | "COMMIT_IN_PROGRESS";

export class JournalError extends Error {
  public readonly code: JournalErrorCode;

  constructor(code: JournalErrorCode, message: string) {
    super(message);
    this.name = "JournalError";
    this.code = code;
  }
}

/**
 * The `code` of any error carrying one, for structured logging.
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
