/**
 * @yield-proxy/event-store — Proxy audit event definitions.
 *
 * One event per committed state-changing proxy operation.
 *
 * Naming convention: `proxy.<action>`
 *
 * Payloads are JSON: addresses are hex strings, amounts are base-10
 * integer strings. Each event type has a zod schema that is checked
 * before the event is queued.
 */

import { isAddress } from "viem";
import { z } from "zod";
import { EventStoreError } from "./types.js";

// =============================================================================
// Event Types
// =============================================================================

export const PROXY_EVENTS = {
  INITIALIZED: "proxy.initialized",
  DEPOSITED: "proxy.deposited",
  WITHDRAWN: "proxy.withdrawn",
  CALLED_ANY_FUNCTION: "proxy.called_any_function",
  REWARD_CLAIMED: "proxy.reward_claimed",
} as const;

export type ProxyEventType = (typeof PROXY_EVENTS)[keyof typeof PROXY_EVENTS];

// =============================================================================
// Schemas
// =============================================================================

const AddressSchema = z.string().refine((value) => isAddress(value), {
  message: "Invalid address",
});

const AmountSchema = z.string().regex(/^\d+$/, "Amount must be a base-10 integer string");

export const InitializedPayloadSchema = z.object({
  client: AddressSchema,
  feeBps: z.number().int().min(1).max(10_000),
});

export const DepositedPayloadSchema = z.object({
  target: AddressSchema,
  asset: AddressSchema,
  amount: AmountSchema,
  totalDeposited: AmountSchema,
});

export const WithdrawnPayloadSchema = z.object({
  target: AddressSchema,
  vault: AddressSchema,
  asset: AddressSchema,
  shares: AmountSchema,
  amount: AmountSchema,
  totalWithdrawn: AmountSchema,
  newProfit: AmountSchema,
  feeAmount: AmountSchema,
  clientAmount: AmountSchema,
});

export const CalledAnyFunctionPayloadSchema = z.object({
  target: AddressSchema,
});

export const RewardClaimedPayloadSchema = z.object({
  distributor: AddressSchema,
  reward: AddressSchema,
  amount: AmountSchema,
  feeAmount: AmountSchema,
  clientAmount: AmountSchema,
});

export type InitializedPayload = z.infer<typeof InitializedPayloadSchema>;
export type DepositedPayload = z.infer<typeof DepositedPayloadSchema>;
export type WithdrawnPayload = z.infer<typeof WithdrawnPayloadSchema>;
export type CalledAnyFunctionPayload = z.infer<typeof CalledAnyFunctionPayloadSchema>;
export type RewardClaimedPayload = z.infer<typeof RewardClaimedPayloadSchema>;

/**
 * Payload shape for each proxy event type.
 */
export interface ProxyEventPayloads {
  "proxy.initialized": InitializedPayload;
  "proxy.deposited": DepositedPayload;
  "proxy.withdrawn": WithdrawnPayload;
  "proxy.called_any_function": CalledAnyFunctionPayload;
  "proxy.reward_claimed": RewardClaimedPayload;
}

export const PROXY_EVENT_SCHEMAS = {
  "proxy.initialized": InitializedPayloadSchema,
  "proxy.deposited": DepositedPayloadSchema,
  "proxy.withdrawn": WithdrawnPayloadSchema,
  "proxy.called_any_function": CalledAnyFunctionPayloadSchema,
  "proxy.reward_claimed": RewardClaimedPayloadSchema,
} as const satisfies Record<ProxyEventType, z.ZodTypeAny>;

// =============================================================================
// Validation
// =============================================================================

export function isProxyEventType(value: string): value is ProxyEventType {
  return Object.prototype.hasOwnProperty.call(PROXY_EVENT_SCHEMAS, value);
}

/**
 * Validate a payload against the schema of its event type.
 *
 * @throws EventStoreError("INVALID_PAYLOAD") listing every schema issue
 */
export function assertProxyEventPayload(type: ProxyEventType, payload: unknown): void {
  const result = PROXY_EVENT_SCHEMAS[type].safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new EventStoreError("INVALID_PAYLOAD", `Invalid ${type} payload: ${issues}`);
  }
}
