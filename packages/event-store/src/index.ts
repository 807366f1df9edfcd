/**
 * @yield-proxy/event-store — Append-only audit log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain over every event
 * - Proxy audit event definitions with zod payload schemas
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";

// Proxy audit events
export {
  PROXY_EVENTS,
  PROXY_EVENT_SCHEMAS,
  isProxyEventType,
  assertProxyEventPayload,
} from "./proxy-events.js";
export type {
  ProxyEventType,
  ProxyEventPayloads,
  InitializedPayload,
  DepositedPayload,
  WithdrawnPayload,
  CalledAnyFunctionPayload,
  RewardClaimedPayload,
} from "./proxy-events.js";
