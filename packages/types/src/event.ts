/**
 * Event Types
 *
 * Append-only audit architecture.
 * Every committed state change of a proxy is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Payloads are JSON: amounts travel as base-10 strings
 * - No UPDATE, no DELETE; only new events
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address (or service name) that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID grouping every event emitted by one operation */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: "proxy";
}

/**
 * A domain event in the proxy system.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "proxy.deposited") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
