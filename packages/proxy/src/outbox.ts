/**
 * @yield-proxy/proxy — EventOutbox.
 *
 * Audit events raised during an operation are held here and reach the
 * event store only when the outermost journal scope commits. A rolled
 * back operation leaves no trace in the log.
 */

import { randomUUID } from "node:crypto";
import { assertProxyEventPayload } from "@yield-proxy/event-store";
import type {
  AppendResult,
  EventStore,
  ProxyEventPayloads,
  ProxyEventType,
} from "@yield-proxy/event-store";
import type { Address, DomainEvent } from "@yield-proxy/types";
import type { Checkpointable } from "./journal.js";

export interface OutboxContext {
  readonly actor: Address;
  readonly correlationId: string;
}

export class EventOutbox implements Checkpointable<number> {
  private _pending: DomainEvent[] = [];
  private _lastAppend: AppendResult | undefined;

  constructor(
    private readonly store: EventStore,
    readonly streamId: string,
  ) {}

  get pending(): readonly DomainEvent[] {
    return this._pending;
  }

  get lastAppend(): AppendResult | undefined {
    return this._lastAppend;
  }

  /**
   * Validate and queue an event.
   *
   * @throws EventStoreError("INVALID_PAYLOAD")
   */
  enqueue<T extends ProxyEventType>(
    type: T,
    payload: ProxyEventPayloads[T],
    context: OutboxContext,
  ): void {
    assertProxyEventPayload(type, payload);
    this._pending.push({
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date().toISOString(),
        actor: context.actor,
        correlationId: context.correlationId,
        source: "proxy",
      },
      payload,
    });
  }

  // ─── Journal participation ───────────────────────────────────────────

  checkpoint(): number {
    return this._pending.length;
  }

  restore(length: number): void {
    this._pending = this._pending.slice(0, length);
  }

  /**
   * Append every pending event. If the store rejects the batch the events
   * stay pending and go out with the next commit.
   */
  commit(): void {
    if (this._pending.length === 0) return;
    this._lastAppend = this.store.append(this.streamId, this._pending, {
      expectedVersion: this.store.streamVersion(this.streamId),
    });
    this._pending = [];
  }
}
