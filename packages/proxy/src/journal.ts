/**
 * @yield-proxy/proxy — StateJournal.
 *
 * All-or-nothing execution for synchronous operations. Every piece of
 * mutable state an operation may touch (ledgers, token balances, hosted
 * contracts, pending audit events) is registered as a participant.
 *
 * `atomically(fn)` checkpoints every participant, runs `fn`, and on a
 * throw restores every participant before rethrowing. Scopes nest: an
 * inner failure that the outer scope catches rolls back only the inner
 * effects. `commit()` runs on every participant once the outermost
 * scope returns.
 *
 * A failed scope also drops the participants registered inside it, so
 * objects built by a rolled-back operation stop being checkpointed.
 */

import { JournalError } from "./errors.js";

/**
 * State that can be captured and put back.
 *
 * `checkpoint()` must return a value that is not affected by later
 * mutations of the participant.
 */
export interface Checkpointable<T = unknown> {
  checkpoint(): T;
  restore(checkpoint: T): void;
  /** Called after the outermost scope succeeds. */
  commit?(): void;
}

interface SavedState {
  readonly participant: Checkpointable;
  readonly checkpoint: unknown;
}

export class StateJournal {
  private readonly _participants: Checkpointable[] = [];
  private _depth = 0;
  private _committing = false;

  register(participant: Checkpointable): void {
    if (this._participants.includes(participant)) {
      throw new JournalError(
        "DUPLICATE_PARTICIPANT",
        "Participant is already registered with this journal",
      );
    }
    this._participants.push(participant);
  }

  /** Number of open scopes. 0 outside any operation. */
  get depth(): number {
    return this._depth;
  }

  get participantCount(): number {
    return this._participants.length;
  }

  atomically<T>(fn: () => T): T {
    if (this._committing) {
      throw new JournalError(
        "COMMIT_IN_PROGRESS",
        "Cannot open a scope while committing",
      );
    }

    const registered = this._participants.length;
    const saved: SavedState[] = this._participants.map((participant) => ({
      participant,
      checkpoint: participant.checkpoint(),
    }));

    this._depth++;
    let result: T;
    try {
      result = fn();
    } catch (err) {
      for (const { participant, checkpoint } of saved.reverse()) {
        participant.restore(checkpoint);
      }
      this._participants.length = registered;
      throw err;
    } finally {
      this._depth--;
    }

    if (this._depth === 0) {
      this._commit();
    }
    return result;
  }

  private _commit(): void {
    this._committing = true;
    try {
      for (const participant of this._participants) {
        participant.commit?.();
      }
    } finally {
      this._committing = false;
    }
  }
}
