/**
 * @yield-proxy/ledger — ProxyLedger.
 *
 * The authoritative state of one proxy instance:
 * - Immutable identity (own address, executor, factory, treasury)
 * - Mutable-once client and fee rate
 * - Append-only per-asset deposited / withdrawn totals
 *
 * API surface:
 * - initialize() — Set client and fee rate (one-shot)
 * - recordDeposit() / recordWithdrawal() — Add to a total
 * - getTotalDeposited() / getTotalWithdrawn() / getProfit() — Read totals
 * - checkpoint() / restore() — Rollback support for the state journal
 * - snapshot() / fromSnapshot() — Persistence
 *
 * There is no way to decrease a total or reassign identity.
 */

import { getAddress, isAddressEqual, zeroAddress } from "viem";
import { isAddressLike } from "@yield-proxy/types";
import type { Address, FeeBps, ProxyStatus } from "@yield-proxy/types";
import { assertFeeBps, assertNonNegative, positiveDelta } from "./bps-math.js";
import type {
  LedgerCheckpoint,
  LedgerSnapshot,
  ProxyIdentity,
} from "./types.js";
import { LedgerError } from "./types.js";

export class ProxyLedger {
  readonly address: Address;
  readonly executor: Address;
  readonly factory: Address;
  readonly treasury: Address;

  private _client: Address | undefined;
  private _feeBps: FeeBps = 0;
  private _deposited = new Map<Address, bigint>();
  private _withdrawn = new Map<Address, bigint>();

  constructor(identity: ProxyIdentity) {
    this.address = getAddress(identity.address);
    this.executor = getAddress(identity.executor);
    this.factory = getAddress(identity.factory);
    this.treasury = getAddress(identity.treasury);
  }

  // ─── Identity ────────────────────────────────────────────────────────

  get client(): Address | undefined {
    return this._client;
  }

  /** Client's retained share of profit, in bps. 0 until initialized. */
  get feeBps(): FeeBps {
    return this._feeBps;
  }

  get status(): ProxyStatus {
    return this._client === undefined ? "uninitialized" : "active";
  }

  get identity(): ProxyIdentity {
    return {
      address: this.address,
      executor: this.executor,
      factory: this.factory,
      treasury: this.treasury,
    };
  }

  /**
   * Set client and fee rate. Callable exactly once.
   */
  initialize(client: Address, feeBps: FeeBps): void {
    if (this._client !== undefined) {
      throw new LedgerError(
        "ALREADY_INITIALIZED",
        `Proxy ${this.address} is already initialized for client ${this._client}`,
      );
    }
    assertFeeBps(feeBps);
    if (isAddressEqual(client, zeroAddress)) {
      throw new LedgerError("ZERO_ADDRESS_CLIENT", "Client cannot be the zero address");
    }

    this._client = getAddress(client);
    this._feeBps = feeBps;
  }

  // ─── Totals ──────────────────────────────────────────────────────────

  /**
   * Add `amount` to the deposited total of `asset`. Returns the new total.
   */
  recordDeposit(asset: Address, amount: bigint): bigint {
    return this._add(this._deposited, asset, amount, "deposit amount");
  }

  /**
   * Add `amount` to the withdrawn total of `asset`. Returns the new total.
   */
  recordWithdrawal(asset: Address, amount: bigint): bigint {
    return this._add(this._withdrawn, asset, amount, "withdrawal amount");
  }

  getTotalDeposited(asset: Address): bigint {
    return this._deposited.get(getAddress(asset)) ?? 0n;
  }

  getTotalWithdrawn(asset: Address): bigint {
    return this._withdrawn.get(getAddress(asset)) ?? 0n;
  }

  /**
   * Realised cumulative profit: max(0, withdrawn - deposited).
   */
  getProfit(asset: Address): bigint {
    return positiveDelta(this.getTotalWithdrawn(asset), this.getTotalDeposited(asset));
  }

  private _add(
    totals: Map<Address, bigint>,
    asset: Address,
    amount: bigint,
    label: string,
  ): bigint {
    assertNonNegative(amount, label);
    const key = getAddress(asset);
    const next = (totals.get(key) ?? 0n) + amount;
    totals.set(key, next);
    return next;
  }

  // ─── Checkpoint (Rollback) ───────────────────────────────────────────

  checkpoint(): LedgerCheckpoint {
    return {
      client: this._client,
      feeBps: this._feeBps,
      deposited: new Map(this._deposited),
      withdrawn: new Map(this._withdrawn),
    };
  }

  restore(checkpoint: LedgerCheckpoint): void {
    this._client = checkpoint.client;
    this._feeBps = checkpoint.feeBps;
    this._deposited = new Map(checkpoint.deposited);
    this._withdrawn = new Map(checkpoint.withdrawn);
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      identity: this.identity,
      client: this._client ?? null,
      feeBps: this._feeBps,
      totalDeposited: toRecord(this._deposited),
      totalWithdrawn: toRecord(this._withdrawn),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot, re-validating every field.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): ProxyLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const { address, executor, factory, treasury } = snapshot.identity;
    const ledger = new ProxyLedger({
      address: snapshotAddress(address, "identity.address"),
      executor: snapshotAddress(executor, "identity.executor"),
      factory: snapshotAddress(factory, "identity.factory"),
      treasury: snapshotAddress(treasury, "identity.treasury"),
    });
    if (snapshot.client !== null) {
      ledger.initialize(snapshotAddress(snapshot.client, "client"), snapshot.feeBps);
    } else if (snapshot.feeBps !== 0) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        "Snapshot has a fee rate but no client",
      );
    }

    for (const [asset, amount] of Object.entries(snapshot.totalDeposited)) {
      ledger.recordDeposit(snapshotAddress(asset, "totalDeposited key"), parseTotal(amount));
    }
    for (const [asset, amount] of Object.entries(snapshot.totalWithdrawn)) {
      ledger.recordWithdrawal(snapshotAddress(asset, "totalWithdrawn key"), parseTotal(amount));
    }

    return ledger;
  }
}

function snapshotAddress(value: unknown, field: string): Address {
  if (!isAddressLike(value)) {
    throw new LedgerError("INVALID_SNAPSHOT", `Snapshot ${field} is not an address: ${String(value)}`);
  }
  return getAddress(value);
}

function toRecord(totals: ReadonlyMap<Address, bigint>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [asset, amount] of totals) {
    record[asset] = amount.toString();
  }
  return record;
}

function parseTotal(raw: string): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new LedgerError("INVALID_SNAPSHOT", `Invalid total in snapshot: "${raw}"`);
  }
  return BigInt(raw);
}
