/**
 * @yield-proxy/proxy — YieldProxy.
 *
 * A custodial proxy holding one client's assets in an external yield
 * protocol. It forwards opaque deposit and withdrawal instructions and
 * splits realised profit with the treasury at the client's fee rate.
 *
 * Every mutating operation:
 * - runs inside one journal scope (all-or-nothing, audit events are
 *   written only when the outermost scope commits)
 * - checks its role before anything else
 * - records ledger effects before moving value
 *
 * Guarded operations (withdraw, callAnyFunction, claimReward) share one
 * reentrancy lock. Deposit is only reachable through the factory and is
 * not guarded.
 */

import { randomUUID } from "node:crypto";
import { getAddress, isAddressEqual, maxUint256, zeroAddress } from "viem";
import { PROXY_EVENTS } from "@yield-proxy/event-store";
import type {
  EventStore,
  ProxyEventPayloads,
  ProxyEventType,
} from "@yield-proxy/event-store";
import {
  ProxyLedger,
  computeRewardSplit,
  computeWithdrawalSplit,
} from "@yield-proxy/ledger";
import type { LedgerSnapshot } from "@yield-proxy/ledger";
import type {
  Address,
  AmountSplit,
  Call,
  FeeBps,
  Hex,
  OperationKind,
  ProxyStatus,
  Selector,
} from "@yield-proxy/types";
import { AccessController, unauthorized } from "./access-controller.js";
import type {
  BundleExecutor,
  CallDispatcher,
  FactoryPort,
  PermitAuthorization,
  PermitTransfer,
  SignatureVerifier,
  TokenBook,
  VaultInspector,
} from "./collaborators.js";
import { ProxyError, errorCode } from "./errors.js";
import { CalldataForwarder, splitCalldata } from "./forwarder.js";
import type { StateJournal } from "./journal.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { EventOutbox } from "./outbox.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";

/** ERC-1271 `isValidSignature` magic value. */
export const ERC1271_MAGIC_VALUE: Hex = "0x1626ba7e";

// =============================================================================
// Options
// =============================================================================

/**
 * The collaborators every proxy of one deployment shares.
 */
export interface ProxyEnvironment {
  readonly tokens: TokenBook;
  readonly dispatcher: CallDispatcher;
  readonly permit: PermitTransfer;
  readonly executor: BundleExecutor;
  readonly vaults: VaultInspector;
  readonly signatures: SignatureVerifier;
  readonly journal: StateJournal;
  readonly events: EventStore;
  readonly logger?: Logger;
}

export interface YieldProxyOptions extends ProxyEnvironment {
  readonly address: Address;
  readonly treasury: Address;
  readonly factory: FactoryPort;
}

// =============================================================================
// Requests & Results
// =============================================================================

export interface DepositRequest {
  /** Yield protocol entry point */
  readonly target: Address;
  readonly data: Hex;
  readonly permit: PermitAuthorization;
}

export interface DepositResult {
  readonly asset: Address;
  readonly amount: bigint;
  readonly totalDeposited: bigint;
}

export interface WithdrawRequest {
  readonly target: Address;
  readonly data: Hex;
  /** ERC-4626 vault whose shares are redeemed */
  readonly vault: Address;
  /** Share allowance granted to `target` */
  readonly shares: bigint;
}

export interface WithdrawResult extends AmountSplit {
  readonly asset: Address;
  /** Underlying asset the proxy received */
  readonly amount: bigint;
  readonly newProfit: bigint;
  readonly totalWithdrawn: bigint;
}

export interface ClaimRewardRequest {
  readonly distributor: Address;
  readonly reward: Address;
  /** Cumulative claimable amount */
  readonly amount: bigint;
  readonly proof: readonly Hex[];
}

export interface ClaimRewardResult extends AmountSplit {
  readonly reward: Address;
  /** Reward tokens the claim delivered to the proxy */
  readonly amount: bigint;
}

// =============================================================================
// YieldProxy
// =============================================================================

export class YieldProxy {
  private readonly ledger: ProxyLedger;
  private readonly access: AccessController;
  private readonly guard = new ReentrancyGuard();
  private readonly forwarder: CalldataForwarder;
  private readonly outbox: EventOutbox;
  private readonly factoryPort: FactoryPort;
  private readonly env: ProxyEnvironment;
  private readonly logger: Logger;
  private _correlationId: string | undefined;

  constructor(options: YieldProxyOptions) {
    this.ledger = new ProxyLedger({
      address: options.address,
      executor: options.executor.address,
      factory: options.factory.address,
      treasury: options.treasury,
    });
    this.access = new AccessController(this.ledger);
    this.forwarder = new CalldataForwarder(this.ledger.address, options.dispatcher);
    this.outbox = new EventOutbox(options.events, `proxy:${this.ledger.address}`);
    this.factoryPort = options.factory;
    this.env = options;
    this.logger = (options.logger ?? silentLogger()).child({ proxy: this.ledger.address });

    options.journal.register(this.ledger);
    options.journal.register(this.outbox);
  }

  // ─── Accessors ───────────────────────────────────────────────────────

  get address(): Address {
    return this.ledger.address;
  }

  get factory(): Address {
    return this.ledger.factory;
  }

  get treasury(): Address {
    return this.ledger.treasury;
  }

  get executor(): Address {
    return this.ledger.executor;
  }

  get client(): Address | undefined {
    return this.ledger.client;
  }

  get feeBps(): FeeBps {
    return this.ledger.feeBps;
  }

  get status(): ProxyStatus {
    return this.ledger.status;
  }

  /** Audit stream this proxy writes to. */
  get streamId(): string {
    return this.outbox.streamId;
  }

  getTotalDeposited(asset: Address): bigint {
    return this.ledger.getTotalDeposited(asset);
  }

  getTotalWithdrawn(asset: Address): bigint {
    return this.ledger.getTotalWithdrawn(asset);
  }

  getProfit(asset: Address): bigint {
    return this.ledger.getProfit(asset);
  }

  snapshot(): LedgerSnapshot {
    return this.ledger.snapshot();
  }

  // ─── Operations ──────────────────────────────────────────────────────

  /**
   * Bind the proxy to its client and fee rate. Factory only, once.
   */
  initialize(caller: Address, client: Address, feeBps: FeeBps): void {
    this._run("initialize", caller, () => {
      this.access.assertFactory(caller);
      this.access.assertFeeBps(feeBps);
      if (isAddressEqual(client, zeroAddress)) {
        throw new ProxyError("ZERO_ADDRESS_CLIENT", "Client cannot be the zero address");
      }
      if (this.ledger.client !== undefined) {
        throw new ProxyError(
          "ALREADY_INITIALIZED",
          `Proxy ${this.address} is already initialized for client ${this.ledger.client}`,
        );
      }

      this.ledger.initialize(client, feeBps);
      this._emit(PROXY_EVENTS.INITIALIZED, caller, {
        client: getAddress(client),
        feeBps,
      });
    });
  }

  /**
   * Pull the client's funds with a permit and forward them to the yield
   * protocol. Factory only.
   */
  deposit(caller: Address, request: DepositRequest): DepositResult {
    return this._run("deposit", caller, () => {
      this.access.assertFactory(caller);
      const client = this._requireClient();
      const asset = request.permit.token;
      const amount = request.permit.amount;

      if (isAddressEqual(asset, zeroAddress)) {
        throw new ProxyError("ZERO_ADDRESS_ASSET", "Deposit asset cannot be the zero address");
      }
      if (amount <= 0n) {
        throw new ProxyError("ZERO_ASSET_AMOUNT", "Deposit amount must be greater than zero");
      }

      const totalDeposited = this.ledger.recordDeposit(asset, amount);
      this._emit(PROXY_EVENTS.DEPOSITED, caller, {
        target: getAddress(request.target),
        asset: getAddress(asset),
        amount: amount.toString(),
        totalDeposited: totalDeposited.toString(),
      });

      const { tokens, permit } = this.env;
      permit.permitTransferFrom(client, request.permit, this.address);
      if (tokens.allowance(asset, this.address, permit.address) === 0n) {
        tokens.approve(asset, this.address, permit.address, maxUint256);
      }
      this.forwarder.forward({ target: request.target, data: request.data });

      return { asset: getAddress(asset), amount, totalDeposited };
    });
  }

  /**
   * Redeem vault shares through an allowed instruction and split the
   * released assets. Client only.
   */
  withdraw(caller: Address, request: WithdrawRequest): WithdrawResult {
    return this._run("withdraw", caller, () => {
      this.access.assertClient(caller);
      return this.guard.run("withdraw", () => {
        this._assertAllowed(request, "withdrawal");
        if (request.shares <= 0n) {
          throw new ProxyError("ZERO_SHARES", "Shares to withdraw must be greater than zero");
        }
        const client = this._requireClient();
        const { tokens, vaults } = this.env;

        const asset = vaults.asset(request.vault);
        const balanceBefore = tokens.balanceOf(asset, this.address);
        tokens.increaseAllowance(request.vault, this.address, request.target, request.shares);
        this.forwarder.forward(request);
        const newAmount = tokens.balanceOf(asset, this.address) - balanceBefore;

        const split = computeWithdrawalSplit({
          deposited: this.ledger.getTotalDeposited(asset),
          withdrawnBefore: this.ledger.getTotalWithdrawn(asset),
          newAmount,
          feeBps: this.ledger.feeBps,
        });
        const totalWithdrawn = this.ledger.recordWithdrawal(asset, newAmount);

        this._payOut(asset, split, client);
        this._emit(PROXY_EVENTS.WITHDRAWN, caller, {
          target: getAddress(request.target),
          vault: getAddress(request.vault),
          asset: getAddress(asset),
          shares: request.shares.toString(),
          amount: newAmount.toString(),
          totalWithdrawn: totalWithdrawn.toString(),
          newProfit: split.newProfit.toString(),
          feeAmount: split.feeAmount.toString(),
          clientAmount: split.clientAmount.toString(),
        });

        return {
          asset: getAddress(asset),
          amount: newAmount,
          newProfit: split.newProfit,
          feeAmount: split.feeAmount,
          clientAmount: split.clientAmount,
          totalWithdrawn,
        };
      });
    });
  }

  /**
   * Forward an allowed instruction with no accounting effect. Client only.
   */
  callAnyFunction(caller: Address, call: Call): Hex {
    return this._run("callAnyFunction", caller, () => {
      this.access.assertClient(caller);
      return this.guard.run("callAnyFunction", () => {
        this._assertAllowed(call, "any");
        const result = this.forwarder.forward(call);
        this._emit(PROXY_EVENTS.CALLED_ANY_FUNCTION, caller, {
          target: getAddress(call.target),
        });
        return result;
      });
    });
  }

  /**
   * Claim distributor rewards through the bundling executor and split
   * the whole claimed amount. The client, or anyone the factory
   * authorizes.
   */
  claimReward(caller: Address, request: ClaimRewardRequest): ClaimRewardResult {
    return this._run("claimReward", caller, () =>
      this.guard.run("claimReward", () => {
        const client = this._requireClient();
        if (
          !this.access.isClient(caller) &&
          !this.factoryPort.isClaimAuthorized(caller, this.address)
        ) {
          throw unauthorized(caller, client, "client or an authorized claimer");
        }
        const { tokens, executor } = this.env;

        const balanceBefore = tokens.balanceOf(request.reward, this.address);
        executor.multicall(this.address, [
          {
            kind: "claimReward",
            distributor: request.distributor,
            account: this.address,
            reward: request.reward,
            amount: request.amount,
            proof: request.proof,
          },
        ]);
        const claimed = tokens.balanceOf(request.reward, this.address) - balanceBefore;
        if (claimed <= 0n) {
          throw new ProxyError(
            "NOTHING_CLAIMED",
            `Claim from ${getAddress(request.distributor)} delivered no ${getAddress(request.reward)}`,
          );
        }

        const split = computeRewardSplit(claimed, this.ledger.feeBps);
        this._payOut(request.reward, split, client);
        this._emit(PROXY_EVENTS.REWARD_CLAIMED, caller, {
          distributor: getAddress(request.distributor),
          reward: getAddress(request.reward),
          amount: claimed.toString(),
          feeAmount: split.feeAmount.toString(),
          clientAmount: split.clientAmount.toString(),
        });

        return {
          reward: getAddress(request.reward),
          amount: claimed,
          feeAmount: split.feeAmount,
          clientAmount: split.clientAmount,
        };
      }),
    );
  }

  // ─── Read-only ───────────────────────────────────────────────────────

  checkCalldata(
    target: Address,
    selector: Selector,
    remainder: Hex,
    kind: OperationKind,
  ): boolean {
    return this.factoryPort.checkCalldata(target, selector, remainder, kind);
  }

  /**
   * ERC-1271 style check that the client signed `hash`.
   *
   * @returns the magic value `0x1626ba7e`
   * @throws ProxyError("INVALID_SIGNATURE") for any other signer
   */
  async validateSignature(hash: Hex, signature: Hex): Promise<Hex> {
    const client = this._requireClient();
    let valid: boolean;
    try {
      valid = await this.env.signatures.verify(client, hash, signature);
    } catch (err) {
      throw new ProxyError("INVALID_SIGNATURE", "Signature could not be recovered", {
        cause: err,
      });
    }
    if (!valid) {
      throw new ProxyError("INVALID_SIGNATURE", `Signature is not from client ${client}`);
    }
    return ERC1271_MAGIC_VALUE;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _requireClient(): Address {
    const client = this.ledger.client;
    if (client === undefined) {
      throw new ProxyError("NOT_INITIALIZED", `Proxy ${this.address} is not initialized`);
    }
    return client;
  }

  private _assertAllowed(call: Call, kind: OperationKind): void {
    const { selector, remainder } = splitCalldata(call.data);
    if (!this.factoryPort.checkCalldata(call.target, selector, remainder, kind)) {
      throw new ProxyError(
        "CALLDATA_NOT_ALLOWED",
        `Calldata ${selector} to ${getAddress(call.target)} is not allowed for ${kind}`,
      );
    }
  }

  /** Treasury first, and only when there is a fee; the client always. */
  private _payOut(token: Address, split: AmountSplit, client: Address): void {
    if (split.feeAmount > 0n) {
      this.env.tokens.transfer(token, this.address, this.treasury, split.feeAmount);
    }
    this.env.tokens.transfer(token, this.address, client, split.clientAmount);
  }

  private _emit<T extends ProxyEventType>(
    type: T,
    actor: Address,
    payload: ProxyEventPayloads[T],
  ): void {
    this.outbox.enqueue(type, payload, {
      actor: getAddress(actor),
      correlationId: this._correlationId ?? randomUUID(),
    });
  }

  /**
   * Run `fn` as one atomic operation and log its outcome.
   */
  private _run<T>(operation: string, caller: Address, fn: () => T): T {
    const outer = this._correlationId;
    this._correlationId = randomUUID();
    try {
      const result = this.env.journal.atomically(fn);
      this.logger.info(
        { operation, caller, correlationId: this._correlationId },
        `${operation} completed`,
      );
      return result;
    } catch (err) {
      this.logger.warn(
        { operation, caller, correlationId: this._correlationId, code: errorCode(err) },
        `${operation} rejected`,
      );
      throw err;
    } finally {
      this._correlationId = outer;
    }
  }
}
