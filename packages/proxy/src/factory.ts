/**
 * @yield-proxy/proxy — ProxyFactory.
 *
 * Creates one proxy per client and acts as their factory: it is the only
 * caller allowed to initialize them and deposit into them, it owns the
 * allow-list checker, and its operator may claim rewards on any of its
 * proxies.
 *
 * Proxy addresses are supplied by the operator; no derivation scheme is
 * applied.
 */

import { getAddress, isAddressEqual, zeroAddress } from "viem";
import { isFeeBps } from "@yield-proxy/types";
import type { Address, FeeBps, Hex, OperationKind, Selector } from "@yield-proxy/types";
import type { AllowListChecker, FactoryPort } from "./collaborators.js";
import { FactoryError, ProxyError, errorCode } from "./errors.js";
import { splitCalldata } from "./forwarder.js";
import type { Checkpointable } from "./journal.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { YieldProxy } from "./yield-proxy.js";
import type { DepositRequest, DepositResult, ProxyEnvironment } from "./yield-proxy.js";

export interface ProxyFactoryOptions extends ProxyEnvironment {
  readonly address: Address;
  /** May create proxies, deposit on behalf of clients and claim rewards */
  readonly operator: Address;
  readonly treasury: Address;
  readonly allowList: AllowListChecker;
  /** Fee rate for proxies created without one. Defaults to 8700. */
  readonly defaultFeeBps?: FeeBps;
}

export interface CreateProxyParams {
  readonly address: Address;
  readonly client: Address;
  readonly feeBps?: FeeBps;
}

interface RegistryCheckpoint {
  readonly byClient: ReadonlyMap<string, YieldProxy>;
  readonly byAddress: ReadonlyMap<string, YieldProxy>;
}

export const DEFAULT_FEE_BPS: FeeBps = 8700;

export class ProxyFactory implements FactoryPort, Checkpointable<RegistryCheckpoint> {
  readonly address: Address;
  readonly operator: Address;
  readonly treasury: Address;
  readonly defaultFeeBps: FeeBps;

  private _proxies = new Map<string, YieldProxy>();
  private _byAddress = new Map<string, YieldProxy>();
  private readonly allowList: AllowListChecker;
  private readonly env: ProxyEnvironment;
  private readonly logger: Logger;

  constructor(options: ProxyFactoryOptions) {
    this.address = getAddress(options.address);
    this.operator = getAddress(options.operator);
    this.treasury = getAddress(options.treasury);
    this.allowList = options.allowList;
    this.defaultFeeBps = options.defaultFeeBps ?? DEFAULT_FEE_BPS;
    if (!isFeeBps(this.defaultFeeBps)) {
      throw new ProxyError(
        "INVALID_FEE_BPS",
        `Default fee rate must be an integer in (0, 10000], got ${this.defaultFeeBps}`,
      );
    }
    this.env = options;
    this.logger = (options.logger ?? silentLogger()).child({ factory: this.address });
    options.journal.register(this);
  }

  // ─── Registry ────────────────────────────────────────────────────────

  /**
   * Create and initialize the proxy for `params.client`. Operator only.
   * Every argument is checked before the proxy is constructed.
   *
   * @throws FactoryError("PROXY_EXISTS") if the client already has one
   * @throws FactoryError("ADDRESS_IN_USE") if the address holds a proxy
   *   or a hosted contract
   */
  createProxy(caller: Address, params: CreateProxyParams): YieldProxy {
    return this._run("createProxy", caller, () => {
      this._assertOperator(caller);
      const feeBps = params.feeBps ?? this.defaultFeeBps;
      if (!isFeeBps(feeBps)) {
        throw new ProxyError(
          "INVALID_FEE_BPS",
          `Fee rate must be an integer in (0, 10000], got ${feeBps}`,
        );
      }
      if (isAddressEqual(params.client, zeroAddress)) {
        throw new ProxyError("ZERO_ADDRESS_CLIENT", "Client cannot be the zero address");
      }
      if (this.getProxy(params.client) !== undefined) {
        throw new FactoryError(
          "PROXY_EXISTS",
          `Client ${getAddress(params.client)} already has a proxy`,
        );
      }
      this._assertAddressFree(params.address);

      const proxy = new YieldProxy({
        ...this.env,
        address: params.address,
        treasury: this.treasury,
        factory: this,
      });
      proxy.initialize(this.address, params.client, feeBps);
      this._proxies.set(params.client.toLowerCase(), proxy);
      this._byAddress.set(params.address.toLowerCase(), proxy);
      return proxy;
    });
  }

  getProxy(client: Address): YieldProxy | undefined {
    return this._proxies.get(client.toLowerCase());
  }

  getProxyAt(address: Address): YieldProxy | undefined {
    return this._byAddress.get(address.toLowerCase());
  }

  listProxies(): readonly YieldProxy[] {
    return [...this._proxies.values()];
  }

  // ─── Operations ──────────────────────────────────────────────────────

  /**
   * Deposit for `client` through its proxy after checking the deposit
   * instruction against the allow-list. Operator only.
   */
  deposit(caller: Address, client: Address, request: DepositRequest): DepositResult {
    return this._run("deposit", caller, () => {
      this._assertOperator(caller);
      const proxy = this.getProxy(client);
      if (proxy === undefined) {
        throw new FactoryError("PROXY_NOT_FOUND", `No proxy for client ${getAddress(client)}`);
      }
      const { selector, remainder } = splitCalldata(request.data);
      if (!this.checkCalldata(request.target, selector, remainder, "deposit")) {
        throw new FactoryError(
          "CALLDATA_NOT_ALLOWED",
          `Deposit calldata ${selector} to ${getAddress(request.target)} is not allowed`,
        );
      }
      return proxy.deposit(this.address, request);
    });
  }

  // ─── FactoryPort ─────────────────────────────────────────────────────

  checkCalldata(
    target: Address,
    selector: Selector,
    remainder: Hex,
    kind: OperationKind,
  ): boolean {
    return this.allowList.check(target, selector, remainder, kind);
  }

  isClaimAuthorized(caller: Address, _proxy: Address): boolean {
    return isAddressEqual(caller, this.operator);
  }

  // ─── Checkpoint (Rollback) ───────────────────────────────────────────

  checkpoint(): RegistryCheckpoint {
    return { byClient: new Map(this._proxies), byAddress: new Map(this._byAddress) };
  }

  restore(checkpoint: RegistryCheckpoint): void {
    this._proxies = new Map(checkpoint.byClient);
    this._byAddress = new Map(checkpoint.byAddress);
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _assertOperator(caller: Address): void {
    if (!isAddressEqual(caller, this.operator)) {
      throw new FactoryError(
        "UNAUTHORIZED_CALLER",
        `Caller ${getAddress(caller)} is not the operator (${this.operator})`,
      );
    }
  }

  private _assertAddressFree(address: Address): void {
    const taken =
      this.getProxyAt(address) !== undefined ||
      this.env.dispatcher.hasCode(address) ||
      isAddressEqual(address, this.address) ||
      isAddressEqual(address, zeroAddress);
    if (taken) {
      throw new FactoryError(
        "ADDRESS_IN_USE",
        `Address ${getAddress(address)} is not available for a new proxy`,
      );
    }
  }

  private _run<T>(operation: string, caller: Address, fn: () => T): T {
    try {
      const result = this.env.journal.atomically(fn);
      this.logger.info({ operation, caller }, `${operation} completed`);
      return result;
    } catch (err) {
      this.logger.warn({ operation, caller, code: errorCode(err) }, `${operation} rejected`);
      throw err;
    }
  }
}
