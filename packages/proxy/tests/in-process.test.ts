/**
 * Tests for the in-process vault, reward distributor, permit transfer and
 * allow-list used to host proxies without a chain.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { decodeFunctionResult, encodeFunctionData, maxUint256 } from "viem";
import type { Address, Hex } from "@yield-proxy/types";
import { ERC4626_ABI, REWARD_DISTRIBUTOR_ABI } from "../src/abis.js";
import type { PermitAuthorization } from "../src/collaborators.js";
import { InProcessPermitTransfer } from "../src/in-process/permit.js";
import { InProcessRewardDistributor } from "../src/in-process/reward-distributor.js";
import { StaticAllowList } from "../src/in-process/static-allow-list.js";
import { InMemoryTokenBook } from "../src/in-process/token-book.js";
import { InProcessVault } from "../src/in-process/vault.js";
import { catchError } from "./helpers/world.js";

const ASSET: Address = "0x4000000000000000000000000000000000000001";
const REWARD: Address = "0x4000000000000000000000000000000000000002";
const VAULT: Address = "0x5000000000000000000000000000000000000001";
const DISTRIBUTOR: Address = "0x5000000000000000000000000000000000000002";
const PERMIT: Address = "0x1000000000000000000000000000000000000005";
const ALICE: Address = "0x2000000000000000000000000000000000000001";
const BOB: Address = "0x2000000000000000000000000000000000000002";

function deposit(vault: InProcessVault, caller: Address, assets: bigint, receiver: Address): bigint {
  const data = encodeFunctionData({
    abi: ERC4626_ABI,
    functionName: "deposit",
    args: [assets, receiver],
  });
  return decodeFunctionResult({
    abi: ERC4626_ABI,
    functionName: "deposit",
    data: vault.handle(caller, data),
  });
}

function exit(
  vault: InProcessVault,
  caller: Address,
  functionName: "withdraw" | "redeem",
  amount: bigint,
  receiver: Address,
  owner: Address,
): bigint {
  const data = encodeFunctionData({
    abi: ERC4626_ABI,
    functionName,
    args: [amount, receiver, owner],
  });
  const result: Hex = vault.handle(caller, data);
  return functionName === "withdraw"
    ? decodeFunctionResult({ abi: ERC4626_ABI, functionName: "withdraw", data: result })
    : decodeFunctionResult({ abi: ERC4626_ABI, functionName: "redeem", data: result });
}

describe("InProcessVault", () => {
  let tokens: InMemoryTokenBook;
  let vault: InProcessVault;

  beforeEach(() => {
    tokens = new InMemoryTokenBook();
    vault = new InProcessVault({ address: VAULT, asset: ASSET, tokens });
    tokens.mint(ASSET, ALICE, 10_000n);
    tokens.approve(ASSET, ALICE, VAULT, maxUint256);
  });

  it("reports its asset", () => {
    const data = encodeFunctionData({ abi: ERC4626_ABI, functionName: "asset" });
    const result = decodeFunctionResult({
      abi: ERC4626_ABI,
      functionName: "asset",
      data: vault.handle(ALICE, data),
    });

    expect(result).toBe(ASSET);
  });

  it("mints shares one-to-one into an empty vault", () => {
    const shares = deposit(vault, ALICE, 1_000n, ALICE);

    expect(shares).toBe(1_000n);
    expect(tokens.balanceOf(VAULT, ALICE)).toBe(1_000n);
    expect(vault.totalAssets()).toBe(1_000n);
  });

  it("pulls deposits through the configured spender", () => {
    const viaPermit = new InProcessVault({ address: VAULT, asset: ASSET, tokens, pullVia: PERMIT });

    expect(catchError(() => deposit(viaPermit, ALICE, 1n, ALICE))).toMatchObject({
      code: "INSUFFICIENT_ALLOWANCE",
    });

    tokens.approve(ASSET, ALICE, PERMIT, 5n);
    deposit(viaPermit, ALICE, 5n, ALICE);
    expect(tokens.allowance(ASSET, ALICE, PERMIT)).toBe(0n);
  });

  describe("after yield accrues", () => {
    beforeEach(() => {
      deposit(vault, ALICE, 1_000n, ALICE);
      vault.accrue(100n);
    });

    it("prices shares against total assets", () => {
      expect(vault.convertToAssets(500n)).toBe(550n);
      expect(vault.convertToShares(1_100n)).toBe(1_000n);
    });

    it("rounds withdrawal shares up", () => {
      expect(vault.previewWithdraw(110n)).toBe(100n);
      expect(vault.previewWithdraw(111n)).toBe(101n);
    });

    it("redeems shares for assets", () => {
      const assets = exit(vault, ALICE, "redeem", 500n, BOB, ALICE);

      expect(assets).toBe(550n);
      expect(tokens.balanceOf(ASSET, BOB)).toBe(550n);
      expect(tokens.balanceOf(VAULT, ALICE)).toBe(500n);
      expect(vault.totalSupply()).toBe(500n);
    });

    it("withdraws exact assets", () => {
      const shares = exit(vault, ALICE, "withdraw", 110n, ALICE, ALICE);

      expect(shares).toBe(100n);
      expect(tokens.balanceOf(ASSET, ALICE)).toBe(9_110n);
    });

    it("spends the caller's share allowance when acting for an owner", () => {
      expect(
        catchError(() => exit(vault, BOB, "redeem", 100n, BOB, ALICE)),
      ).toMatchObject({ code: "INSUFFICIENT_ALLOWANCE" });

      tokens.approve(VAULT, ALICE, BOB, 100n);
      exit(vault, BOB, "redeem", 100n, BOB, ALICE);

      expect(tokens.balanceOf(ASSET, BOB)).toBe(110n);
      expect(tokens.balanceOf(VAULT, ALICE)).toBe(900n);
      expect(tokens.allowance(VAULT, ALICE, BOB)).toBe(0n);
    });
  });

  describe("with shares outstanding and no assets", () => {
    beforeEach(() => {
      deposit(vault, ALICE, 1_000n, ALICE);
      tokens.burn(ASSET, VAULT, 1_000n);
    });

    it("prices new deposits one-to-one", () => {
      expect(vault.convertToShares(500n)).toBe(500n);
    });

    it("reverts a withdrawal instead of dividing by zero", () => {
      expect(catchError(() => vault.previewWithdraw(1n))).toMatchObject({
        code: "REVERTED",
        target: VAULT,
      });
      expect(vault.previewWithdraw(0n)).toBe(0n);
    });

    it("redeems shares for nothing", () => {
      expect(exit(vault, ALICE, "redeem", 1_000n, ALICE, ALICE)).toBe(0n);
      expect(vault.totalSupply()).toBe(0n);
    });
  });

  it("rejects calldata it does not understand", () => {
    expect(() => vault.handle(ALICE, "0xdeadbeef")).toThrow();
  });
});

describe("InProcessRewardDistributor", () => {
  let tokens: InMemoryTokenBook;
  let distributor: InProcessRewardDistributor;

  function claim(claimable: bigint): bigint {
    const data = encodeFunctionData({
      abi: REWARD_DISTRIBUTOR_ABI,
      functionName: "claim",
      args: [ALICE, REWARD, claimable, []],
    });
    return decodeFunctionResult({
      abi: REWARD_DISTRIBUTOR_ABI,
      functionName: "claim",
      data: distributor.handle(BOB, data),
    });
  }

  beforeEach(() => {
    tokens = new InMemoryTokenBook();
    distributor = new InProcessRewardDistributor(DISTRIBUTOR, tokens);
    tokens.mint(REWARD, DISTRIBUTOR, 1_000n);
    distributor.setEntitlement(ALICE, REWARD, 100n);
  });

  it("pays the account, whoever submits the claim", () => {
    expect(claim(60n)).toBe(60n);
    expect(tokens.balanceOf(REWARD, ALICE)).toBe(60n);
    expect(tokens.balanceOf(REWARD, BOB)).toBe(0n);
    expect(distributor.claimed(ALICE, REWARD)).toBe(60n);
  });

  it("pays only the difference on later claims", () => {
    claim(60n);

    expect(claim(100n)).toBe(40n);
    expect(claim(100n)).toBe(0n);
    expect(tokens.balanceOf(REWARD, ALICE)).toBe(100n);
  });

  it("reverts above the entitlement", () => {
    expect(catchError(() => claim(101n))).toMatchObject({
      code: "REVERTED",
      target: DISTRIBUTOR,
    });
  });

  it("refuses to lower an entitlement", () => {
    expect(catchError(() => distributor.setEntitlement(ALICE, REWARD, 99n))).toMatchObject({
      code: "REVERTED",
    });
  });

  it("restores claimed amounts from a checkpoint", () => {
    const saved = distributor.checkpoint();
    claim(60n);
    distributor.restore(saved);

    expect(distributor.claimed(ALICE, REWARD)).toBe(0n);
  });
});

describe("InProcessPermitTransfer", () => {
  let tokens: InMemoryTokenBook;
  let permit: InProcessPermitTransfer;

  function authorization(overrides: Partial<PermitAuthorization> = {}): PermitAuthorization {
    return {
      token: ASSET,
      amount: 50n,
      nonce: 0n,
      deadline: 1_000n,
      signature: "0x",
      ...overrides,
    };
  }

  beforeEach(() => {
    tokens = new InMemoryTokenBook();
    permit = new InProcessPermitTransfer(PERMIT, tokens, { now: () => 1_000n });
    tokens.mint(ASSET, ALICE, 100n);
    tokens.approve(ASSET, ALICE, PERMIT, maxUint256);
  });

  it("moves the authorized amount and consumes the nonce", () => {
    permit.permitTransferFrom(ALICE, authorization(), BOB);

    expect(tokens.balanceOf(ASSET, BOB)).toBe(50n);
    expect(permit.isNonceUsed(ALICE, 0n)).toBe(true);
    expect(permit.isNonceUsed(BOB, 0n)).toBe(false);
  });

  it("rejects an expired authorization", () => {
    expect(
      catchError(() => permit.permitTransferFrom(ALICE, authorization({ deadline: 999n }), BOB)),
    ).toMatchObject({ code: "REVERTED", target: PERMIT });
    expect(permit.isNonceUsed(ALICE, 0n)).toBe(false);
  });

  it("rejects a reused nonce", () => {
    permit.permitTransferFrom(ALICE, authorization(), BOB);

    expect(catchError(() => permit.permitTransferFrom(ALICE, authorization(), BOB))).toMatchObject({
      code: "REVERTED",
    });
    expect(tokens.balanceOf(ASSET, BOB)).toBe(50n);
  });

  it("requires the owner's standing allowance", () => {
    tokens.approve(ASSET, ALICE, PERMIT, 0n);

    expect(catchError(() => permit.permitTransferFrom(ALICE, authorization(), BOB))).toMatchObject({
      code: "INSUFFICIENT_ALLOWANCE",
    });
  });

  it("restores used nonces from a checkpoint", () => {
    const saved = permit.checkpoint();
    permit.permitTransferFrom(ALICE, authorization(), BOB);
    permit.restore(saved);

    expect(permit.isNonceUsed(ALICE, 0n)).toBe(false);
  });
});

describe("StaticAllowList", () => {
  const TARGET: Address = "0xabcdef0000000000000000000000000000000001";

  it("matches target, selector and kind", () => {
    const list = new StaticAllowList().allow(TARGET, "0xA9059CBB", ["deposit", "withdrawal"]);

    const upper: Address = "0xABCDEF0000000000000000000000000000000001";

    expect(list.check(upper, "0xa9059cbb", "0x", "deposit")).toBe(true);
    expect(list.check(TARGET, "0xa9059cbb", "0x1234", "withdrawal")).toBe(true);
    expect(list.check(TARGET, "0xa9059cbb", "0x", "any")).toBe(false);
    expect(list.check(TARGET, "0x095ea7b3", "0x", "deposit")).toBe(false);
  });

  it("revokes a single kind", () => {
    const list = new StaticAllowList().allow(TARGET, "0xa9059cbb", ["deposit", "withdrawal"]);
    list.revoke(TARGET, "0xa9059cbb", "deposit");

    expect(list.check(TARGET, "0xa9059cbb", "0x", "deposit")).toBe(false);
    expect(list.check(TARGET, "0xa9059cbb", "0x", "withdrawal")).toBe(true);
  });
});
