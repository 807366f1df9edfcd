/**
 * Tests for YieldProxy.claimReward: flat reward split and claim
 * authorization.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { ClaimRewardRequest } from "../src/yield-proxy.js";
import {
  CLIENT,
  DISTRIBUTOR,
  OPERATOR,
  PROXY,
  REWARD,
  STRANGER,
  TREASURY,
  catchError,
  createWorld,
  eventTypes,
} from "./helpers/world.js";
import type { World } from "./helpers/world.js";

function claim(amount: bigint): ClaimRewardRequest {
  return { distributor: DISTRIBUTOR, reward: REWARD, amount, proof: [] };
}

describe("YieldProxy.claimReward", () => {
  let world: World;

  beforeEach(() => {
    world = createWorld();
    world.tokens.mint(REWARD, DISTRIBUTOR, 5_000_000n);
    world.distributor.setEntitlement(PROXY, REWARD, 1_000_000n);
  });

  it("splits a 1,000,000 claim: 130,000 to treasury, 870,000 to client", () => {
    const result = world.proxy.claimReward(CLIENT, claim(1_000_000n));

    expect(result).toEqual({
      reward: REWARD,
      amount: 1_000_000n,
      feeAmount: 130_000n,
      clientAmount: 870_000n,
    });
    expect(world.tokens.balanceOf(REWARD, TREASURY)).toBe(130_000n);
    expect(world.tokens.balanceOf(REWARD, CLIENT)).toBe(870_000n);
    expect(world.tokens.balanceOf(REWARD, PROXY)).toBe(0n);
  });

  it("does not touch the principal ledger", () => {
    world.proxy.claimReward(CLIENT, claim(1_000_000n));

    expect(world.proxy.getTotalDeposited(REWARD)).toBe(0n);
    expect(world.proxy.getTotalWithdrawn(REWARD)).toBe(0n);
  });

  it("emits proxy.reward_claimed", () => {
    world.proxy.claimReward(CLIENT, claim(1_000_000n));

    const events = world.events.read(world.proxy.streamId);
    expect(events[1]?.event.type).toBe("proxy.reward_claimed");
    expect(events[1]?.event.payload).toEqual({
      distributor: DISTRIBUTOR,
      reward: REWARD,
      amount: "1000000",
      feeAmount: "130000",
      clientAmount: "870000",
    });
  });

  it("lets the factory operator claim for the client", () => {
    const result = world.proxy.claimReward(OPERATOR, claim(1_000_000n));

    expect(result.clientAmount).toBe(870_000n);
    expect(world.tokens.balanceOf(REWARD, CLIENT)).toBe(870_000n);
    expect(world.events.read(world.proxy.streamId)[1]?.event.metadata.actor).toBe(OPERATOR);
  });

  it("rejects anyone else", () => {
    const err = catchError(() => world.proxy.claimReward(STRANGER, claim(1_000_000n)));

    expect(err).toMatchObject({
      code: "UNAUTHORIZED_CALLER",
      caller: STRANGER,
      expected: CLIENT,
    });
    expect(world.distributor.claimed(PROXY, REWARD)).toBe(0n);
  });

  it("fails when the claim delivers nothing and leaves no trace", () => {
    world.proxy.claimReward(CLIENT, claim(1_000_000n));

    const err = catchError(() => world.proxy.claimReward(CLIENT, claim(1_000_000n)));

    expect(err).toMatchObject({ code: "NOTHING_CLAIMED" });
    expect(world.tokens.balanceOf(REWARD, CLIENT)).toBe(870_000n);
    expect(eventTypes(world)).toEqual(["proxy.initialized", "proxy.reward_claimed"]);
  });

  it("pays only the increase of a cumulative entitlement", () => {
    world.proxy.claimReward(CLIENT, claim(1_000_000n));
    world.distributor.setEntitlement(PROXY, REWARD, 1_500_000n);

    const result = world.proxy.claimReward(CLIENT, claim(1_500_000n));

    expect(result.amount).toBe(500_000n);
    expect(result.feeAmount).toBe(65_000n);
    expect(result.clientAmount).toBe(435_000n);
  });

  it("propagates a distributor revert unchanged", () => {
    const err = catchError(() => world.proxy.claimReward(CLIENT, claim(2_000_000n)));

    expect(err).toMatchObject({ name: "CallError", code: "REVERTED", target: DISTRIBUTOR });
  });

  it("rounds the fee down on small claims", () => {
    world.distributor.setEntitlement(PROXY, REWARD, 1_000_015n);
    world.proxy.claimReward(CLIENT, claim(1_000_000n));

    const result = world.proxy.claimReward(CLIENT, claim(1_000_015n));

    expect(result.feeAmount).toBe(1n);
    expect(result.clientAmount).toBe(14n);
  });
});
