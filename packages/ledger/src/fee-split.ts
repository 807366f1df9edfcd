/**
 * Fee Split Engine — performance fees over ledger deltas.
 *
 * Two policies:
 * - Withdrawal: only the band of cumulative profit newly crossed by
 *   this withdrawal is taxed. Principal is never taxed, and profit is
 *   taxed once in aggregate however the withdrawals are sliced.
 * - Reward claim: reward tokens have no principal basis, so the whole
 *   claimed amount is taxed.
 *
 * The treasury takes `10000 - feeBps` bps of the taxed amount, rounded
 * down, so per-call rounding only ever favours the client.
 */

import type { AmountSplit, FeeBps } from "@yield-proxy/types";
import { assertNonNegative, BPS, mulDivDown, positiveDelta, treasuryShareBps } from "./bps-math.js";
import type { WithdrawalSplit, WithdrawalSplitInput } from "./types.js";

/**
 * Split a withdrawal of `newAmount` between treasury and client.
 */
export function computeWithdrawalSplit(input: WithdrawalSplitInput): WithdrawalSplit {
  const { deposited, withdrawnBefore, newAmount, feeBps } = input;
  assertNonNegative(deposited, "deposited");
  assertNonNegative(withdrawnBefore, "withdrawnBefore");
  assertNonNegative(newAmount, "newAmount");
  const treasuryBps = treasuryShareBps(feeBps);

  const withdrawnAfter = withdrawnBefore + newAmount;
  const profitBefore = positiveDelta(withdrawnBefore, deposited);
  const profitAfter = positiveDelta(withdrawnAfter, deposited);
  const newProfit = profitAfter - profitBefore;

  const feeAmount = mulDivDown(newProfit, treasuryBps, BPS);

  return {
    withdrawnAfter,
    profitBefore,
    profitAfter,
    newProfit,
    feeAmount,
    clientAmount: newAmount - feeAmount,
  };
}

/**
 * Split a claimed reward. The full amount counts as profit.
 */
export function computeRewardSplit(claimedAmount: bigint, feeBps: FeeBps): AmountSplit {
  assertNonNegative(claimedAmount, "claimedAmount");
  const feeAmount = mulDivDown(claimedAmount, treasuryShareBps(feeBps), BPS);
  return {
    feeAmount,
    clientAmount: claimedAmount - feeAmount,
  };
}
