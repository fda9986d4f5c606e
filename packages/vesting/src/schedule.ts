/**
 * Unlock curve.
 *
 * All windows are anchored on the plan's trigger time (tge), not its
 * nominal start date:
 *
 *   cliffDate = tge + cliffDuration
 *   endDate   = tge + totalDuration
 *
 *   now <  tge                    → 0
 *   tge ≤ now ≤ cliffDate         → initial slice
 *   cliffDate < now < endDate     → initial slice + linear share of the rest
 *   now ≥ endDate                 → total
 */

import { applyBasisPoints, mulDiv } from "@allotment/ledger";
import type { Timestamp, TokenAmount } from "@allotment/types";
import type { VestingPlan } from "./types.js";

type Curve = Pick<VestingPlan, "cliffDuration" | "totalDuration" | "initialReleasePercentage">;

/**
 * Amount of `totalAmount` unlocked at `now` under `plan` triggered at `tge`.
 */
export function computeReleasedAmount(
  plan: Curve,
  tge: Timestamp,
  totalAmount: TokenAmount,
  now: Timestamp,
): TokenAmount {
  const endDate = tge + plan.totalDuration;
  const cliffDate = tge + plan.cliffDuration;

  if (now >= endDate) {
    return totalAmount;
  }
  if (now < tge) {
    return 0n;
  }

  const initialSlice = applyBasisPoints(totalAmount, plan.initialReleasePercentage);
  if (now <= cliffDate) {
    return initialSlice;
  }

  const remaining = totalAmount - initialSlice;
  return (
    initialSlice +
    mulDiv(remaining, BigInt(now - cliffDate), BigInt(endDate - cliffDate))
  );
}
