/**
 * Default pool seed.
 *
 * 1,000,000,000 tokens at 18 decimals, split across the eight pools.
 */

import { toBaseUnits } from "@allotment/ledger";
import { POOL_LABELS } from "@allotment/types";
import type { PoolLabel, TokenAmount } from "@allotment/types";
import type { PoolAllocation } from "./types.js";

export const TOKEN_DECIMALS = 18;

export const TOTAL_SUPPLY: TokenAmount = toBaseUnits(1_000_000_000n, TOKEN_DECIMALS);

/** Percent of the total supply per pool. Sums to 100. */
const POOL_SHARES: Readonly<Record<PoolLabel, bigint>> = {
  Seed: 5n,
  PrivateSale: 10n,
  PublicSale: 5n,
  Team: 15n,
  Advisors: 5n,
  Rewards: 20n,
  GameTreasury: 20n,
  Reserve: 20n,
};

export const SWAP_POOLS: readonly [PoolLabel, PoolLabel] = ["GameTreasury", "Rewards"];

export const RESERVE_POOL: PoolLabel = "Reserve";

/**
 * Split a supply across the pools by their default percentages.
 * Rounding dust, if any, goes to the reserve pool.
 */
export function defaultPoolAllocations(
  supply: TokenAmount = TOTAL_SUPPLY,
): readonly PoolAllocation[] {
  const allocations = POOL_LABELS.map((label) => ({
    label,
    capacity: (supply * POOL_SHARES[label]) / 100n,
  }));

  const assigned = allocations.reduce((sum, a) => sum + a.capacity, 0n);
  return allocations.map((a) =>
    a.label === RESERVE_POOL
      ? { label: a.label, capacity: a.capacity + (supply - assigned) }
      : a,
  );
}
