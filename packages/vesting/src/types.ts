/**
 * @allotment/vesting domain types.
 *
 * The vesting engine owns plans, trigger times, grants, holder stats and
 * revocation flags. The distribution ledger owns pool state. Neither
 * reads the other's store; releases go through the Distributor contract.
 */

import type {
  Address,
  BasisPoints,
  Duration,
  PoolLabel,
  Timestamp,
  TokenAmount,
} from "@allotment/types";

// =============================================================================
// Vesting
// =============================================================================

/** A vesting curve. Immutable once created. */
export interface VestingPlan {
  /** Sequential id starting at 0 */
  readonly id: number;
  readonly startDate: Timestamp;
  readonly cliffDuration: Duration;
  readonly totalDuration: Duration;
  readonly revocable: boolean;
  /** Share unlocked at trigger time, independent of the cliff */
  readonly initialReleasePercentage: BasisPoints;
  /** Pool every release under this plan is paid from */
  readonly poolLabel: PoolLabel;
}

export type CreatePlanInput = Omit<VestingPlan, "id">;

/** One allocation to a beneficiary under a plan. */
export interface Grant {
  readonly totalAmount: TokenAmount;
  readonly claimedAmount: TokenAmount;
  readonly startDate: Timestamp;
  readonly beneficiary: Address;
}

export interface IssueGrantInput {
  readonly beneficiary: Address;
  readonly startDate: Timestamp;
  readonly amount: TokenAmount;
  readonly planId: number;
}

/** Running aggregates per beneficiary across all plans. */
export interface HolderStat {
  readonly grantCount: number;
  readonly totalGrantedAmount: TokenAmount;
  readonly totalClaimedAmount: TokenAmount;
}

/** Outcome of a revocation. */
export interface RevocationResult {
  /** Amount settled and paid out as part of the revocation */
  readonly released: TokenAmount;
  /** Amount that will never vest for this (beneficiary, plan) */
  readonly forfeited: TokenAmount;
}

/** Per-plan share of a debt write-off. */
export interface PlanWriteOff {
  readonly planId: number;
  readonly amount: TokenAmount;
}

export interface DebtWriteOffResult {
  readonly amount: TokenAmount;
  readonly plans: readonly PlanWriteOff[];
}

// =============================================================================
// Distribution
// =============================================================================

/** A named bucket of authorized disbursement capacity. */
export interface Pool {
  readonly label: PoolLabel;
  readonly authorizedCapacity: TokenAmount;
  readonly usedAmount: TokenAmount;
}

export interface PoolAllocation {
  readonly label: PoolLabel;
  readonly capacity: TokenAmount;
}

export interface DistributionLedgerConfig {
  /** The ledger's own account; it holds the supply on the token ledger */
  readonly address: Address;
  /** Seeded pools; their capacities must sum to the token supply */
  readonly pools: readonly PoolAllocation[];
  /** The two pools open to swap and liquidity transfers */
  readonly swapPools: readonly [PoolLabel, PoolLabel];
  /** Pool that liquidity transfers draw capacity from */
  readonly reservePool: PoolLabel;
}
