/**
 * Allocation Types
 *
 * Core primitives shared by the vesting engine, the distribution ledger
 * and the token ledger.
 *
 * Rules:
 * - Token amounts are bigint base units, never floating point
 * - Timestamps and durations are integer Unix seconds
 * - Addresses are 20-byte hex strings with a 0x prefix
 */

/**
 * An account address (beneficiary, contract, operator).
 * e.g. "0x5b38da6a701c568545dcfcb03fcb875f56beddc4"
 */
export type Address = string;

/** The null address. Never a valid beneficiary or recipient. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/** Unix time in whole seconds. */
export type Timestamp = number;

/** Duration in whole seconds. */
export type Duration = number;

/** Token amount in base units (e.g. wei for 18-decimal tokens). */
export type TokenAmount = bigint;

/** Basis points: 1/10000th. 10000 = 100%. */
export type BasisPoints = number;

export const BASIS_POINTS_DENOMINATOR = 10_000;

/**
 * The eight allocation pools seeded at deployment.
 * Their capacities sum to the total issued supply.
 */
export const POOL_LABELS = [
  "Seed",
  "PrivateSale",
  "PublicSale",
  "Team",
  "Advisors",
  "Rewards",
  "GameTreasury",
  "Reserve",
] as const;

export type PoolLabel = (typeof POOL_LABELS)[number];

/**
 * Capabilities checked per call by the capability gate.
 *
 * - owner: grants and revokes roles
 * - admin: plans, trigger times, revocation, liquidity, pause
 * - script: direct pool payouts (swap)
 * - approved-contract: grant issuance, debt write-off, distribute
 * - distributor: may move tokens on the token ledger
 */
export type Role =
  | "owner"
  | "admin"
  | "script"
  | "approved-contract"
  | "distributor";
