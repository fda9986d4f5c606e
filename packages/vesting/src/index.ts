/**
 * @allotment/vesting — Vesting engine and pool distribution ledger.
 *
 * Provides:
 * - VestingEngine: plans, trigger times, grants, claim, revoke, debt write-off
 * - DistributionLedger: capacity-checked disbursement from named pools
 * - RoleRegistry: the capability gate (roles + pause)
 * - Allocation: coordinator that wires the components together
 *
 * @packageDocumentation
 */

export { Allocation } from "./allocation.js";
export type { AllocationConfig } from "./allocation.js";

export { VestingEngine } from "./vesting-engine.js";
export type { VestingEngineDeps } from "./vesting-engine.js";

export { DistributionLedger } from "./distribution-ledger.js";
export type { DistributionLedgerDeps } from "./distribution-ledger.js";

export { RoleRegistry } from "./access.js";
export { ReentrancyGuard } from "./guard.js";
export { TransactionalStore } from "./transaction.js";

export { computeReleasedAmount } from "./schedule.js";

export {
  TOKEN_DECIMALS,
  TOTAL_SUPPLY,
  SWAP_POOLS,
  RESERVE_POOL,
  defaultPoolAllocations,
} from "./pools.js";

export { EventBatch, VESTING_EVENTS, DISTRIBUTION_EVENTS } from "./events.js";
export type {
  VestingEventType,
  DistributionEventType,
  AllocationEventType,
  EventPayload,
} from "./events.js";

export {
  AllocationError,
  AuthorizationError,
  ValidationError,
  StateError,
  CapacityError,
  DependencyFailure,
} from "./errors.js";
export type {
  AllocationErrorKind,
  AllocationErrorCode,
  AuthorizationErrorCode,
  ValidationErrorCode,
  StateErrorCode,
  CapacityErrorCode,
  DependencyErrorCode,
} from "./errors.js";

export type {
  VestingPlan,
  CreatePlanInput,
  Grant,
  IssueGrantInput,
  HolderStat,
  RevocationResult,
  PlanWriteOff,
  DebtWriteOffResult,
  Pool,
  PoolAllocation,
  DistributionLedgerConfig,
} from "./types.js";
