/**
 * @allotment/types — Shared domain types for the allotment stack.
 *
 * Used across all packages:
 * - Allocation primitives (addresses, amounts, pools, roles)
 * - Collaborator contracts (capability gate, token ledger, clock)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Allocation primitives
export type {
  Address,
  Timestamp,
  Duration,
  TokenAmount,
  BasisPoints,
  PoolLabel,
  Role,
} from "./allocation.js";
export {
  ZERO_ADDRESS,
  BASIS_POINTS_DENOMINATOR,
  POOL_LABELS,
} from "./allocation.js";

// Collaborators
export type {
  CapabilityGate,
  TokenLedger,
  Clock,
  Distributor,
} from "./collaborators.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isNonZeroAddress,
  isPoolLabel,
} from "./guards.js";
