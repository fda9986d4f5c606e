/**
 * Allocation — top-level coordinator for the token allocation.
 *
 * Composes:
 * - RoleRegistry: roles and the pause flag
 * - InMemoryTokenLedger: balances, supply minted to the distribution ledger
 * - DistributionLedger: pool capacity and disbursement
 * - VestingEngine: plans, grants and release
 * - EventStore: append-only log both components commit to
 *
 * Wiring: the distribution ledger holds "distributor" on the token
 * ledger, and the vesting engine holds "approved-contract" on the
 * distribution ledger.
 */

import { InMemoryEventStore } from "@allotment/event-store";
import type { EventStore } from "@allotment/event-store";
import { InMemoryTokenLedger } from "@allotment/ledger";
import type { Address, Clock, Role, TokenAmount } from "@allotment/types";
import { RoleRegistry } from "./access.js";
import { DistributionLedger } from "./distribution-ledger.js";
import {
  defaultPoolAllocations,
  RESERVE_POOL,
  SWAP_POOLS,
  TOKEN_DECIMALS,
  TOTAL_SUPPLY,
} from "./pools.js";
import type { PoolAllocation } from "./types.js";
import { VestingEngine } from "./vesting-engine.js";

export interface AllocationConfig {
  readonly owner: Address;
  readonly vestingAddress: Address;
  readonly distributionAddress: Address;
  readonly clock: Clock;
  /** Defaults to 1,000,000,000 tokens at 18 decimals */
  readonly totalSupply?: TokenAmount;
  /** Defaults to the standard percentage split of `totalSupply` */
  readonly pools?: readonly PoolAllocation[];
  readonly decimals?: number;
  readonly symbol?: string;
  readonly events?: EventStore;
}

// =============================================================================
// Allocation
// =============================================================================

export class Allocation {
  readonly roles: RoleRegistry;
  readonly tokens: InMemoryTokenLedger;
  readonly distribution: DistributionLedger;
  readonly vesting: VestingEngine;
  readonly events: EventStore;

  constructor(config: AllocationConfig) {
    const supply = config.totalSupply ?? TOTAL_SUPPLY;

    this.roles = new RoleRegistry(config.owner);
    this.events = config.events ?? new InMemoryEventStore();
    this.tokens = new InMemoryTokenLedger(
      {
        treasury: config.distributionAddress,
        totalSupply: supply,
        decimals: config.decimals ?? TOKEN_DECIMALS,
        symbol: config.symbol ?? "ALLOT",
      },
      this.roles,
    );
    this.distribution = new DistributionLedger(
      {
        address: config.distributionAddress,
        pools: config.pools ?? defaultPoolAllocations(supply),
        swapPools: SWAP_POOLS,
        reservePool: RESERVE_POOL,
      },
      {
        gate: this.roles,
        tokens: this.tokens,
        events: this.events,
        clock: config.clock,
      },
    );
    this.vesting = new VestingEngine(config.vestingAddress, {
      gate: this.roles,
      distributor: this.distribution,
      events: this.events,
      clock: config.clock,
    });

    this.roles.grantRole(config.owner, config.distributionAddress, "distributor");
    this.roles.grantRole(config.owner, config.vestingAddress, "approved-contract");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Roles
  // ───────────────────────────────────────────────────────────────────────

  /** Grant `role` to each account. Owner only. */
  assignRoles(caller: Address, accounts: readonly Address[], role: Role): void {
    for (const account of accounts) {
      this.roles.grantRole(caller, account, role);
    }
  }
}
