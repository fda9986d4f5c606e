/**
 * Distribution Ledger — capacity-checked disbursement bookkeeping.
 *
 * Owns per-pool authorized capacity and cumulative used amount, and
 * holds the token supply on the token ledger.
 *
 * Rules:
 * - usedAmount ≤ authorizedCapacity for every pool, always
 * - Bookkeeping and events are recorded before the token transfer; a
 *   failed or rejected transfer rolls the whole call back, and events
 *   reach the store only after the outermost operation returns
 * - Liquidity transfers move unused capacity from the reserve pool to
 *   a swap pool; the sum of capacities never changes
 */

import { isNonZeroAddress, POOL_LABELS } from "@allotment/types";
import type {
  Address,
  CapabilityGate,
  Clock,
  Distributor,
  PoolLabel,
  TokenAmount,
  TokenLedger,
} from "@allotment/types";
import type { EventStore } from "@allotment/event-store";
import {
  AllocationError,
  CapacityError,
  DependencyFailure,
  ValidationError,
} from "./errors.js";
import { DISTRIBUTION_EVENTS, EventBatch, EventOutbox } from "./events.js";
import { ReentrancyGuard } from "./guard.js";
import { TransactionalStore } from "./transaction.js";
import type { Journal } from "./transaction.js";
import type { DistributionLedgerConfig, Pool } from "./types.js";

interface PoolRecord {
  authorizedCapacity: TokenAmount;
  usedAmount: TokenAmount;
}

interface DistributionState {
  pools: Map<PoolLabel, PoolRecord>;
}

export interface DistributionLedgerDeps {
  readonly gate: CapabilityGate;
  readonly tokens: TokenLedger;
  readonly events: EventStore;
  readonly clock: Clock;
}

// =============================================================================
// Distribution Ledger
// =============================================================================

export class DistributionLedger implements Distributor {
  readonly address: Address;

  private readonly store: TransactionalStore<DistributionState>;
  private readonly guard = new ReentrancyGuard();
  private readonly swapPools: ReadonlySet<PoolLabel>;
  private readonly reservePool: PoolLabel;
  private readonly gate: CapabilityGate;
  private readonly tokens: TokenLedger;
  private readonly outbox: EventOutbox;
  private readonly clock: Clock;

  constructor(config: DistributionLedgerConfig, deps: DistributionLedgerDeps) {
    this.gate = deps.gate;
    this.tokens = deps.tokens;
    this.outbox = EventOutbox.for(deps.events);
    this.clock = deps.clock;

    if (!isNonZeroAddress(config.address)) {
      throw new ValidationError("INVALID_ADDRESS", `Invalid ledger address: "${config.address}"`);
    }
    this.address = config.address;

    const pools = new Map<PoolLabel, PoolRecord>();
    for (const { label, capacity } of config.pools) {
      if (pools.has(label)) {
        throw new ValidationError("INVALID_POOL_CONFIG", `Pool '${label}' is seeded twice`);
      }
      if (capacity < 0n) {
        throw new ValidationError("INVALID_POOL_CONFIG", `Pool '${label}' has a negative capacity`);
      }
      pools.set(label, { authorizedCapacity: capacity, usedAmount: 0n });
    }

    const missing = POOL_LABELS.filter((label) => !pools.has(label));
    if (missing.length > 0) {
      throw new ValidationError("INVALID_POOL_CONFIG", `Pools not seeded: ${missing.join(", ")}`);
    }

    const seeded = config.pools.reduce((sum, p) => sum + p.capacity, 0n);
    if (seeded !== this.tokens.totalSupply()) {
      throw new ValidationError(
        "INVALID_POOL_CONFIG",
        `Pool capacities sum to ${seeded}, expected the total supply ${this.tokens.totalSupply()}`,
      );
    }

    if (config.swapPools[0] === config.swapPools[1]) {
      throw new ValidationError("INVALID_POOL_CONFIG", "Two distinct swap pools are required");
    }
    if (config.swapPools.includes(config.reservePool)) {
      throw new ValidationError("INVALID_POOL_CONFIG", "The reserve pool cannot be a swap pool");
    }
    this.swapPools = new Set(config.swapPools);
    this.reservePool = config.reservePool;

    this.store = new TransactionalStore<DistributionState>({ pools });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay `amount` from `pool` to `to`. Approved contracts only.
   */
  distribute(
    caller: Address,
    pool: PoolLabel,
    amount: TokenAmount,
    to: Address,
  ): void {
    this.execute("distribute", caller, (state, batch, journal) => {
      this.gate.requireRole(caller, "approved-contract");
      batch.record(DISTRIBUTION_EVENTS.DISBURSED, {
        pool,
        amount: amount.toString(),
        to,
      });
      this.disburse(state, journal, pool, amount, to);
    });
  }

  /**
   * Direct payout from a swap pool outside any vesting plan (e.g. redemptions).
   * Script role only.
   */
  swap(caller: Address, pool: PoolLabel, to: Address, amount: TokenAmount): void {
    this.execute("swap", caller, (state, batch, journal) => {
      this.gate.requireRole(caller, "script");
      this.requireSwapPool(pool);
      batch.record(DISTRIBUTION_EVENTS.SWAPPED, {
        pool,
        amount: amount.toString(),
        to,
      });
      this.disburse(state, journal, pool, amount, to);
    });
  }

  /**
   * Move `amount` of unused capacity from the reserve pool to a swap pool.
   * No tokens move. Admin only.
   */
  transferLiquidity(caller: Address, pool: PoolLabel, amount: TokenAmount): void {
    this.execute("transferLiquidity", caller, (state, batch, journal) => {
      this.gate.requireRole(caller, "admin");
      this.requireSwapPool(pool);
      requirePositive(amount);

      const reserve = requirePool(state, this.reservePool);
      const target = requirePool(state, pool);

      const unused = reserve.authorizedCapacity - reserve.usedAmount;
      if (unused < amount) {
        throw new CapacityError(
          "RESERVE_INSUFFICIENT",
          `Reserve pool '${this.reservePool}' has ${unused} unused capacity, ${amount} requested`,
        );
      }

      journal.save(reserve).authorizedCapacity -= amount;
      journal.save(target).authorizedCapacity += amount;

      batch.record(DISTRIBUTION_EVENTS.LIQUIDITY_REALLOCATED, {
        from: this.reservePool,
        to: pool,
        amount: amount.toString(),
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Read accessors
  // ───────────────────────────────────────────────────────────────────────

  getPool(label: PoolLabel): Pool {
    const record = requirePool(this.store.read(), label);
    return { label, ...record };
  }

  listPools(): readonly Pool[] {
    return [...this.store.read().pools].map(([label, record]) => ({
      label,
      ...record,
    }));
  }

  unusedCapacity(label: PoolLabel): TokenAmount {
    const pool = this.getPool(label);
    return pool.authorizedCapacity - pool.usedAmount;
  }

  totalAuthorizedCapacity(): TokenAmount {
    return this.listPools().reduce((sum, p) => sum + p.authorizedCapacity, 0n);
  }

  totalUsedAmount(): TokenAmount {
    return this.listPools().reduce((sum, p) => sum + p.usedAmount, 0n);
  }

  isSwapPool(label: PoolLabel): boolean {
    return this.swapPools.has(label);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private execute(
    operation: string,
    caller: Address,
    fn: (state: DistributionState, batch: EventBatch, journal: Journal) => void,
  ): void {
    this.guard.run(operation, () => {
      this.gate.requireNotPaused();
      const batch = new EventBatch("distribution", caller, this.clock.now());
      this.outbox.run(batch, () =>
        this.store.transact((state, journal) => fn(state, batch, journal)),
      );
    });
  }

  private disburse(
    state: DistributionState,
    journal: Journal,
    label: PoolLabel,
    amount: TokenAmount,
    to: Address,
  ): void {
    if (!isNonZeroAddress(to) || to === this.address) {
      throw new ValidationError("INVALID_RECIPIENT", `Invalid recipient: "${to}"`);
    }
    requirePositive(amount);

    const pool = requirePool(state, label);
    if (pool.usedAmount + amount > pool.authorizedCapacity) {
      throw new CapacityError(
        "POOL_CAPACITY_EXCEEDED",
        `Pool '${label}' would exceed its capacity: ${pool.usedAmount} used + ${amount} > ${pool.authorizedCapacity}`,
      );
    }

    journal.save(pool).usedAmount += amount;
    this.transferTokens(to, amount);
  }

  private transferTokens(to: Address, amount: TokenAmount): void {
    let transferred: boolean;
    try {
      transferred = this.tokens.transfer(this.address, to, amount);
    } catch (err) {
      if (err instanceof AllocationError) {
        throw err;
      }
      throw new DependencyFailure(
        "TRANSFER_FAILED",
        `Token transfer of ${amount} to '${to}' failed`,
        { cause: err },
      );
    }

    if (!transferred) {
      throw new DependencyFailure(
        "TRANSFER_FAILED",
        `Token ledger rejected the transfer of ${amount} to '${to}'`,
      );
    }
  }

  private requireSwapPool(label: PoolLabel): void {
    if (!this.swapPools.has(label)) {
      throw new ValidationError(
        "POOL_NOT_SWAPPABLE",
        `Pool '${label}' is not one of: ${[...this.swapPools].join(", ")}`,
      );
    }
  }
}

function requirePool(state: DistributionState, label: PoolLabel): PoolRecord {
  const pool = state.pools.get(label);
  if (pool === undefined) {
    throw new ValidationError("UNKNOWN_POOL", `Pool '${label}' not found`);
  }
  return pool;
}

function requirePositive(amount: TokenAmount): void {
  if (amount <= 0n) {
    throw new ValidationError("INVALID_AMOUNT", `Amount must be positive, got ${amount}`);
  }
}
