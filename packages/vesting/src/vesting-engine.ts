/**
 * Vesting Engine — plans, grants and time-based release.
 *
 * Owns the plan arena, trigger times, grants per (beneficiary, plan),
 * holder stats and revocation flags. Releases are paid through the
 * Distributor; the engine never touches pool state directly.
 *
 * Rules:
 * - Plans are append-only and immutable; ids are sequential from 0
 * - claimedAmount ≤ totalAmount for every grant, and never decreases
 * - totalVestingAmount = Σ granted − Σ claimed
 * - A revoked (beneficiary, plan) pair stays revoked
 * - Every public mutation is all-or-nothing
 */

import { BASIS_POINTS_DENOMINATOR, isNonZeroAddress, isPoolLabel } from "@allotment/types";
import type {
  Address,
  CapabilityGate,
  Clock,
  Distributor,
  Timestamp,
  TokenAmount,
} from "@allotment/types";
import type { EventStore } from "@allotment/event-store";
import { minAmount } from "@allotment/ledger";
import { StateError, ValidationError } from "./errors.js";
import { EventBatch, EventOutbox, VESTING_EVENTS } from "./events.js";
import { ReentrancyGuard } from "./guard.js";
import { computeReleasedAmount } from "./schedule.js";
import { TransactionalStore } from "./transaction.js";
import type { Journal } from "./transaction.js";
import type {
  CreatePlanInput,
  DebtWriteOffResult,
  Grant,
  HolderStat,
  IssueGrantInput,
  PlanWriteOff,
  RevocationResult,
  VestingPlan,
} from "./types.js";

interface GrantRecord {
  totalAmount: TokenAmount;
  claimedAmount: TokenAmount;
  startDate: Timestamp;
  beneficiary: Address;
}

interface HolderRecord {
  grantCount: number;
  totalGrantedAmount: TokenAmount;
  totalClaimedAmount: TokenAmount;
}

interface VestingState {
  plans: VestingPlan[];
  triggerTimes: Map<number, Timestamp>;
  grants: Map<string, GrantRecord[]>;
  holderStats: Map<Address, HolderRecord>;
  revoked: Set<string>;
  totalVestingAmount: TokenAmount;
}

export interface VestingEngineDeps {
  readonly gate: CapabilityGate;
  readonly distributor: Distributor;
  readonly events: EventStore;
  readonly clock: Clock;
}

const EMPTY_HOLDER_STAT: HolderStat = {
  grantCount: 0,
  totalGrantedAmount: 0n,
  totalClaimedAmount: 0n,
};

function pairKey(beneficiary: Address, planId: number): string {
  return `${beneficiary}:${planId}`;
}

// =============================================================================
// Vesting Engine
// =============================================================================

export class VestingEngine {
  private readonly store = new TransactionalStore<VestingState>({
    plans: [],
    triggerTimes: new Map(),
    grants: new Map(),
    holderStats: new Map(),
    revoked: new Set(),
    totalVestingAmount: 0n,
  });
  private readonly guard = new ReentrancyGuard();
  private readonly gate: CapabilityGate;
  private readonly distributor: Distributor;
  private readonly outbox: EventOutbox;
  private readonly clock: Clock;

  constructor(
    readonly address: Address,
    deps: VestingEngineDeps,
  ) {
    if (!isNonZeroAddress(address)) {
      throw new ValidationError("INVALID_ADDRESS", `Invalid engine address: "${address}"`);
    }
    this.gate = deps.gate;
    this.distributor = deps.distributor;
    this.outbox = EventOutbox.for(deps.events);
    this.clock = deps.clock;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Plans
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register a vesting curve. Admin only.
   *
   * @returns The new plan's id
   */
  createPlan(caller: Address, input: CreatePlanInput): number {
    return this.execute("createPlan", caller, (state, batch, journal) => {
      this.gate.requireRole(caller, "admin");

      const { startDate, cliffDuration, totalDuration, initialReleasePercentage } = input;
      if (![startDate, cliffDuration, totalDuration].every(isTimeValue)) {
        throw new ValidationError("INVALID_SCHEDULE", "Plan times must be non-negative integer seconds");
      }
      if (totalDuration === 0) {
        throw new ValidationError("INVALID_SCHEDULE", "Plan duration must be greater than zero");
      }
      if (cliffDuration > totalDuration) {
        throw new ValidationError(
          "INVALID_SCHEDULE",
          `Cliff (${cliffDuration}s) exceeds the total duration (${totalDuration}s)`,
        );
      }
      if (
        !Number.isInteger(initialReleasePercentage) ||
        initialReleasePercentage < 0 ||
        initialReleasePercentage > BASIS_POINTS_DENOMINATOR
      ) {
        throw new ValidationError(
          "INVALID_SCHEDULE",
          `Initial release must be 0–${BASIS_POINTS_DENOMINATOR} basis points, got ${initialReleasePercentage}`,
        );
      }
      if (!isPoolLabel(input.poolLabel)) {
        throw new ValidationError("UNKNOWN_POOL", `Pool '${input.poolLabel}' not found`);
      }
      const now = this.clock.now();
      if (startDate < now) {
        throw new ValidationError("START_IN_PAST", `Plan start ${startDate} is before now (${now})`);
      }

      const plan: VestingPlan = { id: state.plans.length, ...input };
      journal.saveLength(state.plans);
      state.plans.push(plan);

      batch.record(VESTING_EVENTS.PLAN_CREATED, {
        planId: plan.id,
        startDate: plan.startDate,
        cliffDuration: plan.cliffDuration,
        totalDuration: plan.totalDuration,
        revocable: plan.revocable,
        initialReleasePercentage: plan.initialReleasePercentage,
        poolLabel: plan.poolLabel,
      });
      return plan.id;
    });
  }

  /**
   * Set (or move) the time every window of a plan is anchored on. Admin only.
   */
  setTriggerTime(caller: Address, planId: number, time: Timestamp): void {
    this.execute("setTriggerTime", caller, (state, batch, journal) => {
      this.gate.requireRole(caller, "admin");
      const plan = requirePlan(state, planId);

      if (!isTimeValue(time) || time < plan.startDate) {
        throw new ValidationError(
          "INVALID_TRIGGER_TIME",
          `Trigger time ${time} must be an integer at or after the plan start ${plan.startDate}`,
        );
      }

      journal.saveEntry(state.triggerTimes, planId);
      state.triggerTimes.set(planId, time);
      batch.record(VESTING_EVENTS.TRIGGER_TIME_SET, { planId, triggerTime: time });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Grants
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Allocate `amount` to a beneficiary under a plan. Admin or approved contract.
   */
  issueGrant(caller: Address, input: IssueGrantInput): void {
    this.execute("issueGrant", caller, (state, batch, journal) => {
      this.gate.requireAnyRole(caller, ["admin", "approved-contract"]);

      const { beneficiary, startDate, amount, planId } = input;
      const plan = requirePlan(state, planId);
      if (amount <= 0n) {
        throw new ValidationError("INVALID_AMOUNT", `Grant amount must be positive, got ${amount}`);
      }
      if (!isTimeValue(startDate) || startDate < plan.startDate) {
        throw new ValidationError(
          "INVALID_SCHEDULE",
          `Grant start ${startDate} precedes the plan start ${plan.startDate}`,
        );
      }
      if (!isNonZeroAddress(beneficiary)) {
        throw new ValidationError("INVALID_ADDRESS", `Invalid beneficiary address: "${beneficiary}"`);
      }

      const key = pairKey(beneficiary, planId);
      journal.saveEntry(state.grants, key);
      const grants = state.grants.get(key) ?? [];
      journal.saveLength(grants);
      grants.push({ totalAmount: amount, claimedAmount: 0n, startDate, beneficiary });
      state.grants.set(key, grants);

      const stat = holderRecord(state, journal, beneficiary);
      stat.grantCount += 1;
      stat.totalGrantedAmount += amount;
      state.totalVestingAmount += amount;

      batch.record(VESTING_EVENTS.GRANT_CREATED, {
        beneficiary,
        planId,
        amount: amount.toString(),
        startDate,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Release
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Release everything currently unlocked for the caller under a plan.
   *
   * @returns The amount paid out
   */
  claim(caller: Address, planId: number): TokenAmount {
    return this.execute("claim", caller, (state, batch, journal) => {
      const plan = requirePlan(state, planId);
      if (state.revoked.has(pairKey(caller, planId))) {
        throw new StateError("ALREADY_REVOKED", `Plan ${planId} is revoked for '${caller}'`);
      }

      const amount = this.settle(state, journal, caller, planId);
      if (amount === 0n) {
        throw new StateError("NOTHING_CLAIMABLE", `Nothing claimable for '${caller}' under plan ${planId}`);
      }

      batch.record(VESTING_EVENTS.CLAIMED, {
        beneficiary: caller,
        planId,
        amount: amount.toString(),
      });
      this.release(state, journal, plan, caller, amount);
      return amount;
    });
  }

  /**
   * Settle what has unlocked so far, pay it out, and stop all further
   * vesting for the pair. Admin only, revocable plans only.
   */
  revoke(caller: Address, beneficiary: Address, planId: number): RevocationResult {
    return this.execute("revoke", caller, (state, batch, journal) => {
      this.gate.requireRole(caller, "admin");
      const plan = requirePlan(state, planId);
      if (!plan.revocable) {
        throw new StateError("NOT_REVOCABLE", `Plan ${planId} is not revocable`);
      }

      const key = pairKey(beneficiary, planId);
      if (state.revoked.has(key)) {
        throw new StateError("ALREADY_REVOKED", `Plan ${planId} is already revoked for '${beneficiary}'`);
      }

      const grants = requireGrants(state, beneficiary, planId);
      // Without a trigger time nothing has unlocked yet.
      const released = state.triggerTimes.has(planId)
        ? this.settle(state, journal, beneficiary, planId)
        : 0n;

      journal.saveMember(state.revoked, key);
      state.revoked.add(key);
      const forfeited = grants.reduce((sum, g) => sum + (g.totalAmount - g.claimedAmount), 0n);

      batch.record(VESTING_EVENTS.REVOKED, {
        beneficiary,
        planId,
        released: released.toString(),
        forfeited: forfeited.toString(),
      });
      if (released > 0n) {
        this.release(state, journal, plan, beneficiary, released);
      }
      return { released, forfeited };
    });
  }

  /**
   * Mark `amount` of a beneficiary's entitlement as claimed without paying
   * it out. Walks plans in id order, skipping revoked ones, and each
   * plan's grants in creation order. Admin or approved contract.
   */
  writeOffDebt(caller: Address, beneficiary: Address, amount: TokenAmount): DebtWriteOffResult {
    return this.execute("writeOffDebt", caller, (state, batch, journal) => {
      this.gate.requireAnyRole(caller, ["admin", "approved-contract"]);
      if (amount <= 0n) {
        throw new ValidationError("INVALID_AMOUNT", `Debt amount must be positive, got ${amount}`);
      }

      const stat = holderRecord(state, journal, beneficiary);
      const entitlement = stat.totalGrantedAmount - stat.totalClaimedAmount;
      if (amount > entitlement) {
        throw new ValidationError(
          "DEBT_EXCEEDS_ENTITLEMENT",
          `Debt ${amount} exceeds the outstanding entitlement ${entitlement} of '${beneficiary}'`,
        );
      }

      let remaining = amount;
      const plans: PlanWriteOff[] = [];
      for (const plan of state.plans) {
        if (remaining === 0n) break;
        if (state.revoked.has(pairKey(beneficiary, plan.id))) continue;

        let planAmount = 0n;
        for (const grant of state.grants.get(pairKey(beneficiary, plan.id)) ?? []) {
          if (remaining === 0n) break;
          const take = minAmount(remaining, grant.totalAmount - grant.claimedAmount);
          journal.save(grant).claimedAmount += take;
          planAmount += take;
          remaining -= take;
        }

        if (planAmount > 0n) {
          plans.push({ planId: plan.id, amount: planAmount });
          batch.record(VESTING_EVENTS.PLAN_DEBT_WRITTEN_OFF, {
            beneficiary,
            planId: plan.id,
            amount: planAmount.toString(),
          });
        }
      }

      // Outstanding entitlement under revoked plans cannot absorb debt.
      if (remaining > 0n) {
        throw new ValidationError(
          "DEBT_EXCEEDS_ENTITLEMENT",
          `Debt ${amount} exceeds the non-revoked entitlement of '${beneficiary}' by ${remaining}`,
        );
      }

      stat.totalClaimedAmount += amount;
      state.totalVestingAmount -= amount;

      batch.record(VESTING_EVENTS.DEBT_WRITTEN_OFF, {
        beneficiary,
        amount: amount.toString(),
      });
      return { amount, plans };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Read accessors
  // ───────────────────────────────────────────────────────────────────────

  getPlan(planId: number): VestingPlan {
    return requirePlan(this.store.read(), planId);
  }

  listPlans(): readonly VestingPlan[] {
    return [...this.store.read().plans];
  }

  nextPlanId(): number {
    return this.store.read().plans.length;
  }

  getTriggerTime(planId: number): Timestamp | undefined {
    return this.store.read().triggerTimes.get(planId);
  }

  getGrants(beneficiary: Address, planId: number): readonly Grant[] {
    const grants = this.store.read().grants.get(pairKey(beneficiary, planId)) ?? [];
    return grants.map((g) => ({ ...g }));
  }

  getHolderStat(beneficiary: Address): HolderStat {
    const stat = this.store.read().holderStats.get(beneficiary);
    return stat === undefined ? EMPTY_HOLDER_STAT : { ...stat };
  }

  totalVestingAmount(): TokenAmount {
    return this.store.read().totalVestingAmount;
  }

  isRevoked(beneficiary: Address, planId: number): boolean {
    return this.store.read().revoked.has(pairKey(beneficiary, planId));
  }

  /**
   * What `claim` would release at `at` (default: now), without changing
   * anything. Zero when revoked, without grants, or before a trigger time
   * is set.
   */
  claimableAmount(beneficiary: Address, planId: number, at?: Timestamp): TokenAmount {
    const state = this.store.read();
    const plan = requirePlan(state, planId);
    const tge = state.triggerTimes.get(planId);
    if (tge === undefined || state.revoked.has(pairKey(beneficiary, planId))) {
      return 0n;
    }

    const now = at ?? this.clock.now();
    const grants = state.grants.get(pairKey(beneficiary, planId)) ?? [];
    return grants.reduce((sum, g) => {
      const released = computeReleasedAmount(plan, tge, g.totalAmount, now);
      return released > g.claimedAmount ? sum + (released - g.claimedAmount) : sum;
    }, 0n);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private execute<T>(
    operation: string,
    caller: Address,
    fn: (state: VestingState, batch: EventBatch, journal: Journal) => T,
  ): T {
    return this.guard.run(operation, () => {
      this.gate.requireNotPaused();
      const batch = new EventBatch("vesting", caller, this.clock.now());
      return this.outbox.run(batch, () =>
        this.store.transact((state, journal) => fn(state, batch, journal)),
      );
    });
  }

  /**
   * Advance every grant of the pair to what has unlocked by now.
   *
   * @returns The total newly available amount
   */
  private settle(
    state: VestingState,
    journal: Journal,
    beneficiary: Address,
    planId: number,
  ): TokenAmount {
    const plan = requirePlan(state, planId);
    const grants = requireGrants(state, beneficiary, planId);
    const tge = state.triggerTimes.get(planId);
    if (tge === undefined) {
      throw new StateError("TRIGGER_TIME_UNSET", `Plan ${planId} has no trigger time`);
    }

    const now = this.clock.now();
    let available = 0n;
    for (const grant of grants) {
      if (grant.beneficiary !== beneficiary) {
        throw new StateError(
          "BENEFICIARY_MISMATCH",
          `Grant under plan ${planId} belongs to '${grant.beneficiary}', not '${beneficiary}'`,
        );
      }
      if (grant.claimedAmount >= grant.totalAmount) continue;

      const released = computeReleasedAmount(plan, tge, grant.totalAmount, now);
      if (released > grant.claimedAmount) {
        available += released - grant.claimedAmount;
        journal.save(grant).claimedAmount = released;
      }
    }
    return available;
  }

  private release(
    state: VestingState,
    journal: Journal,
    plan: VestingPlan,
    beneficiary: Address,
    amount: TokenAmount,
  ): void {
    holderRecord(state, journal, beneficiary).totalClaimedAmount += amount;
    state.totalVestingAmount -= amount;
    this.distributor.distribute(this.address, plan.poolLabel, amount, beneficiary);
  }
}

function isTimeValue(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function requirePlan(state: VestingState, planId: number): VestingPlan {
  const plan = Number.isInteger(planId) ? state.plans[planId] : undefined;
  if (plan === undefined) {
    throw new ValidationError("UNKNOWN_PLAN", `Plan ${planId} not found`);
  }
  return plan;
}

function requireGrants(state: VestingState, beneficiary: Address, planId: number): GrantRecord[] {
  const grants = state.grants.get(pairKey(beneficiary, planId));
  if (grants === undefined || grants.length === 0) {
    throw new StateError("NO_GRANTS", `'${beneficiary}' has no grants under plan ${planId}`);
  }
  return grants;
}

/** The beneficiary's stat record, saved to the journal before it is returned. */
function holderRecord(state: VestingState, journal: Journal, beneficiary: Address): HolderRecord {
  const existing = state.holderStats.get(beneficiary);
  if (existing !== undefined) {
    return journal.save(existing);
  }
  const created: HolderRecord = { grantCount: 0, totalGrantedAmount: 0n, totalClaimedAmount: 0n };
  journal.saveEntry(state.holderStats, beneficiary);
  state.holderStats.set(beneficiary, created);
  return created;
}
