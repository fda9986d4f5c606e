/**
 * AllocationService — Composition root for the HTTP surface.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service converts between whole-token decimal
 * strings and base units, and logs every state change.
 */

import type { Logger } from "pino";
import { formatAmount, parseAmount, toBaseUnits } from "@allotment/ledger";
import { InMemoryEventStore } from "@allotment/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
} from "@allotment/event-store";
import type { Address, Clock, PoolLabel, Timestamp, TokenAmount } from "@allotment/types";
import { Allocation } from "@allotment/vesting";
import type { Grant, Pool, VestingPlan } from "@allotment/vesting";
import type {
  CreatePlanDto,
  IssueGrantDto,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface AllocationServiceConfig {
  readonly owner: Address;
  readonly vestingAddress: Address;
  readonly distributionAddress: Address;
  readonly decimals: number;
  readonly admins?: readonly Address[];
  readonly scripts?: readonly Address[];
  readonly approvedContracts?: readonly Address[];
  /** Defaults to the system clock, in whole seconds */
  readonly clock?: Clock;
}

/** Whole tokens issued, before scaling by decimals. */
export const ISSUED_TOKENS = 1_000_000_000n;

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

// =============================================================================
// Views
// =============================================================================

export interface PlanView extends VestingPlan {
  readonly triggerTime: Timestamp | null;
}

export interface GrantView {
  readonly totalAmount: string;
  readonly claimedAmount: string;
  readonly startDate: Timestamp;
  readonly beneficiary: Address;
}

export interface HolderView {
  readonly address: Address;
  readonly grantCount: number;
  readonly totalGrantedAmount: string;
  readonly totalClaimedAmount: string;
}

export interface PositionView {
  readonly beneficiary: Address;
  readonly planId: number;
  readonly grants: readonly GrantView[];
  readonly claimable: string;
  readonly revoked: boolean;
}

export interface PoolView {
  readonly label: PoolLabel;
  readonly authorizedCapacity: string;
  readonly usedAmount: string;
  readonly unusedCapacity: string;
  readonly swappable: boolean;
}

export interface PoolsSummary {
  readonly pools: readonly PoolView[];
  readonly totalAuthorizedCapacity: string;
  readonly totalUsedAmount: string;
}

export interface ClaimView {
  readonly beneficiary: Address;
  readonly planId: number;
  readonly amount: string;
}

export interface RevocationView {
  readonly beneficiary: Address;
  readonly planId: number;
  readonly released: string;
  readonly forfeited: string;
}

export interface DebtWriteOffView {
  readonly beneficiary: Address;
  readonly amount: string;
  readonly plans: readonly { readonly planId: number; readonly amount: string }[];
}

// =============================================================================
// Service
// =============================================================================

export class AllocationService {
  readonly allocation: Allocation;
  readonly decimals: number;

  private readonly log: Logger;

  constructor(config: AllocationServiceConfig, logger: Logger) {
    this.decimals = config.decimals;
    this.log = logger.child({ component: "allocation" });

    this.allocation = new Allocation({
      owner: config.owner,
      vestingAddress: config.vestingAddress,
      distributionAddress: config.distributionAddress,
      clock: config.clock ?? systemClock,
      totalSupply: toBaseUnits(ISSUED_TOKENS, config.decimals),
      decimals: config.decimals,
      events: new InMemoryEventStore({
        onHandlerError: (err, event) => {
          this.log.error(
            { err, eventType: event.event.type, globalPosition: event.globalPosition },
            "Event subscriber failed",
          );
        },
      }),
    });

    this.allocation.assignRoles(config.owner, config.admins ?? [], "admin");
    this.allocation.assignRoles(config.owner, config.scripts ?? [], "script");
    this.allocation.assignRoles(
      config.owner,
      config.approvedContracts ?? [],
      "approved-contract",
    );
  }

  // ─── Plans ─────────────────────────────────────────────────────────

  createPlan(caller: Address, dto: CreatePlanDto): PlanView {
    const planId = this.allocation.vesting.createPlan(caller, dto);
    this.log.info({ op: "createPlan", caller, planId, poolLabel: dto.poolLabel }, "Plan created");
    return this.planView(this.allocation.vesting.getPlan(planId));
  }

  setTriggerTime(caller: Address, planId: number, triggerTime: Timestamp): PlanView {
    this.allocation.vesting.setTriggerTime(caller, planId, triggerTime);
    this.log.info({ op: "setTriggerTime", caller, planId, triggerTime }, "Trigger time set");
    return this.planView(this.allocation.vesting.getPlan(planId));
  }

  listPlans(): readonly PlanView[] {
    return this.allocation.vesting.listPlans().map((plan) => this.planView(plan));
  }

  findPlan(planId: number): PlanView | undefined {
    if (planId >= this.allocation.vesting.nextPlanId()) {
      return undefined;
    }
    return this.planView(this.allocation.vesting.getPlan(planId));
  }

  // ─── Grants & release ──────────────────────────────────────────────

  issueGrant(caller: Address, dto: IssueGrantDto): PositionView {
    const amount = this.toUnits(dto.amount);
    this.allocation.vesting.issueGrant(caller, {
      beneficiary: dto.beneficiary,
      startDate: dto.startDate,
      amount,
      planId: dto.planId,
    });
    this.log.info(
      { op: "issueGrant", caller, beneficiary: dto.beneficiary, planId: dto.planId, amount: dto.amount },
      "Grant issued",
    );
    return this.position(dto.beneficiary, dto.planId);
  }

  claim(caller: Address, planId: number): ClaimView {
    const amount = this.format(this.allocation.vesting.claim(caller, planId));
    this.log.info({ op: "claim", caller, planId, amount }, "Claim settled");
    return { beneficiary: caller, planId, amount };
  }

  revoke(caller: Address, beneficiary: Address, planId: number): RevocationView {
    const result = this.allocation.vesting.revoke(caller, beneficiary, planId);
    const view: RevocationView = {
      beneficiary,
      planId,
      released: this.format(result.released),
      forfeited: this.format(result.forfeited),
    };
    this.log.info({ op: "revoke", caller, ...view }, "Grant revoked");
    return view;
  }

  writeOffDebt(caller: Address, beneficiary: Address, amount: string): DebtWriteOffView {
    const result = this.allocation.vesting.writeOffDebt(caller, beneficiary, this.toUnits(amount));
    const view: DebtWriteOffView = {
      beneficiary,
      amount: this.format(result.amount),
      plans: result.plans.map((p) => ({ planId: p.planId, amount: this.format(p.amount) })),
    };
    this.log.info(
      { op: "writeOffDebt", caller, beneficiary, amount: view.amount, plans: view.plans.length },
      "Debt written off",
    );
    return view;
  }

  holder(address: Address): HolderView {
    const stat = this.allocation.vesting.getHolderStat(address);
    return {
      address,
      grantCount: stat.grantCount,
      totalGrantedAmount: this.format(stat.totalGrantedAmount),
      totalClaimedAmount: this.format(stat.totalClaimedAmount),
    };
  }

  position(beneficiary: Address, planId: number): PositionView {
    const vesting = this.allocation.vesting;
    return {
      beneficiary,
      planId,
      grants: vesting.getGrants(beneficiary, planId).map((g) => this.grantView(g)),
      claimable: this.format(vesting.claimableAmount(beneficiary, planId)),
      revoked: vesting.isRevoked(beneficiary, planId),
    };
  }

  // ─── Pools ─────────────────────────────────────────────────────────

  pools(): PoolsSummary {
    const distribution = this.allocation.distribution;
    return {
      pools: distribution.listPools().map((p) => this.poolView(p)),
      totalAuthorizedCapacity: this.format(distribution.totalAuthorizedCapacity()),
      totalUsedAmount: this.format(distribution.totalUsedAmount()),
    };
  }

  pool(label: PoolLabel): PoolView {
    return this.poolView(this.allocation.distribution.getPool(label));
  }

  swap(caller: Address, label: PoolLabel, to: Address, amount: string): PoolView {
    this.allocation.distribution.swap(caller, label, to, this.toUnits(amount));
    this.log.info({ op: "swap", caller, pool: label, to, amount }, "Swap paid");
    return this.pool(label);
  }

  transferLiquidity(caller: Address, label: PoolLabel, amount: string): PoolView {
    this.allocation.distribution.transferLiquidity(caller, label, this.toUnits(amount));
    this.log.info({ op: "transferLiquidity", caller, pool: label, amount }, "Liquidity reallocated");
    return this.pool(label);
  }

  // ─── Events & health ───────────────────────────────────────────────

  readEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.allocation.events.readAll(options);
  }

  checkIntegrity(): EventStoreIntegrityResult {
    return this.allocation.events.verifyIntegrity();
  }

  isPaused(): boolean {
    return this.allocation.roles.isPaused();
  }

  // ─── Private ───────────────────────────────────────────────────────

  private toUnits(amount: string): TokenAmount {
    return parseAmount(amount, this.decimals);
  }

  private format(amount: TokenAmount): string {
    return formatAmount(amount, this.decimals);
  }

  private planView(plan: VestingPlan): PlanView {
    return {
      ...plan,
      triggerTime: this.allocation.vesting.getTriggerTime(plan.id) ?? null,
    };
  }

  private grantView(grant: Grant): GrantView {
    return {
      totalAmount: this.format(grant.totalAmount),
      claimedAmount: this.format(grant.claimedAmount),
      startDate: grant.startDate,
      beneficiary: grant.beneficiary,
    };
  }

  private poolView(pool: Pool): PoolView {
    return {
      label: pool.label,
      authorizedCapacity: this.format(pool.authorizedCapacity),
      usedAmount: this.format(pool.usedAmount),
      unusedCapacity: this.format(pool.authorizedCapacity - pool.usedAmount),
      swappable: this.allocation.distribution.isSwapPool(pool.label),
    };
  }
}
