/**
 * Tests for VestingEngine — plans, grants, claim, revoke, debt write-off.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryEventStore } from "@allotment/event-store";
import type { Distributor } from "@allotment/types";
import { RoleRegistry } from "../src/access.js";
import type { Allocation } from "../src/allocation.js";
import {
  AuthorizationError,
  CapacityError,
  StateError,
  ValidationError,
} from "../src/errors.js";
import { VestingEngine } from "../src/vesting-engine.js";
import type { CreatePlanInput } from "../src/types.js";
import {
  ADMIN,
  ALICE,
  BOB,
  createHarness,
  DAY,
  DISTRIBUTION,
  ManualClock,
  OWNER,
  SCRIPT,
  standardPlan,
  T0,
  VESTING,
} from "./fixtures.js";
import type { Harness } from "./fixtures.js";

/** Create a plan triggered at T0 and grant `amount` to ALICE under it. */
function planWithGrant(
  { allocation }: Harness,
  amount = 1_000n,
  overrides: Partial<CreatePlanInput> = {},
): number {
  const planId = allocation.vesting.createPlan(ADMIN, standardPlan(overrides));
  allocation.vesting.setTriggerTime(ADMIN, planId, T0);
  allocation.vesting.issueGrant(ADMIN, { beneficiary: ALICE, startDate: T0, amount, planId });
  return planId;
}

function eventTypes(allocation: Allocation): string[] {
  return allocation.events.readAll().map((e) => e.event.type);
}

describe("VestingEngine", () => {
  let harness: Harness;
  let allocation: Allocation;

  beforeEach(() => {
    harness = createHarness();
    allocation = harness.allocation;
  });

  // ─── Plans ─────────────────────────────────────────────────────────

  describe("createPlan", () => {
    it("assigns sequential ids", () => {
      expect(allocation.vesting.createPlan(ADMIN, standardPlan())).toBe(0);
      expect(allocation.vesting.createPlan(ADMIN, standardPlan({ poolLabel: "Advisors" }))).toBe(1);
      expect(allocation.vesting.nextPlanId()).toBe(2);
      expect(allocation.vesting.listPlans().map((p) => p.poolLabel)).toEqual(["Team", "Advisors"]);
      expect(allocation.vesting.getPlan(1)).toEqual({ id: 1, ...standardPlan({ poolLabel: "Advisors" }) });
    });

    it("records a plan-created event", () => {
      allocation.vesting.createPlan(ADMIN, standardPlan());

      const [stored] = allocation.events.read("vesting");
      expect(stored?.event.type).toBe("vesting.plan.created");
      expect(stored?.event.payload).toEqual({
        planId: 0,
        startDate: T0,
        cliffDuration: 30 * DAY,
        totalDuration: 120 * DAY,
        revocable: true,
        initialReleasePercentage: 1_000,
        poolLabel: "Team",
      });
      expect(stored?.event.metadata).toMatchObject({
        actor: ADMIN,
        source: "vesting",
        timestamp: new Date((T0 - DAY) * 1000).toISOString(),
      });
    });

    it("requires the admin role", () => {
      expect(() => allocation.vesting.createPlan(SCRIPT, standardPlan())).toThrow(AuthorizationError);
      expect(allocation.vesting.nextPlanId()).toBe(0);
    });

    it.each([
      ["a cliff longer than the duration", { cliffDuration: 121 * DAY }, "INVALID_SCHEDULE"],
      ["a zero duration", { cliffDuration: 0, totalDuration: 0 }, "INVALID_SCHEDULE"],
      ["a fractional time", { cliffDuration: 1.5 }, "INVALID_SCHEDULE"],
      ["a negative time", { cliffDuration: -1 }, "INVALID_SCHEDULE"],
      ["an initial release above 100%", { initialReleasePercentage: 10_001 }, "INVALID_SCHEDULE"],
      ["a start in the past", { startDate: T0 - 2 * DAY }, "START_IN_PAST"],
    ] as const)("rejects %s", (_name, overrides, code) => {
      try {
        allocation.vesting.createPlan(ADMIN, standardPlan(overrides));
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        expect(err).toMatchObject({ code });
      }
      expect(allocation.vesting.nextPlanId()).toBe(0);
      expect(allocation.events.readAll()).toEqual([]);
    });

    it("accepts a cliff equal to the duration and a start of now", () => {
      const id = allocation.vesting.createPlan(
        ADMIN,
        standardPlan({ startDate: T0 - DAY, cliffDuration: 10, totalDuration: 10 }),
      );
      expect(allocation.vesting.getPlan(id).cliffDuration).toBe(10);
    });

    it("reports unknown plans", () => {
      expect(() => allocation.vesting.getPlan(0)).toThrow("Plan 0 not found");
    });
  });

  describe("setTriggerTime", () => {
    beforeEach(() => {
      allocation.vesting.createPlan(ADMIN, standardPlan());
    });

    it("stores the latest trigger time", () => {
      expect(allocation.vesting.getTriggerTime(0)).toBeUndefined();
      allocation.vesting.setTriggerTime(ADMIN, 0, T0 + DAY);
      allocation.vesting.setTriggerTime(ADMIN, 0, T0);
      expect(allocation.vesting.getTriggerTime(0)).toBe(T0);
      expect(eventTypes(allocation).filter((t) => t === "vesting.trigger-time.set")).toHaveLength(2);
    });

    it("rejects a trigger time before the plan start", () => {
      expect(() => allocation.vesting.setTriggerTime(ADMIN, 0, T0 - 1)).toThrow(
        `Trigger time ${T0 - 1} must be an integer at or after the plan start ${T0}`,
      );
      expect(allocation.vesting.getTriggerTime(0)).toBeUndefined();
    });

    it("rejects unknown plans", () => {
      expect(() => allocation.vesting.setTriggerTime(ADMIN, 1, T0)).toThrow(ValidationError);
    });

    it("requires the admin role", () => {
      expect(() => allocation.vesting.setTriggerTime(ALICE, 0, T0)).toThrow(AuthorizationError);
    });
  });

  // ─── Grants ────────────────────────────────────────────────────────

  describe("issueGrant", () => {
    beforeEach(() => {
      allocation.vesting.createPlan(ADMIN, standardPlan());
    });

    it("appends a grant and updates the aggregates", () => {
      allocation.vesting.issueGrant(ADMIN, { beneficiary: ALICE, startDate: T0, amount: 1_000n, planId: 0 });
      allocation.vesting.issueGrant(VESTING, { beneficiary: ALICE, startDate: T0 + DAY, amount: 500n, planId: 0 });

      expect(allocation.vesting.getGrants(ALICE, 0)).toEqual([
        { totalAmount: 1_000n, claimedAmount: 0n, startDate: T0, beneficiary: ALICE },
        { totalAmount: 500n, claimedAmount: 0n, startDate: T0 + DAY, beneficiary: ALICE },
      ]);
      expect(allocation.vesting.getHolderStat(ALICE)).toEqual({
        grantCount: 2,
        totalGrantedAmount: 1_500n,
        totalClaimedAmount: 0n,
      });
      expect(allocation.vesting.totalVestingAmount()).toBe(1_500n);
    });

    it("records a grant-created event", () => {
      allocation.vesting.issueGrant(ADMIN, { beneficiary: BOB, startDate: T0, amount: 42n, planId: 0 });
      const events = allocation.events.read("vesting");
      expect(events[1]?.event).toMatchObject({
        type: "vesting.grant.created",
        payload: { beneficiary: BOB, planId: 0, amount: "42", startDate: T0 },
      });
    });

    it("rejects the next, not yet created, plan id", () => {
      expect(() =>
        allocation.vesting.issueGrant(ADMIN, { beneficiary: ALICE, startDate: T0, amount: 1n, planId: 1 }),
      ).toThrow("Plan 1 not found");
    });

    it("rejects non-positive amounts", () => {
      expect(() =>
        allocation.vesting.issueGrant(ADMIN, { beneficiary: ALICE, startDate: T0, amount: 0n, planId: 0 }),
      ).toThrow("Grant amount must be positive, got 0");
    });

    it("rejects a start before the plan start", () => {
      expect(() =>
        allocation.vesting.issueGrant(ADMIN, { beneficiary: ALICE, startDate: T0 - 1, amount: 1n, planId: 0 }),
      ).toThrow(ValidationError);
    });

    it("rejects an empty or zero beneficiary", () => {
      for (const beneficiary of ["", "0x" + "00".repeat(20)]) {
        expect(() =>
          allocation.vesting.issueGrant(ADMIN, { beneficiary, startDate: T0, amount: 1n, planId: 0 }),
        ).toThrow(ValidationError);
      }
      expect(allocation.vesting.totalVestingAmount()).toBe(0n);
    });

    it("requires the admin or approved-contract role", () => {
      expect(() =>
        allocation.vesting.issueGrant(SCRIPT, { beneficiary: ALICE, startDate: T0, amount: 1n, planId: 0 }),
      ).toThrow(`'${SCRIPT}' lacks any of the roles: admin, approved-contract`);
    });

    it("reports empty aggregates for unknown holders", () => {
      expect(allocation.vesting.getHolderStat(BOB)).toEqual({
        grantCount: 0,
        totalGrantedAmount: 0n,
        totalClaimedAmount: 0n,
      });
      expect(allocation.vesting.getGrants(BOB, 0)).toEqual([]);
    });
  });

  // ─── Claim ─────────────────────────────────────────────────────────

  describe("claim", () => {
    it("releases the unlocked share at day 75, then the rest at the end", () => {
      planWithGrant(harness);

      harness.clock.set(T0 + 75 * DAY);
      expect(allocation.vesting.claim(ALICE, 0)).toBe(550n);
      expect(allocation.tokens.balanceOf(ALICE)).toBe(550n);
      expect(allocation.distribution.getPool("Team").usedAmount).toBe(550n);
      expect(allocation.vesting.getGrants(ALICE, 0)[0]?.claimedAmount).toBe(550n);
      expect(allocation.vesting.getHolderStat(ALICE).totalClaimedAmount).toBe(550n);
      expect(allocation.vesting.totalVestingAmount()).toBe(450n);

      harness.clock.set(T0 + 120 * DAY);
      expect(allocation.vesting.claim(ALICE, 0)).toBe(450n);
      expect(allocation.tokens.balanceOf(ALICE)).toBe(1_000n);
      expect(allocation.vesting.totalVestingAmount()).toBe(0n);
    });

    it("commits the disbursement and the claim events in order", () => {
      planWithGrant(harness);
      harness.clock.set(T0 + 75 * DAY);
      allocation.vesting.claim(ALICE, 0);

      expect(eventTypes(allocation).slice(-2)).toEqual(["distribution.disbursed", "vesting.claimed"]);
      const claimed = allocation.events.read("vesting").at(-1);
      expect(claimed?.event.payload).toEqual({ beneficiary: ALICE, planId: 0, amount: "550" });
    });

    it("settles every grant of the pair", () => {
      planWithGrant(harness);
      allocation.vesting.issueGrant(ADMIN, { beneficiary: ALICE, startDate: T0, amount: 500n, planId: 0 });

      harness.clock.set(T0);
      expect(allocation.vesting.claim(ALICE, 0)).toBe(150n);
      expect(allocation.vesting.getGrants(ALICE, 0).map((g) => g.claimedAmount)).toEqual([100n, 50n]);
    });

    it("fails when nothing has unlocked yet", () => {
      planWithGrant(harness);
      expect(() => allocation.vesting.claim(ALICE, 0)).toThrow(
        `Nothing claimable for '${ALICE}' under plan 0`,
      );
    });

    it("fails on a second claim at the same time", () => {
      planWithGrant(harness);
      harness.clock.set(T0 + 75 * DAY);
      allocation.vesting.claim(ALICE, 0);

      try {
        allocation.vesting.claim(ALICE, 0);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(StateError);
        expect(err).toMatchObject({ code: "NOTHING_CLAIMABLE" });
      }
      expect(allocation.vesting.getGrants(ALICE, 0)[0]?.claimedAmount).toBe(550n);
    });

    it("fails without grants", () => {
      planWithGrant(harness);
      expect(() => allocation.vesting.claim(BOB, 0)).toThrow(`'${BOB}' has no grants under plan 0`);
    });

    it("fails until a trigger time is set", () => {
      allocation.vesting.createPlan(ADMIN, standardPlan());
      allocation.vesting.issueGrant(ADMIN, { beneficiary: ALICE, startDate: T0, amount: 1n, planId: 0 });
      harness.clock.set(T0 + 200 * DAY);

      expect(() => allocation.vesting.claim(ALICE, 0)).toThrow("Plan 0 has no trigger time");
      expect(allocation.vesting.claimableAmount(ALICE, 0)).toBe(0n);
    });

    it("fails for unknown plans", () => {
      expect(() => allocation.vesting.claim(ALICE, 3)).toThrow(ValidationError);
    });

    it("rolls back the whole claim when the pool is exhausted", () => {
      // Team capacity is 150,000.
      planWithGrant(harness, 200_000n);
      harness.clock.set(T0 + 120 * DAY);
      const before = eventTypes(allocation);

      expect(() => allocation.vesting.claim(ALICE, 0)).toThrow(CapacityError);

      expect(allocation.vesting.getGrants(ALICE, 0)[0]?.claimedAmount).toBe(0n);
      expect(allocation.vesting.getHolderStat(ALICE).totalClaimedAmount).toBe(0n);
      expect(allocation.vesting.totalVestingAmount()).toBe(200_000n);
      expect(allocation.distribution.getPool("Team").usedAmount).toBe(0n);
      expect(allocation.tokens.balanceOf(ALICE)).toBe(0n);
      expect(eventTypes(allocation)).toEqual(before);
    });

    it("rejects claims while paused", () => {
      planWithGrant(harness);
      harness.clock.set(T0 + 75 * DAY);
      allocation.roles.pause(ADMIN);

      expect(() => allocation.vesting.claim(ALICE, 0)).toThrow("Operations are paused");
      expect(allocation.vesting.claimableAmount(ALICE, 0)).toBe(550n);
    });
  });

  describe("claimableAmount", () => {
    it("previews without changing state", () => {
      planWithGrant(harness);
      harness.clock.set(T0 + 75 * DAY);

      expect(allocation.vesting.claimableAmount(ALICE, 0)).toBe(550n);
      expect(allocation.vesting.claimableAmount(ALICE, 0)).toBe(550n);
      expect(allocation.vesting.claimableAmount(ALICE, 0, T0 + 120 * DAY)).toBe(1_000n);
      expect(allocation.vesting.getGrants(ALICE, 0)[0]?.claimedAmount).toBe(0n);

      allocation.vesting.claim(ALICE, 0);
      expect(allocation.vesting.claimableAmount(ALICE, 0)).toBe(0n);
    });
  });

  // ─── Reentrancy ────────────────────────────────────────────────────

  describe("reentrancy", () => {
    it("rejects a distributor calling back into the engine", () => {
      const gate = new RoleRegistry(OWNER);
      gate.grantRole(OWNER, ADMIN, "admin");
      const clock = new ManualClock(T0 - DAY);
      let calls = 0;
      let engine: VestingEngine | undefined;
      const distributor: Distributor = {
        distribute: () => {
          calls += 1;
          engine?.claim(ALICE, 0);
        },
      };
      engine = new VestingEngine(VESTING, {
        gate,
        distributor,
        events: new InMemoryEventStore(),
        clock,
      });

      engine.createPlan(ADMIN, standardPlan());
      engine.setTriggerTime(ADMIN, 0, T0);
      engine.issueGrant(ADMIN, { beneficiary: ALICE, startDate: T0, amount: 1_000n, planId: 0 });
      clock.set(T0 + 75 * DAY);

      try {
        engine.claim(ALICE, 0);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(StateError);
        expect(err).toMatchObject({ code: "REENTRANT_CALL" });
      }

      expect(calls).toBe(1);
      expect(engine.getGrants(ALICE, 0)[0]?.claimedAmount).toBe(0n);
      expect(engine.totalVestingAmount()).toBe(1_000n);
    });
  });

  // ─── Revoke ────────────────────────────────────────────────────────

  describe("revoke", () => {
    it("pays out the unlocked share and forfeits the rest", () => {
      planWithGrant(harness);
      harness.clock.set(T0 + 75 * DAY);

      expect(allocation.vesting.revoke(ADMIN, ALICE, 0)).toEqual({ released: 550n, forfeited: 450n });
      expect(allocation.vesting.isRevoked(ALICE, 0)).toBe(true);
      expect(allocation.tokens.balanceOf(ALICE)).toBe(550n);
      expect(allocation.vesting.totalVestingAmount()).toBe(450n);
      expect(allocation.vesting.claimableAmount(ALICE, 0)).toBe(0n);

      const revoked = allocation.events.read("vesting").at(-1);
      expect(revoked?.event).toMatchObject({
        type: "vesting.revoked",
        payload: { beneficiary: ALICE, planId: 0, released: "550", forfeited: "450" },
      });
    });

    it("blocks later claims and revocations", () => {
      planWithGrant(harness);
      harness.clock.set(T0 + 75 * DAY);
      allocation.vesting.revoke(ADMIN, ALICE, 0);
      harness.clock.set(T0 + 120 * DAY);

      expect(() => allocation.vesting.claim(ALICE, 0)).toThrow(`Plan 0 is revoked for '${ALICE}'`);
      expect(() => allocation.vesting.revoke(ADMIN, ALICE, 0)).toThrow(
        `Plan 0 is already revoked for '${ALICE}'`,
      );
    });

    it("revokes with nothing to release", () => {
      planWithGrant(harness);
      harness.clock.set(T0 + 75 * DAY);
      allocation.vesting.claim(ALICE, 0);

      expect(allocation.vesting.revoke(ADMIN, ALICE, 0)).toEqual({ released: 0n, forfeited: 450n });
      expect(eventTypes(allocation).slice(-1)).toEqual(["vesting.revoked"]);
    });

    it("revokes before a trigger time is set", () => {
      allocation.vesting.createPlan(ADMIN, standardPlan());
      allocation.vesting.issueGrant(ADMIN, { beneficiary: ALICE, startDate: T0, amount: 1_000n, planId: 0 });

      expect(allocation.vesting.revoke(ADMIN, ALICE, 0)).toEqual({ released: 0n, forfeited: 1_000n });
      expect(allocation.tokens.balanceOf(ALICE)).toBe(0n);
      expect(allocation.tokens.balanceOf(DISTRIBUTION)).toBe(1_000_000n);
    });

    it("rolls back the revocation when the release cannot be paid", () => {
      // Team capacity is 150,000.
      planWithGrant(harness, 200_000n);
      allocation.vesting.issueGrant(ADMIN, { beneficiary: ALICE, startDate: T0, amount: 1_000n, planId: 0 });
      harness.clock.set(T0 + 120 * DAY);
      const before = eventTypes(allocation);

      expect(() => allocation.vesting.revoke(ADMIN, ALICE, 0)).toThrow(CapacityError);

      expect(allocation.vesting.isRevoked(ALICE, 0)).toBe(false);
      expect(allocation.vesting.getGrants(ALICE, 0).map((g) => g.claimedAmount)).toEqual([0n, 0n]);
      expect(allocation.vesting.getHolderStat(ALICE)).toEqual({
        grantCount: 2,
        totalGrantedAmount: 201_000n,
        totalClaimedAmount: 0n,
      });
      expect(allocation.vesting.totalVestingAmount()).toBe(201_000n);
      expect(allocation.distribution.getPool("Team").usedAmount).toBe(0n);
      expect(eventTypes(allocation)).toEqual(before);
    });

    it("leaves everything unchanged on a non-revocable plan", () => {
      planWithGrant(harness, 1_000n, { revocable: false });
      harness.clock.set(T0 + 75 * DAY);
      const before = eventTypes(allocation);

      try {
        allocation.vesting.revoke(ADMIN, ALICE, 0);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(StateError);
        expect(err).toMatchObject({ code: "NOT_REVOCABLE" });
      }

      expect(allocation.vesting.isRevoked(ALICE, 0)).toBe(false);
      expect(allocation.vesting.getGrants(ALICE, 0)[0]?.claimedAmount).toBe(0n);
      expect(allocation.tokens.balanceOf(ALICE)).toBe(0n);
      expect(eventTypes(allocation)).toEqual(before);
    });

    it("fails without grants", () => {
      allocation.vesting.createPlan(ADMIN, standardPlan());
      expect(() => allocation.vesting.revoke(ADMIN, ALICE, 0)).toThrow(StateError);
      expect(allocation.vesting.isRevoked(ALICE, 0)).toBe(false);
    });

    it("requires the admin role", () => {
      planWithGrant(harness);
      expect(() => allocation.vesting.revoke(ALICE, ALICE, 0)).toThrow(AuthorizationError);
    });
  });

  // ─── Debt write-off ────────────────────────────────────────────────

  describe("writeOffDebt", () => {
    beforeEach(() => {
      planWithGrant(harness, 1_000n);
      planWithGrant(harness, 500n, { poolLabel: "Advisors" });
    });

    it("walks plans in id order without moving tokens", () => {
      expect(allocation.vesting.writeOffDebt(ADMIN, ALICE, 1_200n)).toEqual({
        amount: 1_200n,
        plans: [
          { planId: 0, amount: 1_000n },
          { planId: 1, amount: 200n },
        ],
      });

      expect(allocation.vesting.getGrants(ALICE, 0)[0]?.claimedAmount).toBe(1_000n);
      expect(allocation.vesting.getGrants(ALICE, 1)[0]?.claimedAmount).toBe(200n);
      expect(allocation.vesting.getHolderStat(ALICE).totalClaimedAmount).toBe(1_200n);
      expect(allocation.vesting.totalVestingAmount()).toBe(300n);

      expect(allocation.tokens.balanceOf(ALICE)).toBe(0n);
      expect(allocation.distribution.totalUsedAmount()).toBe(0n);
      expect(eventTypes(allocation).slice(-3)).toEqual([
        "vesting.debt.written-off.plan",
        "vesting.debt.written-off.plan",
        "vesting.debt.written-off",
      ]);
    });

    it("reduces what later claims release", () => {
      allocation.vesting.writeOffDebt(VESTING, ALICE, 600n);

      harness.clock.set(T0 + 75 * DAY);
      expect(allocation.vesting.claimableAmount(ALICE, 0)).toBe(0n);
      expect(() => allocation.vesting.claim(ALICE, 0)).toThrow(StateError);

      harness.clock.set(T0 + 120 * DAY);
      expect(allocation.vesting.claim(ALICE, 0)).toBe(400n);
    });

    it("rejects debt above the outstanding entitlement and changes nothing", () => {
      try {
        allocation.vesting.writeOffDebt(ADMIN, ALICE, 1_501n);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        expect(err).toMatchObject({ code: "DEBT_EXCEEDS_ENTITLEMENT" });
      }

      expect(allocation.vesting.getGrants(ALICE, 0)[0]?.claimedAmount).toBe(0n);
      expect(allocation.vesting.getGrants(ALICE, 1)[0]?.claimedAmount).toBe(0n);
      expect(allocation.vesting.getHolderStat(ALICE).totalClaimedAmount).toBe(0n);
      expect(allocation.vesting.totalVestingAmount()).toBe(1_500n);
    });

    it("skips revoked plans and fails when the rest cannot cover the debt", () => {
      allocation.vesting.revoke(ADMIN, ALICE, 0);

      expect(() => allocation.vesting.writeOffDebt(ADMIN, ALICE, 600n)).toThrow(
        `Debt 600 exceeds the non-revoked entitlement of '${ALICE}' by 100`,
      );
      expect(allocation.vesting.getGrants(ALICE, 1)[0]?.claimedAmount).toBe(0n);

      expect(allocation.vesting.writeOffDebt(ADMIN, ALICE, 500n).plans).toEqual([
        { planId: 1, amount: 500n },
      ]);
    });

    it("rejects non-positive amounts", () => {
      expect(() => allocation.vesting.writeOffDebt(ADMIN, ALICE, 0n)).toThrow(ValidationError);
    });

    it("rejects holders without entitlement", () => {
      expect(() => allocation.vesting.writeOffDebt(ADMIN, BOB, 1n)).toThrow(ValidationError);
      expect(allocation.vesting.getHolderStat(BOB).grantCount).toBe(0);
    });

    it("requires the admin or approved-contract role", () => {
      expect(() => allocation.vesting.writeOffDebt(DISTRIBUTION, ALICE, 1n)).toThrow(
        AuthorizationError,
      );
    });
  });
});
