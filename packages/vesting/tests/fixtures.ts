/**
 * Shared fixtures for vesting tests.
 */

import type { Address, Clock, Timestamp } from "@allotment/types";
import { Allocation } from "../src/allocation.js";
import type { CreatePlanInput } from "../src/types.js";

export const DAY = 86_400;
export const T0: Timestamp = 1_700_000_000;

export const OWNER: Address = "0x" + "0a".repeat(20);
export const ADMIN: Address = "0x" + "ad".repeat(20);
export const SCRIPT: Address = "0x" + "5c".repeat(20);
export const VESTING: Address = "0x" + "7e".repeat(20);
export const DISTRIBUTION: Address = "0x" + "d1".repeat(20);
export const ALICE: Address = "0x" + "a1".repeat(20);
export const BOB: Address = "0x" + "b0".repeat(20);

/** Small supply so capacities are easy to read: 1,000,000 base units. */
export const SUPPLY = 1_000_000n;

export class ManualClock implements Clock {
  constructor(private current: Timestamp) {}

  now(): Timestamp {
    return this.current;
  }

  set(time: Timestamp): void {
    this.current = time;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export interface Harness {
  readonly allocation: Allocation;
  readonly clock: ManualClock;
}

/**
 * Allocation over a 1,000,000-unit supply split by the default
 * percentages (Team 150,000; GameTreasury 200,000; Reserve 200,000...),
 * with ADMIN and SCRIPT assigned. The clock starts one day before T0.
 */
export function createHarness(): Harness {
  const clock = new ManualClock(T0 - DAY);
  const allocation = new Allocation({
    owner: OWNER,
    vestingAddress: VESTING,
    distributionAddress: DISTRIBUTION,
    clock,
    totalSupply: SUPPLY,
    decimals: 0,
  });
  allocation.assignRoles(OWNER, [ADMIN], "admin");
  allocation.assignRoles(OWNER, [SCRIPT], "script");
  return { allocation, clock };
}

/** 30-day cliff, 120-day duration, 10% at trigger, paid from Team. */
export function standardPlan(overrides: Partial<CreatePlanInput> = {}): CreatePlanInput {
  return {
    startDate: T0,
    cliffDuration: 30 * DAY,
    totalDuration: 120 * DAY,
    revocable: true,
    initialReleasePercentage: 1_000,
    poolLabel: "Team",
    ...overrides,
  };
}
