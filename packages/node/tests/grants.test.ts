/**
 * Tests for grant, debt and beneficiary routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  ADMIN,
  ALICE,
  BOB,
  callerRequest,
  createTestApp,
  DAY,
  planBody,
  SCRIPT,
  T0,
} from "./setup.js";
import type { TestApp } from "./setup.js";

function grantBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { beneficiary: ALICE, planId: 0, amount: "1000", startDate: T0, ...overrides };
}

describe("grant routes", () => {
  let test: TestApp;

  async function post(path: string, body: unknown, caller = ADMIN): Promise<Response> {
    return test.app.request(callerRequest(caller, path, "POST", body));
  }

  beforeEach(async () => {
    test = createTestApp();
    await post("/api/v1/plans", planBody());
  });

  // ─── Issue ─────────────────────────────────────────────────────────

  describe("POST /api/v1/grants", () => {
    it("issues a grant and returns the position", async () => {
      const res = await post("/api/v1/grants", grantBody());

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        data: {
          beneficiary: ALICE,
          planId: 0,
          grants: [
            { totalAmount: "1000", claimedAmount: "0", startDate: T0, beneficiary: ALICE },
          ],
          claimable: "0",
          revoked: false,
        },
      });
    });

    it("accumulates grants for the same pair", async () => {
      await post("/api/v1/grants", grantBody());
      const res = await post("/api/v1/grants", grantBody({ amount: "250", startDate: T0 + DAY }));

      expect(await res.json()).toMatchObject({
        data: {
          grants: [
            { totalAmount: "1000", startDate: T0 },
            { totalAmount: "250", startDate: T0 + DAY },
          ],
        },
      });
    });

    it("returns 403 for a script caller", async () => {
      const res = await post("/api/v1/grants", grantBody(), SCRIPT);

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        error: {
          code: "MISSING_ROLE",
          message: `'${SCRIPT}' lacks any of the roles: admin, approved-contract`,
        },
      });
    });

    it("returns 400 for an unknown plan", async () => {
      const res = await post("/api/v1/grants", grantBody({ planId: 1 }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: "UNKNOWN_PLAN", message: "Plan 1 not found" },
      });
    });

    it("returns 400 for a zero amount", async () => {
      const res = await post("/api/v1/grants", grantBody({ amount: "0" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: "INVALID_AMOUNT", message: "Grant amount must be positive, got 0" },
      });
    });

    it("returns 400 for more decimal places than the token has", async () => {
      const res = await post("/api/v1/grants", grantBody({ amount: "1.5" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: "INVALID_AMOUNT",
          message: 'Amount "1.5" has 1 decimal places, but the token allows 0',
        },
      });
    });

    it("returns 400 for a grant starting before its plan", async () => {
      const res = await post("/api/v1/grants", grantBody({ startDate: T0 - 1 }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: "INVALID_SCHEDULE",
          message: `Grant start ${T0 - 1} precedes the plan start ${T0}`,
        },
      });
    });

    it("returns 400 for a malformed beneficiary", async () => {
      const res = await post("/api/v1/grants", grantBody({ beneficiary: "0x1234" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: {
          code: "VALIDATION_ERROR",
          details: {
            issues: [{ path: "beneficiary", message: "Expected a 0x-prefixed 20-byte hex address" }],
          },
        },
      });
    });
  });

  // ─── Debt write-off ────────────────────────────────────────────────

  describe("POST /api/v1/debts", () => {
    it("marks entitlement as claimed without moving tokens", async () => {
      await post("/api/v1/grants", grantBody());

      const res = await post("/api/v1/debts", { beneficiary: ALICE, amount: "300" });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: { beneficiary: ALICE, amount: "300", plans: [{ planId: 0, amount: "300" }] },
      });
      expect(test.service.allocation.tokens.balanceOf(ALICE)).toBe(0n);
      expect(test.service.pool("Team").usedAmount).toBe("0");
    });

    it("spreads a write-off across plans in id order", async () => {
      await post("/api/v1/plans", planBody({ poolLabel: "Advisors" }));
      await post("/api/v1/grants", grantBody());
      await post("/api/v1/grants", grantBody({ planId: 1, amount: "500" }));

      const res = await post("/api/v1/debts", { beneficiary: ALICE, amount: "1200" });

      expect(await res.json()).toEqual({
        data: {
          beneficiary: ALICE,
          amount: "1200",
          plans: [
            { planId: 0, amount: "1000" },
            { planId: 1, amount: "200" },
          ],
        },
      });
    });

    it("returns 400 when the debt exceeds the entitlement", async () => {
      await post("/api/v1/grants", grantBody());

      const res = await post("/api/v1/debts", { beneficiary: ALICE, amount: "1500" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: "DEBT_EXCEEDS_ENTITLEMENT",
          message: `Debt 1500 exceeds the outstanding entitlement 1000 of '${ALICE}'`,
        },
      });
      expect(test.service.position(ALICE, 0).grants[0]?.claimedAmount).toBe("0");
    });
  });

  // ─── Beneficiary views ─────────────────────────────────────────────

  describe("GET /api/v1/beneficiaries", () => {
    it("returns holder aggregates", async () => {
      await post("/api/v1/grants", grantBody());
      await post("/api/v1/debts", { beneficiary: ALICE, amount: "100" });

      const res = await test.app.request(`/api/v1/beneficiaries/${ALICE}`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: {
          address: ALICE,
          grantCount: 1,
          totalGrantedAmount: "1000",
          totalClaimedAmount: "100",
        },
      });
    });

    it("returns zeros for an address without grants", async () => {
      const res = await test.app.request(`/api/v1/beneficiaries/${BOB}`);

      expect(await res.json()).toEqual({
        data: { address: BOB, grantCount: 0, totalGrantedAmount: "0", totalClaimedAmount: "0" },
      });
    });

    it("returns 400 for a malformed address", async () => {
      const res = await test.app.request("/api/v1/beneficiaries/not-an-address");

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: "VALIDATION_ERROR", message: "Request validation failed" },
      });
    });

    it("reports what is claimable under a plan", async () => {
      await post("/api/v1/grants", grantBody());
      await test.app.request(
        callerRequest(ADMIN, "/api/v1/plans/0/trigger-time", "PUT", { triggerTime: T0 }),
      );
      test.clock.set(T0 + 75 * DAY);

      const res = await test.app.request(`/api/v1/beneficiaries/${ALICE}/plans/0`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { beneficiary: ALICE, planId: 0, claimable: "550", revoked: false },
      });
    });

    it("reports a revoked pair", async () => {
      await post("/api/v1/grants", grantBody());
      await post("/api/v1/plans/0/revoke", { beneficiary: ALICE });

      const res = await test.app.request(`/api/v1/beneficiaries/${ALICE}/plans/0`);

      expect(await res.json()).toMatchObject({ data: { claimable: "0", revoked: true } });
    });
  });
});
