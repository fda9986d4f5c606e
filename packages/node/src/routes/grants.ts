/**
 * Grant and beneficiary routes.
 *
 * POST /api/v1/grants                              — Issue a grant
 * POST /api/v1/debts                               — Write off a beneficiary's debt
 * GET  /api/v1/beneficiaries/:address              — Holder aggregates
 * GET  /api/v1/beneficiaries/:address/plans/:id    — Grants, claimable amount, revocation
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  IssueGrantSchema,
  PlanIdParamSchema,
  WriteOffDebtSchema,
} from "../types/dto.js";
import { callerOf } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createGrantRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(IssueGrantSchema), (c) => {
    const position = c.get("service").issueGrant(callerOf(c), c.req.valid("json"));
    return c.json({ data: position }, 201);
  });

  return routes;
}

export function createDebtRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(WriteOffDebtSchema), (c) => {
    const { beneficiary, amount } = c.req.valid("json");
    const result = c.get("service").writeOffDebt(callerOf(c), beneficiary, amount);
    return c.json({ data: result });
  });

  return routes;
}

export function createBeneficiaryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address", (c) => {
    const address = AddressSchema.parse(c.req.param("address"));
    return c.json({ data: c.get("service").holder(address) });
  });

  routes.get("/:address/plans/:id", (c) => {
    const address = AddressSchema.parse(c.req.param("address"));
    const planId = PlanIdParamSchema.parse(c.req.param("id"));
    return c.json({ data: c.get("service").position(address, planId) });
  });

  return routes;
}
