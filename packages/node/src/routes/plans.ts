/**
 * Vesting plan routes.
 *
 * POST /api/v1/plans                   — Create a plan
 * GET  /api/v1/plans                   — List plans
 * GET  /api/v1/plans/:id               — Get a plan and its trigger time
 * PUT  /api/v1/plans/:id/trigger-time  — Set the trigger time
 * POST /api/v1/plans/:id/claim         — Claim as the caller
 * POST /api/v1/plans/:id/revoke        — Revoke a beneficiary's grants
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreatePlanSchema,
  PlanIdParamSchema,
  RevokeSchema,
  SetTriggerTimeSchema,
} from "../types/dto.js";
import { callerOf } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createPlanRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/plans — Create
  routes.post("/", validateBody(CreatePlanSchema), (c) => {
    const plan = c.get("service").createPlan(callerOf(c), c.req.valid("json"));
    return c.json({ data: plan }, 201);
  });

  // GET /api/v1/plans — List
  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listPlans() });
  });

  // GET /api/v1/plans/:id — Get one
  routes.get("/:id", (c) => {
    const parsed = PlanIdParamSchema.safeParse(c.req.param("id"));
    const plan = parsed.success ? c.get("service").findPlan(parsed.data) : undefined;

    if (plan === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Plan '${c.req.param("id")}' not found`),
        404,
      );
    }
    return c.json({ data: plan });
  });

  // PUT /api/v1/plans/:id/trigger-time
  routes.put("/:id/trigger-time", validateBody(SetTriggerTimeSchema), (c) => {
    const planId = PlanIdParamSchema.parse(c.req.param("id"));
    const { triggerTime } = c.req.valid("json");
    const plan = c.get("service").setTriggerTime(callerOf(c), planId, triggerTime);
    return c.json({ data: plan });
  });

  // POST /api/v1/plans/:id/claim
  routes.post("/:id/claim", (c) => {
    const planId = PlanIdParamSchema.parse(c.req.param("id"));
    const claim = c.get("service").claim(callerOf(c), planId);
    return c.json({ data: claim });
  });

  // POST /api/v1/plans/:id/revoke
  routes.post("/:id/revoke", validateBody(RevokeSchema), (c) => {
    const planId = PlanIdParamSchema.parse(c.req.param("id"));
    const { beneficiary } = c.req.valid("json");
    const result = c.get("service").revoke(callerOf(c), beneficiary, planId);
    return c.json({ data: result });
  });

  return routes;
}
