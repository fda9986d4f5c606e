/**
 * Distribution pool routes.
 *
 * GET  /api/v1/pools                   — All pools with totals
 * GET  /api/v1/pools/:label            — One pool
 * POST /api/v1/pools/:label/swap       — Pay from a swap pool
 * POST /api/v1/pools/:label/liquidity  — Move reserve capacity into a swap pool
 */

import { Hono } from "hono";
import type { Context, Input } from "hono";
import { isPoolLabel } from "@allotment/types";
import type { AppEnv } from "../types/api-contract.js";
import { LiquiditySchema, SwapSchema } from "../types/dto.js";
import { callerOf } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

function poolNotFound<P extends string, I extends Input>(
  c: Context<AppEnv, P, I>,
  label: string,
): Response {
  return c.json(createErrorEnvelope("NOT_FOUND", `Pool '${label}' not found`), 404);
}

export function createPoolRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").pools() });
  });

  routes.get("/:label", (c) => {
    const label = c.req.param("label");
    if (!isPoolLabel(label)) {
      return poolNotFound(c, label);
    }
    return c.json({ data: c.get("service").pool(label) });
  });

  routes.post("/:label/swap", validateBody(SwapSchema), (c) => {
    const label = c.req.param("label");
    if (!isPoolLabel(label)) {
      return poolNotFound(c, label);
    }
    const { to, amount } = c.req.valid("json");
    return c.json({ data: c.get("service").swap(callerOf(c), label, to, amount) });
  });

  routes.post("/:label/liquidity", validateBody(LiquiditySchema), (c) => {
    const label = c.req.param("label");
    if (!isPoolLabel(label)) {
      return poolNotFound(c, label);
    }
    const { amount } = c.req.valid("json");
    return c.json({ data: c.get("service").transferLiquidity(callerOf(c), label, amount) });
  });

  return routes;
}
