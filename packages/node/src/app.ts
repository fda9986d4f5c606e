/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { Address } from "@allotment/types";
import type { AppEnv } from "./types/api-contract.js";
import { AllocationService } from "./services/allocation-service.js";
import type { AllocationServiceConfig } from "./services/allocation-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPlanRoutes } from "./routes/plans.js";
import {
  createBeneficiaryRoutes,
  createDebtRoutes,
  createGrantRoutes,
} from "./routes/grants.js";
import { createPoolRoutes } from "./routes/pools.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: AllocationServiceConfig;
  /** Application logger. Default: a silent pino instance */
  readonly logger?: Logger;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** API key → caller address. Empty or absent selects X-Caller header mode. */
  readonly apiKeys?: ReadonlyMap<string, Address>;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: AllocationService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const service = new AllocationService(options.serviceConfig, logger);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(logger));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", authMiddleware({ apiKeys: options.apiKeys ?? new Map<string, Address>() }));

  app.route("/api/v1/plans", createPlanRoutes());
  app.route("/api/v1/grants", createGrantRoutes());
  app.route("/api/v1/debts", createDebtRoutes());
  app.route("/api/v1/beneficiaries", createBeneficiaryRoutes());
  app.route("/api/v1/pools", createPoolRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
