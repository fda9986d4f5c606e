/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope response. Domain errors map to a status by their kind:
 *
 *   authorization → 403    state      → 409
 *   validation    → 400    capacity   → 422
 *   dependency    → 502    (anything else → 500)
 */

import type { Context, ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { LedgerError } from "@allotment/ledger";
import { AllocationError } from "@allotment/vesting";
import type { AllocationErrorKind } from "@allotment/vesting";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const KIND_STATUS = {
  authorization: 403,
  validation: 400,
  state: 409,
  capacity: 422,
  dependency: 502,
} as const satisfies Record<AllocationErrorKind, number>;

function httpExceptionCode(status: number): string {
  switch (status) {
    case 400:
      return "VALIDATION_ERROR";
    case 401:
      return "UNAUTHORIZED";
    case 404:
      return "NOT_FOUND";
    default:
      return "INTERNAL_ERROR";
  }
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the handler registered as Hono's onError. Unexpected errors are
 * logged with the request id and answered with a generic 500.
 */
export function createErrorHandler(logger?: Logger): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>) => {
    if (err instanceof AllocationError) {
      const details = err.cause !== undefined ? { cause: String(err.cause) } : undefined;
      return c.json(createErrorEnvelope(err.code, err.message, details), KIND_STATUS[err.kind]);
    }

    // Malformed amounts rejected while scaling to base units
    if (err instanceof LedgerError) {
      return c.json(createErrorEnvelope(err.code, err.message), 400);
    }

    // Path and query parameters parsed inside handlers
    if (err instanceof ZodError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
          issues: formatZodErrors(err),
        }),
        400,
      );
    }

    if (err instanceof HTTPException) {
      return c.json(createErrorEnvelope(httpExceptionCode(err.status), err.message), err.status);
    }

    logger?.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
