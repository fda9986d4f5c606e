/**
 * Caller identity middleware.
 *
 * Mutating requests act on behalf of one account address:
 * 1. With API keys configured: X-Api-Key is required and maps to its address
 * 2. Without keys (development, tests): the X-Caller header names the address
 *
 * Read-only requests pass through without an identity. Role checks are
 * left to the capability gate, which sees the resolved address.
 */

import type { Context, Input, MiddlewareHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { isNonZeroAddress } from "@allotment/types";
import type { Address } from "@allotment/types";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

const READ_ONLY_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export interface AuthConfig {
  /** API key → caller address. Empty selects header mode. */
  readonly apiKeys: ReadonlyMap<string, Address>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (READ_ONLY_METHODS.has(c.req.method)) {
      return next();
    }

    let auth: AuthContext | undefined;

    if (config.apiKeys.size > 0) {
      const apiKey = c.req.header(API_KEY_HEADER);
      if (apiKey === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
      }
      const address = config.apiKeys.get(apiKey);
      if (address === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      auth = { source: "api-key", caller: address };
    } else {
      const header = c.req.header(CALLER_HEADER);
      if (!isNonZeroAddress(header)) {
        return c.json(
          createErrorEnvelope("UNAUTHORIZED", `${CALLER_HEADER} must name a non-zero address`),
          401,
        );
      }
      auth = { source: "header", caller: header };
    }

    c.set("auth", auth);
    return next();
  };
}

/**
 * The caller of a mutating request.
 *
 * @throws HTTPException 401 when no identity was resolved
 */
export function callerOf<P extends string, I extends Input>(c: Context<AppEnv, P, I>): Address {
  const auth = c.get("auth");
  if (auth === undefined) {
    throw new HTTPException(401, { message: "Authentication required" });
  }
  return auth.caller;
}
