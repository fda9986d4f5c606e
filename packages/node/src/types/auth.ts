/**
 * Caller identity types.
 *
 * Every mutating request acts on behalf of one account address. Roles
 * are not resolved here: the capability gate checks them per operation.
 */

import type { Address } from "@allotment/types";

/** How the caller's address was established. */
export type CallerSource = "api-key" | "header";

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly source: CallerSource;
  readonly caller: Address;
}

/**
 * A configured API key and the account it acts as.
 */
export interface ApiKeyRecord {
  readonly key: string;
  readonly address: Address;
}
