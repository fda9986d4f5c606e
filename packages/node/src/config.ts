/**
 * @allotment/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isNonZeroAddress } from "@allotment/types";
import type { Address } from "@allotment/types";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .trim()
  .refine(isNonZeroAddress, { message: "Expected a non-zero 0x-prefixed 20-byte address" });

/** Comma-separated address list; empty entries are ignored. */
const AddressListSchema = z
  .string()
  .default("")
  .transform((raw) =>
    raw
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry !== ""),
  )
  .pipe(z.array(AddressSchema));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Token
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(18).default(18),

  // Accounts
  OWNER_ADDRESS: AddressSchema,
  VESTING_ADDRESS: AddressSchema.default("0x0000000000000000000000000000000000000001"),
  DISTRIBUTION_ADDRESS: AddressSchema.default("0x0000000000000000000000000000000000000002"),
  ADMIN_ADDRESSES: AddressListSchema,
  SCRIPT_ADDRESSES: AddressListSchema,
  APPROVED_CONTRACTS: AddressListSchema,
}).superRefine((config, ctx) => {
  // Without keys every caller names itself through X-Caller.
  if (config.NODE_ENV === "production" && config.API_KEYS.trim() === "") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["API_KEYS"],
      message: "API_KEYS is required in production; X-Caller identity is accepted only in development and test",
    });
  }
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into key → caller address records.
 *
 * Format: "key1:0xaddress1,key2:0xaddress2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const [key, address, ...rest] = entry.trim().split(":");
    if (key === undefined || address === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isNonZeroAddress(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key "${key}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, address });
  }

  return keys;
}

/** Key → caller address lookup for the auth middleware. */
export function apiKeyMap(records: readonly ApiKeyRecord[]): ReadonlyMap<string, Address> {
  return new Map(records.map((r) => [r.key, r.address]));
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid, or
 * if NODE_ENV is production and no API keys are configured
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
