/**
 * Runtime Type Guards
 *
 * Narrowing functions for allocation domain types, used where
 * addresses and pool labels arrive as plain strings.
 */

import { POOL_LABELS, ZERO_ADDRESS } from "./allocation.js";
import type { Address, PoolLabel } from "./allocation.js";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const POOLS = new Set<string>(POOL_LABELS);

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/** A well-formed address that is not the null address. */
export function isNonZeroAddress(value: unknown): value is Address {
  return isAddress(value) && value.toLowerCase() !== ZERO_ADDRESS;
}

export function isPoolLabel(value: unknown): value is PoolLabel {
  return typeof value === "string" && POOLS.has(value);
}
