/**
 * @allotment/ledger — Deterministic token arithmetic.
 *
 * All arithmetic uses bigint base units. Decimal strings are only used
 * at the edges (API input, display) and converted via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Division always rounds toward zero (floor for non-negative values)
 */

import { BASIS_POINTS_DENOMINATOR } from "@allotment/types";
import type { BasisPoints, TokenAmount } from "@allotment/types";
import { LedgerError } from "./types.js";

/**
 * Parse a decimal string amount into base units.
 *
 * "100.5" with decimals=2 → 10050n
 * "100" with decimals=18 → 100000000000000000000n
 */
export function parseAmount(amount: string, decimals: number): TokenAmount {
  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${fracPart.length} decimal places, but the token allows ${decimals}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert base units back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 5n with decimals=0 → "5"
 */
export function formatAmount(scaled: TokenAmount, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Whole tokens to base units: toBaseUnits(1000n, 18) → 1000 * 10^18.
 */
export function toBaseUnits(tokens: bigint, decimals: number): TokenAmount {
  return tokens * 10n ** BigInt(decimals);
}

/**
 * `amount * numerator / denominator`, rounded down.
 */
export function mulDiv(
  amount: TokenAmount,
  numerator: bigint,
  denominator: bigint,
): TokenAmount {
  if (denominator === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
  return (amount * numerator) / denominator;
}

/**
 * Share of `amount` expressed in basis points, rounded down.
 */
export function applyBasisPoints(amount: TokenAmount, bps: BasisPoints): TokenAmount {
  return mulDiv(amount, BigInt(bps), BigInt(BASIS_POINTS_DENOMINATOR));
}

export function minAmount(a: TokenAmount, b: TokenAmount): TokenAmount {
  return a < b ? a : b;
}
