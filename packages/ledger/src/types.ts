/**
 * @allotment/ledger — Internal types for the token ledger.
 *
 * Rules:
 * - Balances never go negative
 * - Supply is fixed at construction
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { Address, TokenAmount } from "@allotment/types";

export interface TokenLedgerConfig {
  /** Account that receives the whole supply at construction */
  readonly treasury: Address;
  readonly totalSupply: TokenAmount;
  readonly decimals: number;
  readonly symbol: string;
}

/** One successful transfer, in the order it was applied. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_SUPPLY"
  | "NOT_DISTRIBUTOR";

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
