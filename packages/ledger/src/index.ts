/**
 * @allotment/ledger — Token arithmetic and the token balance ledger.
 */

export { InMemoryTokenLedger } from "./token-ledger.js";

export {
  parseAmount,
  formatAmount,
  toBaseUnits,
  mulDiv,
  applyBasisPoints,
  minAmount,
} from "./amount-math.js";

export { LedgerError } from "./types.js";
export type {
  LedgerErrorCode,
  TokenLedgerConfig,
} from "./types.js";
