/**
 * In-memory token balance ledger.
 *
 * Fixed supply minted once to a treasury account. Transfers move tokens
 * out of the caller's own balance and report success as a boolean;
 * only accounts holding the distributor capability may transfer.
 */

import { isNonZeroAddress } from "@allotment/types";
import type {
  Address,
  CapabilityGate,
  TokenAmount,
  TokenLedger,
} from "@allotment/types";
import { LedgerError } from "./types.js";
import type { TokenLedgerConfig } from "./types.js";

export class InMemoryTokenLedger implements TokenLedger {
  private readonly balances = new Map<Address, TokenAmount>();
  private readonly supply: TokenAmount;

  readonly decimals: number;
  readonly symbol: string;

  constructor(
    config: TokenLedgerConfig,
    private readonly gate: CapabilityGate,
  ) {
    if (config.totalSupply <= 0n) {
      throw new LedgerError("INVALID_SUPPLY", "Total supply must be positive");
    }
    if (!isNonZeroAddress(config.treasury)) {
      throw new LedgerError(
        "INVALID_ADDRESS",
        `Invalid treasury address: "${config.treasury}"`,
      );
    }

    this.supply = config.totalSupply;
    this.decimals = config.decimals;
    this.symbol = config.symbol;
    this.balances.set(config.treasury, config.totalSupply);
  }

  /**
   * Move `amount` from `caller` to `to`.
   *
   * @returns false when the caller's balance is insufficient
   * @throws LedgerError when the caller is not a distributor or input is malformed
   */
  transfer(caller: Address, to: Address, amount: TokenAmount): boolean {
    if (!this.gate.hasRole(caller, "distributor")) {
      throw new LedgerError(
        "NOT_DISTRIBUTOR",
        `'${caller}' lacks the distributor capability`,
      );
    }
    if (!isNonZeroAddress(to)) {
      throw new LedgerError("INVALID_ADDRESS", `Invalid recipient: "${to}"`);
    }
    if (amount <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", "Transfer amount must be positive");
    }

    const fromBalance = this.balanceOf(caller);
    if (fromBalance < amount) {
      return false;
    }

    this.balances.set(caller, fromBalance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  balanceOf(account: Address): TokenAmount {
    return this.balances.get(account) ?? 0n;
  }

  totalSupply(): TokenAmount {
    return this.supply;
  }
}
