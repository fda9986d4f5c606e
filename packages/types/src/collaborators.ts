/**
 * Collaborator Contracts
 *
 * Interfaces for the services the core consumes but does not own:
 * the capability gate, the token ledger, the clock, and the
 * distribution contract the vesting engine releases through.
 */

import type {
  Address,
  PoolLabel,
  Role,
  Timestamp,
  TokenAmount,
} from "./allocation.js";

/**
 * Role-based capability checks, queried on every call.
 *
 * `require*` methods abort the caller by throwing; `has*` and
 * `isPaused` are plain predicates.
 */
export interface CapabilityGate {
  hasRole(account: Address, role: Role): boolean;
  requireRole(account: Address, role: Role): void;
  requireAnyRole(account: Address, roles: readonly Role[]): void;
  isPaused(): boolean;
  requireNotPaused(): void;
}

/**
 * Token balance ledger. `transfer` moves tokens out of the caller's
 * balance and reports success; only distributors may call it.
 */
export interface TokenLedger {
  transfer(caller: Address, to: Address, amount: TokenAmount): boolean;
  balanceOf(account: Address): TokenAmount;
  totalSupply(): TokenAmount;
}

/** Source of the current time. */
export interface Clock {
  now(): Timestamp;
}

/**
 * The single contract through which the vesting engine touches pool state.
 */
export interface Distributor {
  distribute(
    caller: Address,
    pool: PoolLabel,
    amount: TokenAmount,
    to: Address,
  ): void;
}
