/**
 * Role Registry — the capability gate.
 *
 * Holds role assignments per account and the global pause flag.
 *
 * Rules:
 * - The owner is fixed at construction and always holds "owner"
 * - Only the owner grants or revokes roles
 * - Admins pause and unpause
 * - `require*` checks throw; `has*` / `isPaused` never throw
 */

import { isNonZeroAddress } from "@allotment/types";
import type { Address, CapabilityGate, Role } from "@allotment/types";
import { AuthorizationError, StateError, ValidationError } from "./errors.js";

export class RoleRegistry implements CapabilityGate {
  private readonly roles = new Map<Address, Set<Role>>();
  private paused = false;

  constructor(readonly owner: Address) {
    if (!isNonZeroAddress(owner)) {
      throw new ValidationError("INVALID_ADDRESS", `Invalid owner address: "${owner}"`);
    }
    this.roles.set(owner, new Set<Role>(["owner"]));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Role management
  // ───────────────────────────────────────────────────────────────────────

  grantRole(caller: Address, account: Address, role: Role): void {
    this.requireRole(caller, "owner");
    if (!isNonZeroAddress(account)) {
      throw new ValidationError("INVALID_ADDRESS", `Invalid account address: "${account}"`);
    }

    const held = this.roles.get(account) ?? new Set<Role>();
    held.add(role);
    this.roles.set(account, held);
  }

  revokeRole(caller: Address, account: Address, role: Role): void {
    this.requireRole(caller, "owner");
    if (role === "owner" && account === this.owner) {
      throw new ValidationError("INVALID_ADDRESS", "The owner role cannot be revoked from the owner");
    }
    this.roles.get(account)?.delete(role);
  }

  rolesOf(account: Address): readonly Role[] {
    return [...(this.roles.get(account) ?? [])];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pause
  // ───────────────────────────────────────────────────────────────────────

  pause(caller: Address): void {
    this.requireRole(caller, "admin");
    this.paused = true;
  }

  unpause(caller: Address): void {
    this.requireRole(caller, "admin");
    this.paused = false;
  }

  // ───────────────────────────────────────────────────────────────────────
  // CapabilityGate
  // ───────────────────────────────────────────────────────────────────────

  hasRole(account: Address, role: Role): boolean {
    return this.roles.get(account)?.has(role) ?? false;
  }

  requireRole(account: Address, role: Role): void {
    if (!this.hasRole(account, role)) {
      throw new AuthorizationError("MISSING_ROLE", `'${account}' lacks the '${role}' role`);
    }
  }

  requireAnyRole(account: Address, roles: readonly Role[]): void {
    if (!roles.some((role) => this.hasRole(account, role))) {
      throw new AuthorizationError(
        "MISSING_ROLE",
        `'${account}' lacks any of the roles: ${roles.join(", ")}`,
      );
    }
  }

  isPaused(): boolean {
    return this.paused;
  }

  requireNotPaused(): void {
    if (this.paused) {
      throw new StateError("PAUSED", "Operations are paused");
    }
  }
}
