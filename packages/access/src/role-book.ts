/**
 * RoleBook — Role and KYC assignments.
 *
 * Implements the AuthorizationGate the ledger consults. Lookups are
 * total functions over sparse maps: an identity never assigned anything
 * is a plain user without KYC.
 *
 * Rules:
 * - The first admin is granted once, through bootstrapAdmin()
 * - After that, only admins assign roles and KYC flags
 */

import type { AuthorizationGate, Identity, Role } from "@deedshare/types";

// =============================================================================
// Error
// =============================================================================

export class AccessError extends Error {
  public readonly code: AccessErrorCode;
  constructor(code: AccessErrorCode, message: string) {
    super(message);
    this.name = "AccessError";
    this.code = code;
  }
}

export type AccessErrorCode =
  | "UNAUTHORIZED"
  | "ALREADY_BOOTSTRAPPED";

export const DEFAULT_ROLE: Role = "user";

// =============================================================================
// Role Book
// =============================================================================

export class RoleBook implements AuthorizationGate {
  private readonly roles: Map<Identity, Role> = new Map();
  private readonly kyc: Map<Identity, boolean> = new Map();
  private bootstrapped = false;

  roleOf(identity: Identity): Role {
    return this.roles.get(identity) ?? DEFAULT_ROLE;
  }

  kycOf(identity: Identity): boolean {
    return this.kyc.get(identity) ?? false;
  }

  get isBootstrapped(): boolean {
    return this.bootstrapped;
  }

  /**
   * Grant the first admin. Works exactly once per role book.
   */
  bootstrapAdmin(identity: Identity): void {
    if (this.bootstrapped) {
      throw new AccessError("ALREADY_BOOTSTRAPPED", "Admin already bootstrapped");
    }
    this.roles.set(identity, "admin");
    this.bootstrapped = true;
  }

  setRole(actor: Identity, user: Identity, role: Role): void {
    this.assertAdmin(actor, "set roles");
    this.roles.set(user, role);
  }

  setKyc(actor: Identity, user: Identity, verified: boolean): void {
    this.assertAdmin(actor, "set KYC status");
    this.kyc.set(user, verified);
  }

  private assertAdmin(actor: Identity, action: string): void {
    if (this.roleOf(actor) !== "admin") {
      throw new AccessError("UNAUTHORIZED", `Only admin can ${action}`);
    }
  }
}
