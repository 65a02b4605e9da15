/**
 * Shared fixtures for @deedshare/ledger tests.
 */

import type {
  AuthorizationGate,
  Identity,
  PropertyMetadata,
  Role,
} from "@deedshare/types";

export const META: PropertyMetadata = {
  location: "12 Harbour Row",
  description: "Four-unit walk-up",
};

/**
 * Fixed role table. Unlisted identities are plain users.
 */
export class StaticGate implements AuthorizationGate {
  private readonly roles: ReadonlyMap<Identity, Role>;

  constructor(roles: Readonly<Record<Identity, Role>> = {}) {
    this.roles = new Map(Object.entries(roles));
  }

  roleOf(identity: Identity): Role {
    return this.roles.get(identity) ?? "user";
  }

  kycOf(): boolean {
    return false;
  }
}
