/**
 * Access Types
 *
 * The authorization contract consumed by the ledger. The ledger reads
 * roles and KYC flags through this interface and never stores them.
 */

import type { Identity } from "./property.js";

export type Role = "admin" | "manager" | "user";

/**
 * Resolves a caller identity to its role and KYC flag.
 *
 * Both lookups are total: an identity with no assignment has the
 * default role ("user") and is not KYC verified.
 */
export interface AuthorizationGate {
  roleOf(identity: Identity): Role;
  kycOf(identity: Identity): boolean;
}
