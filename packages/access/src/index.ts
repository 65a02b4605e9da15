/**
 * @deedshare/access — Authorization gate.
 *
 * Role and KYC assignments with explicit defaults, and the one-time
 * admin bootstrap. The ledger consumes this through the
 * AuthorizationGate contract from @deedshare/types.
 */

export { RoleBook, AccessError, DEFAULT_ROLE } from "./role-book.js";
export type { AccessErrorCode } from "./role-book.js";
