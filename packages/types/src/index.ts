/**
 * @deedshare/types — Shared domain types for the deedshare stack.
 *
 * These types are used across all deedshare packages:
 * - Properties, listings and ownership statements
 * - Governance proposals
 * - The authorization contract consumed by the ledger
 * - Runtime guards for boundary validation
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Property types
export type {
  PropertyId,
  Identity,
  PropertyStatus,
  PropertyMetadata,
  Property,
  Listing,
  OwnershipRecord,
  RentalIncomeRecord,
} from "./property.js";

// Governance types
export type {
  ProposalStatus,
  Proposal,
} from "./governance.js";

// Access types
export type {
  Role,
  AuthorizationGate,
} from "./access.js";

// Runtime guards
export {
  isRole,
  isPropertyStatus,
  isPropertyMetadata,
  isProperty,
  isListing,
  isProposalStatus,
  isProposal,
} from "./guards.js";
