/**
 * Runtime Type Guards
 *
 * Narrowing functions for deedshare domain types.
 * These enable safe runtime validation at system boundaries
 * (transport inputs, deserialized data, external integrations).
 */

import type { Role } from "./access.js";
import type { Proposal, ProposalStatus } from "./governance.js";
import type {
  Listing,
  Property,
  PropertyMetadata,
  PropertyStatus,
} from "./property.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isQuantity(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

function isPositiveId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isIdentity(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

// =============================================================================
// Access guards
// =============================================================================

const ROLES = new Set<string>(["admin", "manager", "user"]);

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLES.has(value);
}

// =============================================================================
// Property guards
// =============================================================================

const PROPERTY_STATUSES = new Set<string>(["active", "maintenance", "sold"]);

export function isPropertyStatus(value: unknown): value is PropertyStatus {
  return typeof value === "string" && PROPERTY_STATUSES.has(value);
}

export function isPropertyMetadata(value: unknown): value is PropertyMetadata {
  if (!isRecord(value)) return false;
  return typeof value.location === "string" && typeof value.description === "string";
}

export function isProperty(value: unknown): value is Property {
  if (!isRecord(value)) return false;
  return (
    isPositiveId(value.id) &&
    typeof value.name === "string" &&
    isQuantity(value.totalShares) &&
    isQuantity(value.sharesAvailable) &&
    value.sharesAvailable <= value.totalShares &&
    isPropertyMetadata(value.metadata) &&
    isPropertyStatus(value.status)
  );
}

export function isListing(value: unknown): value is Listing {
  if (!isRecord(value)) return false;
  return (
    isPositiveId(value.id) &&
    isPositiveId(value.propertyId) &&
    isIdentity(value.seller) &&
    isQuantity(value.amount) &&
    isQuantity(value.pricePerShare)
  );
}

// =============================================================================
// Governance guards
// =============================================================================

const PROPOSAL_STATUSES = new Set<string>(["open", "approved", "rejected", "executed"]);

export function isProposalStatus(value: unknown): value is ProposalStatus {
  return typeof value === "string" && PROPOSAL_STATUSES.has(value);
}

export function isProposal(value: unknown): value is Proposal {
  if (!isRecord(value)) return false;
  return (
    isPositiveId(value.id) &&
    isPositiveId(value.propertyId) &&
    isIdentity(value.proposer) &&
    typeof value.description === "string" &&
    typeof value.kind === "string" &&
    isProposalStatus(value.status) &&
    isQuantity(value.yesVotes) &&
    isQuantity(value.noVotes) &&
    isRecord(value.votes) &&
    Object.values(value.votes).every((choice) => typeof choice === "boolean")
  );
}
