/**
 * @deedshare/ledger — Internal types for the ownership engine.
 *
 * These extend the shared @deedshare/types with structures used only
 * within this package.
 *
 * Rules:
 * - All types are readonly
 * - Every failure check runs before the first mutation
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Identity, Proposal, PropertyId } from "@deedshare/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_SUPPLY"
  | "NOT_VOTABLE"
  | "NOT_EXECUTABLE"
  | "INVALID_AMOUNT";

/**
 * Structured error from the ownership engine.
 * Thrown before any state is touched.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Ownership ───────────────────────────────────────────────────────────

/** A holder's positive balance in one property. */
export interface HolderBalance {
  readonly holder: Identity;
  readonly shares: bigint;
}

/**
 * Recomputation of the conservation law for one property:
 * sharesAvailable + Σ balances = totalShares.
 */
export interface SupplyReport {
  readonly propertyId: PropertyId;
  readonly totalShares: bigint;
  readonly sharesAvailable: bigint;
  /** Sum of all holder balances */
  readonly issued: bigint;
  readonly balanced: boolean;
}

// ─── Marketplace ─────────────────────────────────────────────────────────

export interface MarketplaceOptions {
  /**
   * Remove a listing whose seller can no longer cover it when a purchase
   * against it fails. Off by default: the listing stays open.
   */
  readonly purgeStaleListings?: boolean | undefined;
}

/** Outcome of a purchase against a listing. */
export interface Settlement {
  readonly listingId: number;
  readonly propertyId: PropertyId;
  readonly seller: Identity;
  readonly buyer: Identity;
  readonly amount: bigint;
  readonly pricePerShare: bigint;
  /** amount × pricePerShare. Informational, no funds move. */
  readonly totalPrice: bigint;
  /** Shares left on the listing, 0 when it was removed */
  readonly remaining: bigint;
}

// ─── Income ──────────────────────────────────────────────────────────────

/** Entitlement credited to one holder by a deposit. */
export interface IncomeAllocation {
  readonly holder: Identity;
  readonly shares: bigint;
  readonly amount: bigint;
}

/**
 * Result of distributing a rental income deposit.
 * `undistributed` is the floor-division remainder, which is not tracked.
 */
export interface DepositResult {
  readonly propertyId: PropertyId;
  readonly amount: bigint;
  readonly allocations: readonly IncomeAllocation[];
  readonly distributed: bigint;
  readonly undistributed: bigint;
}

// ─── Governance ──────────────────────────────────────────────────────────

/**
 * Execution strategy for approved proposals of one kind.
 * Runs before the proposal is marked executed; throwing keeps it open.
 */
export type ProposalExecutor = (proposal: Proposal) => void;

// ─── Coordinator ─────────────────────────────────────────────────────────

/** Options for the EstateLedger coordinator. */
export type EstateLedgerOptions = MarketplaceOptions;
