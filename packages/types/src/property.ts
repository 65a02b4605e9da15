/**
 * Property Types
 *
 * Registered properties, their share supply, and the records that
 * describe who holds what.
 *
 * Rules:
 * - All quantities are bigint (share counts, income units, prices)
 * - Identities are opaque strings supplied by the caller's transport
 * - Records are readonly snapshots; state lives in the ledger
 */

/** Monotonically assigned property identifier, starting at 1. */
export type PropertyId = number;

/** Opaque caller identity (principal, account address, user id). */
export type Identity = string;

/** Operational status of a property. */
export type PropertyStatus = "active" | "maintenance" | "sold";

/**
 * Descriptive fields of a property. Mutable by admins, no invariant.
 */
export interface PropertyMetadata {
  readonly location: string;
  readonly description: string;
}

/**
 * A registered property and its share supply.
 *
 * Invariant: 0 <= sharesAvailable <= totalShares.
 */
export interface Property {
  readonly id: PropertyId;
  readonly name: string;

  /** Fixed at registration */
  readonly totalShares: bigint;

  /** Shares not yet issued to any holder */
  readonly sharesAvailable: bigint;

  readonly metadata: PropertyMetadata;
  readonly status: PropertyStatus;
}

/**
 * An open sell offer on the marketplace.
 * The amount is not escrowed; settlement re-checks the seller's balance.
 */
export interface Listing {
  readonly id: number;
  readonly propertyId: PropertyId;
  readonly seller: Identity;
  readonly amount: bigint;
  readonly pricePerShare: bigint;
}

/** One line of a holder's ownership statement. */
export interface OwnershipRecord {
  readonly propertyId: PropertyId;
  readonly propertyName: string;
  readonly shares: bigint;
}

/** One line of a holder's unclaimed rental income statement. */
export interface RentalIncomeRecord {
  readonly propertyId: PropertyId;
  readonly propertyName: string;
  readonly income: bigint;
}
