/**
 * @deedshare/ledger — Shared ledger state.
 *
 * One handle owns every map the components operate on. It is created
 * by the coordinator and injected into each component; callers only
 * ever see the records the components hand back.
 */

import type {
  Identity,
  Listing,
  Proposal,
  Property,
  PropertyId,
} from "@deedshare/types";

export class LedgerState {
  readonly properties: Map<PropertyId, Property> = new Map();

  /** propertyId → holder → shares. Zero balances are never stored. */
  readonly balances: Map<PropertyId, Map<Identity, bigint>> = new Map();

  /** Open listings in insertion order */
  readonly listings: Listing[] = [];

  /** Cumulative income deposited per property */
  readonly depositedIncome: Map<PropertyId, bigint> = new Map();

  /** propertyId → holder → unclaimed entitlement */
  readonly unclaimedIncome: Map<PropertyId, Map<Identity, bigint>> = new Map();

  readonly proposals: Map<number, Proposal> = new Map();

  private _nextPropertyId = 1;
  private _nextListingId = 1;
  private _nextProposalId = 1;

  allocatePropertyId(): PropertyId {
    return this._nextPropertyId++;
  }

  allocateListingId(): number {
    return this._nextListingId++;
  }

  allocateProposalId(): number {
    return this._nextProposalId++;
  }
}

/**
 * Read a value from a two-level map, defaulting to 0.
 */
export function readNested(
  map: ReadonlyMap<PropertyId, ReadonlyMap<Identity, bigint>>,
  propertyId: PropertyId,
  holder: Identity,
): bigint {
  return map.get(propertyId)?.get(holder) ?? 0n;
}

/**
 * Write a value into a two-level map. Zero removes the entry, and the
 * inner map goes with its last entry.
 */
export function writeNested(
  map: Map<PropertyId, Map<Identity, bigint>>,
  propertyId: PropertyId,
  holder: Identity,
  value: bigint,
): void {
  let inner = map.get(propertyId);
  if (value === 0n) {
    if (inner === undefined) {
      return;
    }
    inner.delete(holder);
    if (inner.size === 0) {
      map.delete(propertyId);
    }
    return;
  }
  if (inner === undefined) {
    inner = new Map();
    map.set(propertyId, inner);
  }
  inner.set(holder, value);
}
