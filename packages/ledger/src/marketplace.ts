/**
 * @deedshare/ledger — Share marketplace.
 *
 * Sell offers are matched first-come in insertion order, not by price.
 * Listing does not escrow shares: a seller may move listed shares
 * elsewhere, so every purchase re-checks the seller's live balance
 * before settling through the ownership ledger.
 */

import type { Identity, Listing, PropertyId } from "@deedshare/types";
import type { OwnershipLedger } from "./ownership.js";
import { assertQuantity } from "./quantity.js";
import type { LedgerState } from "./state.js";
import type { MarketplaceOptions, Settlement } from "./types.js";
import { LedgerError } from "./types.js";

export class Marketplace {
  private readonly state: LedgerState;
  private readonly ownership: OwnershipLedger;
  private readonly purgeStaleListings: boolean;

  constructor(
    state: LedgerState,
    ownership: OwnershipLedger,
    options: MarketplaceOptions = {},
  ) {
    this.state = state;
    this.ownership = ownership;
    this.purgeStaleListings = options.purgeStaleListings ?? false;
  }

  /**
   * Offer shares for sale. The seller must hold at least `amount`
   * right now; nothing is reserved.
   */
  list(
    propertyId: PropertyId,
    seller: Identity,
    amount: bigint,
    pricePerShare: bigint,
  ): Listing {
    assertQuantity(amount, "amount");
    assertQuantity(pricePerShare, "pricePerShare");

    const owned = this.ownership.balance(propertyId, seller);
    if (owned < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `${seller} holds ${owned.toString()} shares of property ${String(propertyId)}, cannot list ${amount.toString()}`,
      );
    }

    const listing: Listing = {
      id: this.state.allocateListingId(),
      propertyId,
      seller,
      amount,
      pricePerShare,
    };
    this.state.listings.push(listing);
    return listing;
  }

  /**
   * Buy `amount` shares from the first listing by `seller` for the
   * property that still offers at least that many.
   *
   * An exact match closes the listing; a partial match shrinks it.
   */
  buy(
    propertyId: PropertyId,
    seller: Identity,
    buyer: Identity,
    amount: bigint,
  ): Settlement {
    assertQuantity(amount, "amount");

    const listings = this.state.listings;
    const listing = listings.find(
      (l) => l.propertyId === propertyId && l.seller === seller && l.amount >= amount,
    );
    if (listing === undefined) {
      throw new LedgerError(
        "NOT_FOUND",
        `No listing by ${seller} for property ${String(propertyId)} offers ${amount.toString()} shares`,
      );
    }
    const position = listings.indexOf(listing);

    const available = this.ownership.balance(propertyId, seller);
    if (available < amount) {
      if (this.purgeStaleListings) {
        listings.splice(position, 1);
      }
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Listing ${String(listing.id)} is stale: ${seller} now holds ${available.toString()} shares, ${amount.toString()} requested`,
      );
    }

    this.ownership.transfer(propertyId, seller, buyer, amount);

    const remaining = listing.amount - amount;
    if (remaining === 0n) {
      listings.splice(position, 1);
    } else {
      listings[position] = { ...listing, amount: remaining };
    }

    return {
      listingId: listing.id,
      propertyId,
      seller,
      buyer,
      amount,
      pricePerShare: listing.pricePerShare,
      totalPrice: amount * listing.pricePerShare,
      remaining,
    };
  }

  /** All open listings, in insertion order. */
  listings(): readonly Listing[] {
    return [...this.state.listings];
  }
}
