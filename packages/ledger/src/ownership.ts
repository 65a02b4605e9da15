/**
 * @deedshare/ledger — Ownership ledger.
 *
 * The single source of truth for who owns what. Shares enter
 * circulation only through issue(); afterwards they only move between
 * holders, so for every property
 *
 *   sharesAvailable + Σ balances = totalShares
 *
 * holds after every operation.
 */

import type {
  Identity,
  OwnershipRecord,
  Property,
  PropertyId,
} from "@deedshare/types";
import { assertQuantity, sumQuantities } from "./quantity.js";
import { readNested, writeNested } from "./state.js";
import type { LedgerState } from "./state.js";
import type { HolderBalance, SupplyReport } from "./types.js";
import { LedgerError } from "./types.js";

export class OwnershipLedger {
  private readonly state: LedgerState;

  constructor(state: LedgerState) {
    this.state = state;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Move `amount` unissued shares to `to`.
   * Returns the property with its reduced supply.
   */
  issue(propertyId: PropertyId, to: Identity, amount: bigint): Property {
    assertQuantity(amount, "amount");

    const property = this.state.properties.get(propertyId);
    if (property === undefined) {
      throw new LedgerError("NOT_FOUND", `Property ${String(propertyId)} not found`);
    }
    if (amount > property.sharesAvailable) {
      throw new LedgerError(
        "INSUFFICIENT_SUPPLY",
        `Cannot issue ${amount.toString()} shares of property ${String(propertyId)}: only ${property.sharesAvailable.toString()} available`,
      );
    }

    const updated: Property = {
      ...property,
      sharesAvailable: property.sharesAvailable - amount,
    };
    this.state.properties.set(propertyId, updated);
    this.credit(propertyId, to, amount);
    return updated;
  }

  /**
   * Move shares between holders. A self-transfer with sufficient
   * balance succeeds and changes nothing.
   */
  transfer(
    propertyId: PropertyId,
    from: Identity,
    to: Identity,
    amount: bigint,
  ): void {
    assertQuantity(amount, "amount");

    const fromBalance = this.balance(propertyId, from);
    if (fromBalance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${fromBalance.toString()} shares of property ${String(propertyId)}, cannot move ${amount.toString()}`,
      );
    }
    if (from === to) {
      return;
    }

    writeNested(this.state.balances, propertyId, from, fromBalance - amount);
    this.credit(propertyId, to, amount);
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balance(propertyId: PropertyId, holder: Identity): bigint {
    return readNested(this.state.balances, propertyId, holder);
  }

  /** Holders with a positive balance, in order of first credit. */
  holders(propertyId: PropertyId): readonly HolderBalance[] {
    const inner = this.state.balances.get(propertyId);
    if (inner === undefined) {
      return [];
    }
    return [...inner].map(([holder, shares]) => ({ holder, shares }));
  }

  /**
   * Recompute the conservation law for a property.
   * Returns undefined for an unknown property.
   */
  supplyReport(propertyId: PropertyId): SupplyReport | undefined {
    const property = this.state.properties.get(propertyId);
    if (property === undefined) {
      return undefined;
    }

    const issued = sumQuantities(
      this.state.balances.get(propertyId)?.values() ?? [],
    );

    return {
      propertyId,
      totalShares: property.totalShares,
      sharesAvailable: property.sharesAvailable,
      issued,
      balanced: property.sharesAvailable + issued === property.totalShares,
    };
  }

  /**
   * Every property in which `holder` has a positive balance,
   * ordered by property ID.
   */
  statement(holder: Identity): readonly OwnershipRecord[] {
    const records: OwnershipRecord[] = [];
    for (const property of this.state.properties.values()) {
      const shares = this.balance(property.id, holder);
      if (shares > 0n) {
        records.push({
          propertyId: property.id,
          propertyName: property.name,
          shares,
        });
      }
    }
    return records;
  }

  private credit(propertyId: PropertyId, holder: Identity, amount: bigint): void {
    writeNested(
      this.state.balances,
      propertyId,
      holder,
      this.balance(propertyId, holder) + amount,
    );
  }
}
