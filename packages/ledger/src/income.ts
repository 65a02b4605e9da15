/**
 * @deedshare/ledger — Rental income distribution.
 *
 * Each deposit is split across the holders of the property at the
 * moment of deposit:
 *
 *   entitlement += floor(amount × balance / totalShares)
 *
 * The floor remainder is not distributed and not carried forward.
 * Later ownership changes never touch entitlements already credited.
 */

import type {
  Identity,
  PropertyId,
  RentalIncomeRecord,
} from "@deedshare/types";
import type { OwnershipLedger } from "./ownership.js";
import { assertQuantity } from "./quantity.js";
import { readNested, writeNested } from "./state.js";
import type { LedgerState } from "./state.js";
import type { DepositResult, IncomeAllocation } from "./types.js";
import { LedgerError } from "./types.js";

export class IncomeDistributionEngine {
  private readonly state: LedgerState;
  private readonly ownership: OwnershipLedger;

  constructor(state: LedgerState, ownership: OwnershipLedger) {
    this.state = state;
    this.ownership = ownership;
  }

  /**
   * Deposit income for a property and credit every current holder.
   * A property with zero total shares is treated as not found.
   */
  deposit(propertyId: PropertyId, amount: bigint): DepositResult {
    assertQuantity(amount, "amount");

    const property = this.state.properties.get(propertyId);
    if (property === undefined || property.totalShares === 0n) {
      throw new LedgerError(
        "NOT_FOUND",
        `Property ${String(propertyId)} not found or has no shares`,
      );
    }

    this.state.depositedIncome.set(
      propertyId,
      this.totalDeposited(propertyId) + amount,
    );

    const allocations: IncomeAllocation[] = [];
    let distributed = 0n;

    for (const { holder, shares } of this.ownership.holders(propertyId)) {
      const share = (amount * shares) / property.totalShares;
      if (share > 0n) {
        writeNested(
          this.state.unclaimedIncome,
          propertyId,
          holder,
          this.unclaimed(propertyId, holder) + share,
        );
      }
      allocations.push({ holder, shares, amount: share });
      distributed += share;
    }

    return {
      propertyId,
      amount,
      allocations,
      distributed,
      undistributed: amount - distributed,
    };
  }

  /**
   * Pay out and zero the holder's entitlement. Returns 0 when there is
   * nothing to claim, so repeated claims are harmless.
   */
  claim(propertyId: PropertyId, holder: Identity): bigint {
    const amount = this.unclaimed(propertyId, holder);
    writeNested(this.state.unclaimedIncome, propertyId, holder, 0n);
    return amount;
  }

  unclaimed(propertyId: PropertyId, holder: Identity): bigint {
    return readNested(this.state.unclaimedIncome, propertyId, holder);
  }

  totalDeposited(propertyId: PropertyId): bigint {
    return this.state.depositedIncome.get(propertyId) ?? 0n;
  }

  /**
   * Every property where `holder` has income waiting, ordered by
   * property ID.
   */
  statement(holder: Identity): readonly RentalIncomeRecord[] {
    const records: RentalIncomeRecord[] = [];
    for (const property of this.state.properties.values()) {
      const income = this.unclaimed(property.id, holder);
      if (income > 0n) {
        records.push({
          propertyId: property.id,
          propertyName: property.name,
          income,
        });
      }
    }
    return records;
  }
}
