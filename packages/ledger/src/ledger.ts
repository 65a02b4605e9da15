/**
 * EstateLedger — Top-level coordinator for fractional ownership.
 *
 * Composes, over one shared LedgerState:
 * - PropertyRegistry: property records and admin edits
 * - OwnershipLedger: issuance, transfers, balances
 * - Marketplace: sell offers settled against the ownership ledger
 * - IncomeDistributionEngine: proportional rental income
 * - GovernanceEngine: share-weighted proposals
 *
 * Every operation is synchronous and runs to completion, so no
 * operation can observe another half-done.
 */

import type { AuthorizationGate } from "@deedshare/types";
import { GovernanceEngine } from "./governance.js";
import { IncomeDistributionEngine } from "./income.js";
import { Marketplace } from "./marketplace.js";
import { OwnershipLedger } from "./ownership.js";
import { PropertyRegistry } from "./registry.js";
import { LedgerState } from "./state.js";
import type { EstateLedgerOptions } from "./types.js";

export class EstateLedger {
  readonly registry: PropertyRegistry;
  readonly ownership: OwnershipLedger;
  readonly marketplace: Marketplace;
  readonly income: IncomeDistributionEngine;
  readonly governance: GovernanceEngine;

  constructor(gate: AuthorizationGate, options: EstateLedgerOptions = {}) {
    const state = new LedgerState();
    this.registry = new PropertyRegistry(state, gate);
    this.ownership = new OwnershipLedger(state);
    this.marketplace = new Marketplace(state, this.ownership, options);
    this.income = new IncomeDistributionEngine(state, this.ownership);
    this.governance = new GovernanceEngine(state, this.ownership);
  }
}
