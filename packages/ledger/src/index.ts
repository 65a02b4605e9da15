/**
 * @deedshare/ledger — Fractional ownership engine.
 *
 * A pure TypeScript state machine with zero runtime dependencies.
 * Enforces the share accounting invariants:
 * - Conservation: sharesAvailable + Σ balances = totalShares
 * - No balance ever goes negative
 * - Income is credited from the ownership snapshot at deposit time
 * - One share-weighted vote per identity per proposal
 *
 * Design rules:
 * - All returned records are readonly snapshots
 * - Fail-closed: invalid operations throw before mutating anything
 * - Zero runtime dependencies
 */

// Coordinator
export { EstateLedger } from "./ledger.js";

// Components
export { LedgerState } from "./state.js";
export { PropertyRegistry } from "./registry.js";
export { OwnershipLedger } from "./ownership.js";
export { Marketplace } from "./marketplace.js";
export { IncomeDistributionEngine } from "./income.js";
export { GovernanceEngine, DEFAULT_PROPOSAL_KIND } from "./governance.js";

// Types
export type {
  LedgerErrorCode,
  HolderBalance,
  SupplyReport,
  MarketplaceOptions,
  Settlement,
  IncomeAllocation,
  DepositResult,
  ProposalExecutor,
  EstateLedgerOptions,
} from "./types.js";

export { LedgerError } from "./types.js";
