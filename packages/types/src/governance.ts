/**
 * Governance Types
 *
 * Share-weighted proposals. A proposal is opened by anyone, voted on
 * by current holders of the property, and closed exactly once.
 */

import type { Identity, PropertyId } from "./property.js";

/**
 * Lifecycle states of a proposal.
 *
 * open → executed (approved is transient, never stored)
 * open → rejected
 */
export type ProposalStatus = "open" | "approved" | "rejected" | "executed";

export interface Proposal {
  readonly id: number;
  readonly propertyId: PropertyId;
  readonly proposer: Identity;
  readonly description: string;

  /** Selects the execution strategy run on approval */
  readonly kind: string;

  readonly status: ProposalStatus;

  /** Sum of voter balances at the time each yes vote was cast */
  readonly yesVotes: bigint;

  /** Sum of voter balances at the time each no vote was cast */
  readonly noVotes: bigint;

  /** Voter → choice (true = yes). One entry per identity. */
  readonly votes: Readonly<Record<Identity, boolean>>;
}
