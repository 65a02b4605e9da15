/**
 * @deedshare/ledger — Share-weighted governance.
 *
 * Lifecycle:
 *   open → executed   (yes > no; "approved" is only seen by executors)
 *   open → rejected   (yes <= no)
 *
 * Rules:
 * - One vote per identity per proposal, for the proposal's lifetime
 * - A vote weighs the voter's balance when it is cast, and is never
 *   re-weighed afterwards
 * - Only holders with a positive balance in the property may vote
 */

import type { Identity, Proposal, PropertyId } from "@deedshare/types";
import type { OwnershipLedger } from "./ownership.js";
import type { LedgerState } from "./state.js";
import type { ProposalExecutor } from "./types.js";
import { LedgerError } from "./types.js";

export const DEFAULT_PROPOSAL_KIND = "general";

export class GovernanceEngine {
  private readonly state: LedgerState;
  private readonly ownership: OwnershipLedger;
  private readonly executors: Map<string, ProposalExecutor> = new Map();

  constructor(state: LedgerState, ownership: OwnershipLedger) {
    this.state = state;
    this.ownership = ownership;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Open a proposal. Submitting needs no shares; voting does.
   */
  submit(
    propertyId: PropertyId,
    description: string,
    proposer: Identity,
    kind: string = DEFAULT_PROPOSAL_KIND,
  ): Proposal {
    const proposal: Proposal = {
      id: this.state.allocateProposalId(),
      propertyId,
      proposer,
      description,
      kind,
      status: "open",
      yesVotes: 0n,
      noVotes: 0n,
      votes: {},
    };

    this.state.proposals.set(proposal.id, proposal);
    return proposal;
  }

  /**
   * Cast a vote weighted by the voter's current balance.
   *
   * Every rejection (unknown, closed, already voted, no shares) is
   * reported as NOT_VOTABLE.
   */
  vote(proposalId: number, voter: Identity, choice: boolean): Proposal {
    const proposal = this.state.proposals.get(proposalId);
    if (proposal === undefined) {
      throw new LedgerError("NOT_VOTABLE", `Proposal ${String(proposalId)} not found`);
    }
    if (proposal.status !== "open") {
      throw new LedgerError(
        "NOT_VOTABLE",
        `Proposal ${String(proposalId)} is ${proposal.status}`,
      );
    }
    if (Object.hasOwn(proposal.votes, voter)) {
      throw new LedgerError(
        "NOT_VOTABLE",
        `${voter} has already voted on proposal ${String(proposalId)}`,
      );
    }

    const weight = this.ownership.balance(proposal.propertyId, voter);
    if (weight === 0n) {
      throw new LedgerError(
        "NOT_VOTABLE",
        `${voter} holds no shares of property ${String(proposal.propertyId)}`,
      );
    }

    const updated: Proposal = {
      ...proposal,
      votes: { ...proposal.votes, [voter]: choice },
      yesVotes: choice ? proposal.yesVotes + weight : proposal.yesVotes,
      noVotes: choice ? proposal.noVotes : proposal.noVotes + weight,
    };
    this.state.proposals.set(proposalId, updated);
    return updated;
  }

  /**
   * Close an open proposal by simple majority. Ties reject.
   *
   * An approved proposal runs the executor registered for its kind
   * before it is marked executed. If the executor throws, the proposal
   * stays open and the error propagates.
   */
  execute(proposalId: number): Proposal {
    const proposal = this.state.proposals.get(proposalId);
    if (proposal === undefined || proposal.status !== "open") {
      throw new LedgerError(
        "NOT_EXECUTABLE",
        `Proposal ${String(proposalId)} not found or not open`,
      );
    }

    if (proposal.yesVotes <= proposal.noVotes) {
      const rejected: Proposal = { ...proposal, status: "rejected" };
      this.state.proposals.set(proposalId, rejected);
      return rejected;
    }

    // Approved while the executor runs: nested votes and executions fail.
    const approved: Proposal = { ...proposal, status: "approved" };
    this.state.proposals.set(proposalId, approved);
    try {
      this.executors.get(proposal.kind)?.(approved);
    } catch (error) {
      this.state.proposals.set(proposalId, proposal);
      throw error;
    }

    const executed: Proposal = { ...approved, status: "executed" };
    this.state.proposals.set(proposalId, executed);
    return executed;
  }

  /**
   * Register the strategy run when a proposal of `kind` is approved.
   * Replaces any strategy already registered for that kind.
   */
  registerExecutor(kind: string, executor: ProposalExecutor): void {
    this.executors.set(kind, executor);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(proposalId: number): Proposal | undefined {
    return this.state.proposals.get(proposalId);
  }

  /** Proposals for a property, in submission order. */
  forProperty(propertyId: PropertyId): readonly Proposal[] {
    return [...this.state.proposals.values()].filter(
      (p) => p.propertyId === propertyId,
    );
  }
}
