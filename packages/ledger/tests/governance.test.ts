/**
 * Tests for share-weighted governance.
 *
 * Covers:
 * - Submission
 * - Vote eligibility and one-vote-per-identity
 * - Vote weight fixed at casting time
 * - Majority execution, ties, terminal states
 * - Execution strategies per proposal kind
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Proposal } from "@deedshare/types";
import { GovernanceEngine } from "../src/governance.js";
import { OwnershipLedger } from "../src/ownership.js";
import { PropertyRegistry } from "../src/registry.js";
import { LedgerState } from "../src/state.js";
import { LedgerError } from "../src/types.js";
import type { LedgerErrorCode } from "../src/types.js";
import { META, StaticGate } from "./fixtures.js";

function codeOf(fn: () => unknown): LedgerErrorCode | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof LedgerError) return e.code;
    throw e;
  }
  return undefined;
}

describe("GovernanceEngine", () => {
  let ownership: OwnershipLedger;
  let governance: GovernanceEngine;
  let propertyId: number;

  beforeEach(() => {
    const state = new LedgerState();
    const registry = new PropertyRegistry(state, new StaticGate());
    ownership = new OwnershipLedger(state);
    governance = new GovernanceEngine(state, ownership);
    propertyId = registry.register("Harbour Row", 100n, META).id;
    ownership.issue(propertyId, "alice", 60n);
    ownership.issue(propertyId, "bob", 40n);
  });

  // ─── Submission ────────────────────────────────────────────────────

  describe("submit", () => {
    it("opens a proposal with empty tallies", () => {
      const proposal = governance.submit(propertyId, "Replace the roof", "carol");

      expect(proposal).toEqual({
        id: 1,
        propertyId,
        proposer: "carol",
        description: "Replace the roof",
        kind: "general",
        status: "open",
        yesVotes: 0n,
        noVotes: 0n,
        votes: {},
      });
    });

    it("assigns increasing IDs and keeps the kind", () => {
      governance.submit(propertyId, "A", "alice");
      const second = governance.submit(propertyId, "B", "alice", "sale");
      expect(second.id).toBe(2);
      expect(second.kind).toBe("sale");
    });
  });

  // ─── Voting ────────────────────────────────────────────────────────

  describe("vote", () => {
    let proposalId: number;

    beforeEach(() => {
      proposalId = governance.submit(propertyId, "Repaint", "alice").id;
    });

    it("weights votes by the voter's balance", () => {
      governance.vote(proposalId, "alice", true);
      const after = governance.vote(proposalId, "bob", false);

      expect(after.yesVotes).toBe(60n);
      expect(after.noVotes).toBe(40n);
      expect(after.votes).toEqual({ alice: true, bob: false });
    });

    it("rejects a second vote from the same identity, whatever the choice", () => {
      governance.vote(proposalId, "alice", true);
      expect(codeOf(() => governance.vote(proposalId, "alice", true))).toBe("NOT_VOTABLE");
      expect(codeOf(() => governance.vote(proposalId, "alice", false))).toBe("NOT_VOTABLE");
      expect(governance.get(proposalId)?.yesVotes).toBe(60n);
      expect(governance.get(proposalId)?.noVotes).toBe(0n);
    });

    it("rejects voters without shares", () => {
      expect(codeOf(() => governance.vote(proposalId, "carol", true))).toBe("NOT_VOTABLE");
    });

    it("rejects unknown proposals", () => {
      expect(codeOf(() => governance.vote(99, "alice", true))).toBe("NOT_VOTABLE");
    });

    it("rejects votes on closed proposals", () => {
      governance.vote(proposalId, "alice", true);
      governance.execute(proposalId);
      expect(codeOf(() => governance.vote(proposalId, "bob", true))).toBe("NOT_VOTABLE");
    });

    it("keeps the weight cast even after the voter sells out", () => {
      governance.vote(proposalId, "alice", true);
      ownership.transfer(propertyId, "alice", "carol", 60n);

      expect(governance.get(proposalId)?.yesVotes).toBe(60n);

      // The buyer votes with the shares they now hold
      const after = governance.vote(proposalId, "carol", false);
      expect(after.yesVotes).toBe(60n);
      expect(after.noVotes).toBe(60n);
    });

    it("handles identities that collide with object keys", () => {
      ownership.transfer(propertyId, "bob", "constructor", 1n);
      const after = governance.vote(proposalId, "constructor", true);
      expect(after.yesVotes).toBe(1n);
      expect(codeOf(() => governance.vote(proposalId, "constructor", true))).toBe("NOT_VOTABLE");
    });
  });

  // ─── Execution ─────────────────────────────────────────────────────

  describe("execute", () => {
    let proposalId: number;

    beforeEach(() => {
      proposalId = governance.submit(propertyId, "Sell the building", "alice").id;
    });

    it("executes when yes outweighs no", () => {
      governance.vote(proposalId, "alice", true);
      governance.vote(proposalId, "bob", false);
      expect(governance.execute(proposalId).status).toBe("executed");
      expect(governance.get(proposalId)?.status).toBe("executed");
    });

    it("rejects when no outweighs yes", () => {
      governance.vote(proposalId, "alice", false);
      governance.vote(proposalId, "bob", true);
      expect(governance.execute(proposalId).status).toBe("rejected");
    });

    it("rejects a tie", () => {
      ownership.transfer(propertyId, "alice", "bob", 10n);
      governance.vote(proposalId, "alice", true);
      governance.vote(proposalId, "bob", false);
      expect(governance.execute(proposalId).status).toBe("rejected");
    });

    it("rejects a proposal nobody voted on", () => {
      expect(governance.execute(proposalId).status).toBe("rejected");
    });

    it("cannot execute twice", () => {
      governance.execute(proposalId);
      expect(codeOf(() => governance.execute(proposalId))).toBe("NOT_EXECUTABLE");
    });

    it("cannot execute an unknown proposal", () => {
      expect(codeOf(() => governance.execute(12))).toBe("NOT_EXECUTABLE");
    });
  });

  // ─── Execution strategies ──────────────────────────────────────────

  describe("executors", () => {
    it("runs the executor for the proposal's kind with the approved proposal", () => {
      const seen: Proposal[] = [];
      governance.registerExecutor("sale", (p) => seen.push(p));
      const { id } = governance.submit(propertyId, "Sell", "alice", "sale");
      governance.vote(id, "alice", true);

      governance.execute(id);

      expect(seen).toHaveLength(1);
      expect(seen[0]?.status).toBe("approved");
      expect(seen[0]?.id).toBe(id);
    });

    it("does not run executors for rejected proposals or other kinds", () => {
      let calls = 0;
      governance.registerExecutor("sale", () => {
        calls++;
      });
      const rejected = governance.submit(propertyId, "Sell", "alice", "sale");
      const other = governance.submit(propertyId, "Repaint", "alice");
      governance.vote(other.id, "alice", true);

      governance.execute(rejected.id);
      governance.execute(other.id);

      expect(calls).toBe(0);
    });

    it("leaves the proposal open when the executor throws", () => {
      governance.registerExecutor("sale", () => {
        throw new Error("escrow unavailable");
      });
      const { id } = governance.submit(propertyId, "Sell", "alice", "sale");
      governance.vote(id, "alice", true);

      expect(() => governance.execute(id)).toThrow("escrow unavailable");
      expect(governance.get(id)?.status).toBe("open");
    });

    it("rejects votes cast from inside the executor", () => {
      let nested: LedgerErrorCode | undefined;
      governance.registerExecutor("sale", (p) => {
        nested = codeOf(() => governance.vote(p.id, "bob", false));
      });
      const { id } = governance.submit(propertyId, "Sell", "alice", "sale");
      governance.vote(id, "alice", true);

      const executed = governance.execute(id);

      expect(nested).toBe("NOT_VOTABLE");
      expect(executed.votes).toEqual({ alice: true });
      expect(executed.noVotes).toBe(0n);
      expect(governance.get(id)?.status).toBe("executed");
    });

    it("rejects execution of the same proposal from inside the executor", () => {
      let runs = 0;
      let nested: LedgerErrorCode | undefined;
      governance.registerExecutor("sale", (p) => {
        runs++;
        nested = codeOf(() => governance.execute(p.id));
      });
      const { id } = governance.submit(propertyId, "Sell", "alice", "sale");
      governance.vote(id, "alice", true);

      governance.execute(id);

      expect(runs).toBe(1);
      expect(nested).toBe("NOT_EXECUTABLE");
      expect(governance.get(id)?.status).toBe("executed");
    });

    it("reopens the proposal for voting after the executor throws", () => {
      governance.registerExecutor("sale", () => {
        throw new Error("escrow unavailable");
      });
      const { id } = governance.submit(propertyId, "Sell", "alice", "sale");
      governance.vote(id, "alice", true);

      expect(() => governance.execute(id)).toThrow("escrow unavailable");

      const updated = governance.vote(id, "bob", false);
      expect(updated.status).toBe("open");
      expect(updated.yesVotes).toBe(60n);
      expect(updated.noVotes).toBe(40n);
    });

    it("replaces an executor registered for the same kind", () => {
      const calls: string[] = [];
      governance.registerExecutor("sale", () => calls.push("first"));
      governance.registerExecutor("sale", () => calls.push("second"));
      const { id } = governance.submit(propertyId, "Sell", "alice", "sale");
      governance.vote(id, "bob", true);

      governance.execute(id);

      expect(calls).toEqual(["second"]);
    });
  });

  describe("forProperty", () => {
    it("returns the property's proposals in submission order", () => {
      governance.submit(propertyId, "A", "alice");
      governance.submit(propertyId + 1, "Elsewhere", "alice");
      governance.submit(propertyId, "B", "bob");

      expect(governance.forProperty(propertyId).map((p) => p.description)).toEqual(["A", "B"]);
    });
  });
});
