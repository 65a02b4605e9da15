/**
 * Property-Based Tests for @deedshare/ledger
 *
 * Uses fast-check to drive random operation sequences and verify the
 * invariants that must hold after ANY of them:
 *
 * 1. Conservation: sharesAvailable + Σ balances = totalShares
 * 2. No balance is ever negative
 * 3. A rejected operation leaves balances untouched
 * 4. Distributed income never exceeds the deposit
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { EstateLedger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";
import { META, StaticGate } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

const HOLDERS = ["alice", "bob", "carol", "dave"] as const;

const arbHolder = fc.constantFrom(...HOLDERS);
const arbAmount = fc.bigInt({ min: 0n, max: 60n });

type Op =
  | { readonly kind: "issue"; readonly to: string; readonly amount: bigint }
  | { readonly kind: "transfer"; readonly from: string; readonly to: string; readonly amount: bigint }
  | { readonly kind: "list"; readonly seller: string; readonly amount: bigint }
  | { readonly kind: "buy"; readonly seller: string; readonly buyer: string; readonly amount: bigint }
  | { readonly kind: "deposit"; readonly amount: bigint };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("issue" as const), to: arbHolder, amount: arbAmount }),
  fc.record({
    kind: fc.constant("transfer" as const),
    from: arbHolder,
    to: arbHolder,
    amount: arbAmount,
  }),
  fc.record({ kind: fc.constant("list" as const), seller: arbHolder, amount: arbAmount }),
  fc.record({
    kind: fc.constant("buy" as const),
    seller: arbHolder,
    buyer: arbHolder,
    amount: arbAmount,
  }),
  fc.record({ kind: fc.constant("deposit" as const), amount: fc.bigInt({ min: 0n, max: 10_000n }) }),
);

// =============================================================================
// Helpers
// =============================================================================

function snapshotBalances(ledger: EstateLedger, propertyId: number): bigint[] {
  return HOLDERS.map((h) => ledger.ownership.balance(propertyId, h));
}

function apply(ledger: EstateLedger, propertyId: number, op: Op): void {
  switch (op.kind) {
    case "issue":
      ledger.ownership.issue(propertyId, op.to, op.amount);
      return;
    case "transfer":
      ledger.ownership.transfer(propertyId, op.from, op.to, op.amount);
      return;
    case "list":
      ledger.marketplace.list(propertyId, op.seller, op.amount, 1n);
      return;
    case "buy":
      ledger.marketplace.buy(propertyId, op.seller, op.buyer, op.amount);
      return;
    case "deposit": {
      const result = ledger.income.deposit(propertyId, op.amount);
      expect(result.distributed + result.undistributed).toBe(op.amount);
      expect(result.distributed <= op.amount).toBe(true);
      return;
    }
  }
}

// =============================================================================
// Properties
// =============================================================================

describe("ledger invariants", () => {
  it("conserves shares and never goes negative across random operations", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 1n, max: 200n }), fc.array(arbOp, { maxLength: 60 }), (total, ops) => {
        const ledger = new EstateLedger(new StaticGate());
        const { id } = ledger.registry.register("Random", total, META);

        for (const op of ops) {
          const before = snapshotBalances(ledger, id);
          try {
            apply(ledger, id, op);
          } catch (e) {
            if (!(e instanceof LedgerError)) throw e;
            expect(snapshotBalances(ledger, id)).toEqual(before);
          }

          const report = ledger.ownership.supplyReport(id);
          expect(report?.balanced).toBe(true);
          expect(report !== undefined && report.sharesAvailable >= 0n).toBe(true);
          for (const balance of snapshotBalances(ledger, id)) {
            expect(balance >= 0n).toBe(true);
          }
        }
      }),
    );
  });

  it("distributes each holder exactly floor(amount × shares / total)", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 100n }),
        fc.bigInt({ min: 0n, max: 100n }),
        fc.bigInt({ min: 0n, max: 1_000_000n }),
        (aliceShares, bobShares, amount) => {
          const total = aliceShares + bobShares;
          const ledger = new EstateLedger(new StaticGate());
          const { id } = ledger.registry.register("Split", total, META);
          ledger.ownership.issue(id, "alice", aliceShares);
          ledger.ownership.issue(id, "bob", bobShares);

          ledger.income.deposit(id, amount);

          expect(ledger.income.unclaimed(id, "alice")).toBe((amount * aliceShares) / total);
          expect(ledger.income.unclaimed(id, "bob")).toBe((amount * bobShares) / total);
        },
      ),
    );
  });
});
