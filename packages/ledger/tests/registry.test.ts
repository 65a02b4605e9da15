/**
 * Tests for the property registry.
 *
 * Covers:
 * - Registration and ID assignment
 * - Admin-only metadata and status edits
 * - Lookup of unknown properties
 */

import { describe, it, expect, beforeEach } from "vitest";
import { PropertyRegistry } from "../src/registry.js";
import { LedgerState } from "../src/state.js";
import { LedgerError } from "../src/types.js";
import { META, StaticGate } from "./fixtures.js";

describe("PropertyRegistry", () => {
  let registry: PropertyRegistry;

  beforeEach(() => {
    registry = new PropertyRegistry(
      new LedgerState(),
      new StaticGate({ root: "admin", mgr: "manager" }),
    );
  });

  // ─── Registration ──────────────────────────────────────────────────

  describe("register", () => {
    it("creates an active property with every share available", () => {
      const property = registry.register("Harbour Row", 100n, META);

      expect(property).toEqual({
        id: 1,
        name: "Harbour Row",
        totalShares: 100n,
        sharesAvailable: 100n,
        metadata: META,
        status: "active",
      });
    });

    it("assigns increasing IDs", () => {
      const a = registry.register("A", 10n, META);
      const b = registry.register("B", 10n, META);
      expect(a.id).toBe(1);
      expect(b.id).toBe(2);
    });

    it("accepts zero total shares", () => {
      const property = registry.register("Empty", 0n, META);
      expect(property.totalShares).toBe(0n);
      expect(property.sharesAvailable).toBe(0n);
    });

    it("rejects negative total shares", () => {
      expect(() => registry.register("Bad", -1n, META)).toThrow(LedgerError);
      expect(registry.list()).toEqual([]);
    });

    it("lists properties in registration order", () => {
      registry.register("A", 10n, META);
      registry.register("B", 20n, META);
      expect(registry.list().map((p) => p.name)).toEqual(["A", "B"]);
    });
  });

  // ─── Admin edits ───────────────────────────────────────────────────

  describe("updateMetadata", () => {
    it("replaces metadata when the actor is admin", () => {
      const { id } = registry.register("A", 10n, META);
      const next = { location: "14 Harbour Row", description: "Renovated" };

      const updated = registry.updateMetadata(id, next, "root");

      expect(updated.metadata).toEqual(next);
      expect(registry.get(id)?.metadata).toEqual(next);
    });

    it("rejects managers and users", () => {
      const { id } = registry.register("A", 10n, META);
      for (const actor of ["mgr", "someone"]) {
        try {
          registry.updateMetadata(id, META, actor);
          expect.unreachable();
        } catch (e) {
          expect((e as LedgerError).code).toBe("UNAUTHORIZED");
        }
      }
    });

    it("reports NOT_FOUND for an unknown property", () => {
      try {
        registry.updateMetadata(99, META, "root");
        expect.unreachable();
      } catch (e) {
        expect((e as LedgerError).code).toBe("NOT_FOUND");
      }
    });

    it("checks the role before the property", () => {
      try {
        registry.updateMetadata(99, META, "someone");
        expect.unreachable();
      } catch (e) {
        expect((e as LedgerError).code).toBe("UNAUTHORIZED");
      }
    });
  });

  describe("updateStatus", () => {
    it("changes status when the actor is admin", () => {
      const { id } = registry.register("A", 10n, META);
      expect(registry.updateStatus(id, "maintenance", "root").status).toBe("maintenance");
      expect(registry.updateStatus(id, "sold", "root").status).toBe("sold");
      expect(registry.get(id)?.status).toBe("sold");
    });

    it("leaves the property unchanged when unauthorized", () => {
      const { id } = registry.register("A", 10n, META);
      expect(() => registry.updateStatus(id, "sold", "mgr")).toThrow(/Only admin/);
      expect(registry.get(id)?.status).toBe("active");
    });
  });

  describe("require", () => {
    it("throws NOT_FOUND for an unknown ID", () => {
      expect(() => registry.require(7)).toThrow("Property 7 not found");
    });

    it("returns undefined from get for an unknown ID", () => {
      expect(registry.get(7)).toBeUndefined();
    });
  });
});
