/**
 * @deedshare/ledger — Property registry.
 *
 * Creates and stores property records. Properties are never deleted;
 * only their metadata and status change after registration, and only
 * admins may change them.
 */

import type {
  AuthorizationGate,
  Identity,
  Property,
  PropertyId,
  PropertyMetadata,
  PropertyStatus,
} from "@deedshare/types";
import { assertQuantity } from "./quantity.js";
import type { LedgerState } from "./state.js";
import { LedgerError } from "./types.js";

export class PropertyRegistry {
  private readonly state: LedgerState;
  private readonly gate: AuthorizationGate;

  constructor(state: LedgerState, gate: AuthorizationGate) {
    this.state = state;
    this.gate = gate;
  }

  /**
   * Register a property. All shares start unissued.
   * A property with zero shares is legal but cannot receive income.
   */
  register(
    name: string,
    totalShares: bigint,
    metadata: PropertyMetadata,
  ): Property {
    assertQuantity(totalShares, "totalShares");

    const property: Property = {
      id: this.state.allocatePropertyId(),
      name,
      totalShares,
      sharesAvailable: totalShares,
      metadata: { ...metadata },
      status: "active",
    };

    this.state.properties.set(property.id, property);
    return property;
  }

  updateMetadata(
    propertyId: PropertyId,
    metadata: PropertyMetadata,
    actor: Identity,
  ): Property {
    this.assertAdmin(actor, "update property metadata");
    const property = this.require(propertyId);

    const updated: Property = { ...property, metadata: { ...metadata } };
    this.state.properties.set(propertyId, updated);
    return updated;
  }

  updateStatus(
    propertyId: PropertyId,
    status: PropertyStatus,
    actor: Identity,
  ): Property {
    this.assertAdmin(actor, "update property status");
    const property = this.require(propertyId);

    const updated: Property = { ...property, status };
    this.state.properties.set(propertyId, updated);
    return updated;
  }

  get(propertyId: PropertyId): Property | undefined {
    return this.state.properties.get(propertyId);
  }

  /**
   * Get a property by ID. Throws NOT_FOUND if unknown.
   */
  require(propertyId: PropertyId): Property {
    const property = this.state.properties.get(propertyId);
    if (property === undefined) {
      throw new LedgerError("NOT_FOUND", `Property ${String(propertyId)} not found`);
    }
    return property;
  }

  /** All properties in registration order. */
  list(): readonly Property[] {
    return [...this.state.properties.values()];
  }

  private assertAdmin(actor: Identity, action: string): void {
    if (this.gate.roleOf(actor) !== "admin") {
      throw new LedgerError("UNAUTHORIZED", `Only admin can ${action}`);
    }
  }
}
