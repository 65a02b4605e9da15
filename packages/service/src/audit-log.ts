/**
 * Audit trail of committed estate operations.
 *
 * One entry per mutation the service commits, newest last. Every
 * action belongs to exactly one resource type; the log derives the
 * resource type from the action so the two cannot disagree.
 * In-memory only.
 */

import type { Identity } from "@deedshare/types";

// =============================================================================
// Actions
// =============================================================================

/** Each recorded action and the kind of resource it touches. */
export const AUDIT_ACTIONS = {
  "admin.bootstrapped": "identity",
  "role.assigned": "identity",
  "kyc.updated": "identity",
  "property.registered": "property",
  "property.metadata_updated": "property",
  "property.status_updated": "property",
  "shares.issued": "property",
  "shares.transferred": "property",
  "income.deposited": "property",
  "income.claimed": "property",
  "listing.created": "listing",
  "listing.settled": "listing",
  "proposal.submitted": "proposal",
  "proposal.voted": "proposal",
  "proposal.closed": "proposal",
} as const satisfies Record<string, AuditResourceType>;

export type AuditResourceType = "identity" | "property" | "listing" | "proposal";

export type AuditAction = keyof typeof AUDIT_ACTIONS;

// =============================================================================
// Entries
// =============================================================================

export interface AuditLogEntry {
  /** Position in the log, from 1 */
  readonly sequence: number;
  readonly timestamp: string;
  readonly action: AuditAction;
  readonly resourceType: AuditResourceType;
  /** Identity, property id, listing id or proposal id */
  readonly resourceId: string;
  /** Caller identity, or "system" for operations without one */
  readonly actor: Identity;
  readonly detail?: string | undefined;
}

/** What the service supplies; the log fills in the rest. */
export interface AuditRecord {
  readonly action: AuditAction;
  readonly resourceId: string;
  readonly actor: Identity;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly action?: AuditAction | undefined;
  readonly resourceType?: AuditResourceType | undefined;
  readonly resourceId?: string | undefined;
  readonly actor?: Identity | undefined;
  /** Most recent N matches; ignored unless positive */
  readonly limit?: number | undefined;
}

function matches(entry: AuditLogEntry, query: AuditLogQuery): boolean {
  return (
    (query.action === undefined || entry.action === query.action) &&
    (query.resourceType === undefined || entry.resourceType === query.resourceType) &&
    (query.resourceId === undefined || entry.resourceId === query.resourceId) &&
    (query.actor === undefined || entry.actor === query.actor)
  );
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];

  append(record: AuditRecord): AuditLogEntry {
    const entry: AuditLogEntry = {
      ...record,
      sequence: this._entries.length + 1,
      timestamp: new Date().toISOString(),
      resourceType: AUDIT_ACTIONS[record.action],
    };
    this._entries.push(entry);
    return entry;
  }

  /** Matching entries, newest first. */
  query(query: AuditLogQuery = {}): readonly AuditLogEntry[] {
    const found: AuditLogEntry[] = [];
    const limit = query.limit !== undefined && query.limit > 0 ? query.limit : Infinity;

    for (let i = this._entries.length - 1; i >= 0 && found.length < limit; i--) {
      const entry = this._entries[i];
      if (entry !== undefined && matches(entry, query)) {
        found.push(entry);
      }
    }
    return found;
  }

  get size(): number {
    return this._entries.length;
  }
}
