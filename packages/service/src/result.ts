/**
 * Operation result envelopes.
 *
 * Every mutating service operation returns either
 *   { ok: true, value }
 * or
 *   { ok: false, error: { code, message, details? } }
 */

import type { AccessErrorCode } from "@deedshare/access";
import type { LedgerErrorCode } from "@deedshare/ledger";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Known failure codes: the domain codes of the ledger and access
 * packages, plus input validation.
 */
export type ServiceErrorCode =
  | LedgerErrorCode
  | AccessErrorCode
  | "VALIDATION_ERROR";

// =============================================================================
// Envelopes
// =============================================================================

export interface ErrorDetail {
  readonly code: ServiceErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface OperationSuccess<T> {
  readonly ok: true;
  readonly value: T;
}

export interface OperationFailure {
  readonly ok: false;
  readonly error: ErrorDetail;
}

export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

// =============================================================================
// Factory
// =============================================================================

export function succeed<T>(value: T): OperationSuccess<T> {
  return { ok: true, value };
}

export function fail(
  code: ServiceErrorCode,
  message: string,
  details?: Record<string, unknown>,
): OperationFailure {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { ok: false, error: { ...error, details } };
  }
  return { ok: false, error };
}
