/**
 * @deedshare/ledger — Share and income quantity checks.
 *
 * Quantities are bigint throughout. Negative values would break the
 * conservation law, so every entry point checks them first.
 */

import { LedgerError } from "./types.js";

/**
 * Assert a quantity is a non-negative integer.
 * Throws INVALID_AMOUNT otherwise.
 */
export function assertQuantity(value: bigint, label: string): void {
  if (value < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be non-negative, got ${value.toString()}`,
    );
  }
}

/** Sum a list of quantities. */
export function sumQuantities(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const value of values) {
    total += value;
  }
  return total;
}
