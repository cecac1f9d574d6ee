/**
 * @poolvault/ledger — Address normalization.
 *
 * Every address entering a ledger is validated and lowercased so that
 * map keys compare by value.
 */

import type { Address } from "@poolvault/types";
import { isAddress, ZERO_ADDRESS } from "@poolvault/types";
import { LedgerError } from "./types.js";

/**
 * Validate and lowercase an address.
 * Throws LedgerError INVALID_ADDRESS for anything that is not 0x + 40 hex.
 */
export function toAddress(value: string, label = "address"): Address {
  if (!isAddress(value)) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid ${label}: "${String(value)}"`);
  }
  return value.toLowerCase();
}

export function isZeroAddress(address: Address): boolean {
  return address.toLowerCase() === ZERO_ADDRESS;
}

/**
 * Numeric ordering of two addresses. Used to keep pair slots sorted.
 */
export function compareAddresses(a: Address, b: Address): -1 | 0 | 1 {
  const va = BigInt(a);
  const vb = BigInt(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}
