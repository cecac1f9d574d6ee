/**
 * @poolvault/ledger — Deterministic amount arithmetic.
 *
 * All arithmetic uses bigint. Amounts are unsigned integers in token base
 * units; percentages are 18-decimal fixed point.
 *
 * Rules:
 * - No floating-point operations
 * - Results never go below zero (subtraction is checked)
 * - Results never exceed their declared width (addition is checked)
 */

import type { LedgerErrorCode } from "./types.js";
import { LedgerError } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────

/** Width of each CashManagedBalance component and of their sum. */
export const UINT112_MAX = (1n << 112n) - 1n;

/** Width of user balances and collected fees. */
export const UINT256_MAX = (1n << 256n) - 1n;

/** 100% in 18-decimal fixed point. */
export const ONE = 10n ** 18n;

// ─── Parsing ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal integer string into an unsigned bigint.
 *
 * "1000000" → 1000000n
 * "0" → 0n
 * "-5", "1.5", "" → throws INVALID_AMOUNT
 */
export function parseAmount(amount: string): bigint {
  if (typeof amount !== "string") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const value = BigInt(trimmed);
  if (value > UINT256_MAX) {
    throw new LedgerError("INVALID_AMOUNT", `Amount exceeds 256 bits: "${trimmed}"`);
  }
  return value;
}

/**
 * Format an unsigned bigint as a decimal integer string.
 */
export function formatAmount(value: bigint): string {
  assertAmount(value);
  return value.toString();
}

/**
 * Throw INVALID_AMOUNT unless value is a non-negative bigint.
 */
export function assertAmount(value: bigint, label = "amount"): void {
  if (typeof value !== "bigint" || value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid ${label}: ${String(value)}`);
  }
}

// ─── Checked Arithmetic ──────────────────────────────────────────────────

/**
 * a + b, failing with BALANCE_OVERFLOW when the sum exceeds max.
 */
export function checkedAdd(a: bigint, b: bigint, max: bigint = UINT256_MAX): bigint {
  const sum = a + b;
  if (sum > max) {
    throw new LedgerError(
      "BALANCE_OVERFLOW",
      `Sum ${a.toString()} + ${b.toString()} exceeds ${max.toString()}`,
    );
  }
  return sum;
}

/**
 * a - b, failing with the given code when b exceeds a.
 */
export function checkedSub(a: bigint, b: bigint, code: LedgerErrorCode): bigint {
  if (b > a) {
    throw new LedgerError(code, `Cannot subtract ${b.toString()} from ${a.toString()}`);
  }
  return a - b;
}

export function minAmount(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

// ─── Fixed Point ─────────────────────────────────────────────────────────

/** a * b / ONE, rounded down. */
export function mulDown(a: bigint, b: bigint): bigint {
  return (a * b) / ONE;
}

/** a * b / ONE, rounded up. Protocol fees use this direction. */
export function mulUp(a: bigint, b: bigint): bigint {
  const product = a * b;
  if (product === 0n) {
    return 0n;
  }
  return (product - 1n) / ONE + 1n;
}

/** a * ONE / b, rounded down. */
export function divDown(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
  return (a * ONE) / b;
}

/** a * ONE / b, rounded up. */
export function divUp(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
  if (a === 0n) {
    return 0n;
  }
  return (a * ONE - 1n) / b + 1n;
}

/**
 * Parse an 18-decimal percentage string ("0.005" → 5000000000000000n).
 * Accepts at most 18 fractional digits.
 */
export function parsePercentage(value: string): bigint {
  const trimmed = value.trim();
  if (!/^\d+(\.\d{1,18})?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid percentage: "${trimmed}"`);
  }
  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  return BigInt(intPart) * ONE + BigInt(fracPart.padEnd(18, "0"));
}
