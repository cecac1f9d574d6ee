/**
 * @poolvault/ledger — Pool identity encoding.
 *
 * A PoolId packs the controller address, the strategy type code, and the
 * creation index into one 256-bit word:
 *
 *   bits   0..159  controller address
 *   bits 160..175  strategy code
 *   bits 176..207  creation index
 *   bits 208..255  reserved, always zero
 *
 * The word is rendered as "0x" + 64 lowercase hex digits. Only this module
 * touches the packed form; everything else works with PoolKey / PoolRecord.
 */

import type { PoolId, PoolIdentity, PoolKey, StrategyType } from "@poolvault/types";
import { isPoolId } from "@poolvault/types";
import { toAddress } from "./address.js";
import { LedgerError } from "./types.js";

const ADDRESS_MASK = (1n << 160n) - 1n;
const STRATEGY_SHIFT = 160n;
const STRATEGY_MASK = (1n << 16n) - 1n;
const INDEX_SHIFT = 176n;
const INDEX_MASK = (1n << 32n) - 1n;
const RESERVED_SHIFT = 208n;

/** Largest creation index that fits the 32-bit field. */
export const MAX_POOL_INDEX = 0xffff_ffff;

/** Strategy discriminants stored in the 16-bit field. */
export const STRATEGY_CODES: Readonly<Record<StrategyType, number>> = {
  tuple: 0,
  pair: 1,
} as const;

const STRATEGY_BY_CODE = new Map<number, StrategyType>([
  [STRATEGY_CODES.tuple, "tuple"],
  [STRATEGY_CODES.pair, "pair"],
]);

/**
 * Pack a pool key into its external identifier.
 */
export function encodePoolId(key: PoolKey): PoolId {
  const controller = toAddress(key.controller, "controller");

  if (!Number.isInteger(key.index) || key.index < 0 || key.index > MAX_POOL_INDEX) {
    throw new LedgerError(
      "INVALID_POOL_INDEX",
      `Pool index must be an integer in [0, ${String(MAX_POOL_INDEX)}], got ${String(key.index)}`,
    );
  }

  const code = STRATEGY_CODES[key.strategy];
  if (code === undefined) {
    throw new LedgerError("INVALID_POOL_ID", `Unknown strategy type: "${String(key.strategy)}"`);
  }

  const word =
    BigInt(controller) |
    (BigInt(code) << STRATEGY_SHIFT) |
    (BigInt(key.index) << INDEX_SHIFT);

  return `0x${word.toString(16).padStart(64, "0")}`;
}

/**
 * Unpack every field of a PoolId.
 * Throws INVALID_POOL_ID for malformed words, reserved bits, or unknown codes.
 */
export function unpackPoolId(id: PoolId): PoolKey {
  if (!isPoolId(id)) {
    throw new LedgerError("INVALID_POOL_ID", `Malformed pool id: "${String(id)}"`);
  }

  const word = BigInt(id);
  if (word >> RESERVED_SHIFT !== 0n) {
    throw new LedgerError("INVALID_POOL_ID", `Pool id has reserved bits set: "${id}"`);
  }

  const code = Number((word >> STRATEGY_SHIFT) & STRATEGY_MASK);
  const strategy = STRATEGY_BY_CODE.get(code);
  if (strategy === undefined) {
    throw new LedgerError("INVALID_POOL_ID", `Unknown strategy code ${String(code)} in "${id}"`);
  }

  return {
    controller: `0x${(word & ADDRESS_MASK).toString(16).padStart(40, "0")}`,
    strategy,
    index: Number((word >> INDEX_SHIFT) & INDEX_MASK),
  };
}

/**
 * Recover controller and strategy from a PoolId without any lookup.
 */
export function decodePoolId(id: PoolId): PoolIdentity {
  const { controller, strategy } = unpackPoolId(id);
  return { controller, strategy };
}

/**
 * Recover the creation index of a PoolId.
 */
export function poolIndexOf(id: PoolId): number {
  return unpackPoolId(id).index;
}

/**
 * Lowercased, validated form of a PoolId for use as a map key.
 */
export function normalizePoolId(id: PoolId): PoolId {
  unpackPoolId(id);
  return id.toLowerCase();
}
