/**
 * Pool Types
 *
 * Identity of a liquidity pool: the controller that governs it, the
 * balance layout its strategy needs, and its creation index.
 *
 * The packed 256-bit PoolId is an external-boundary format only.
 * Internal code carries PoolRecord.
 */

import type { Address } from "./primitives.js";

/**
 * Balance layout a pool's strategy requires.
 *
 * - tuple: any number of tokens, enumerable membership set
 * - pair: exactly two tokens, slots fixed once assigned
 */
export type StrategyType = "tuple" | "pair";

/**
 * Opaque pool identifier: "0x" + 64 hex digits.
 *
 * Layout (low to high): controller (160 bits), strategy code (16 bits),
 * creation index (32 bits), reserved zero (48 bits).
 */
export type PoolId = string;

/**
 * Decoded fields of a PoolId that are recoverable without a lookup.
 */
export interface PoolIdentity {
  readonly controller: Address;
  readonly strategy: StrategyType;
}

/**
 * Every field packed into a PoolId.
 */
export interface PoolKey extends PoolIdentity {
  /** Strictly increasing creation index (32 bits) */
  readonly index: number;
}

/**
 * A registered pool.
 */
export interface PoolRecord extends PoolKey {
  readonly id: PoolId;
  /** Vault block number at registration */
  readonly registeredAtBlock: number;
}
