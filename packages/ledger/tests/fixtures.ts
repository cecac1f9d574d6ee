/**
 * Shared addresses for ledger tests.
 */

import type { PoolId } from "@poolvault/types";
import { encodePoolId } from "../src/pool-id.js";

export const ALICE = "0x00000000000000000000000000000000000a11ce";
export const BOB = "0x0000000000000000000000000000000000000b0b";
export const CAROL = "0x00000000000000000000000000000000000ca201";
export const CONTROLLER = "0x00000000000000000000000000000000000c0de1";

export const TOKEN_A = "0x000000000000000000000000000000000000000a";
export const TOKEN_B = "0x000000000000000000000000000000000000000b";
export const TOKEN_C = "0x000000000000000000000000000000000000000c";

export const TUPLE_POOL: PoolId = encodePoolId({ controller: CONTROLLER, strategy: "tuple", index: 0 });
export const PAIR_POOL: PoolId = encodePoolId({ controller: CONTROLLER, strategy: "pair", index: 1 });

/**
 * Run fn and return what it threw.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected the call to throw");
}
