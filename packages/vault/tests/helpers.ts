/**
 * Shared setup for vault tests: a vault wired to the reference
 * collaborators, with a fixed clock and sequential ids.
 */

import type { Address, PoolId, StrategyType, TokenAddress } from "@poolvault/types";
import { ConstantProductStrategy } from "../src/reference/constant-product.js";
import { RoleAuthorizer } from "../src/reference/role-authorizer.js";
import { StaticStrategyDirectory } from "../src/reference/strategy-directory.js";
import { InMemoryTokenBank } from "../src/reference/token-bank.js";
import { Vault } from "../src/vault.js";
import type { VaultOptions } from "../src/vault.js";

export function addr(suffix: string): Address {
  return `0x${suffix.padStart(40, "0")}`;
}

export const VAULT = addr("ba17");
export const ADMIN = addr("ad31");
export const CONTROLLER = addr("c0de1");
export const ALICE = addr("a11ce");
export const BOB = addr("b0b");
export const CAROL = addr("ca201");
export const MANAGER = addr("3a4a9e5");
export const BORROWER = addr("b0440e");

export const TOKEN_A = addr("a");
export const TOKEN_B = addr("b");
export const TOKEN_C = addr("c");

export const FIXED_TIME = "2025-01-01T00:00:00.000Z";

export interface Harness {
  readonly vault: Vault;
  readonly bank: InMemoryTokenBank;
  readonly strategies: StaticStrategyDirectory;
  readonly authorizer: RoleAuthorizer;
}

export function createHarness(options: Pick<VaultOptions, "onSubscriberError"> = {}): Harness {
  const bank = new InMemoryTokenBank(VAULT);
  const strategies = new StaticStrategyDirectory();
  strategies.register(CONTROLLER, new ConstantProductStrategy());
  const authorizer = new RoleAuthorizer(ADMIN);
  let next = 0;
  const vault = new Vault({
    address: VAULT,
    transfers: bank,
    strategies,
    authorizer,
    clock: () => new Date(FIXED_TIME),
    idGenerator: () => {
      next += 1;
      return `id-${next}`;
    },
    onSubscriberError: options.onSubscriberError,
  });
  return { vault, bank, strategies, authorizer };
}

/**
 * Mint tokens to an account and let the vault pull them.
 */
export function fund(h: Harness, account: Address, token: TokenAddress, amount: bigint): void {
  h.bank.mint(token, account, amount);
  h.bank.approve(token, account, h.bank.allowance(token, account) + amount);
}

/**
 * Register a pool under `controller` and seed it with liquidity pulled
 * from the controller.
 */
export function seedPool(
  h: Harness,
  strategy: StrategyType,
  tokens: readonly TokenAddress[],
  amounts: readonly bigint[],
  controller: Address = CONTROLLER,
): PoolId {
  const pool = h.vault.newPool(controller, controller, strategy);
  tokens.forEach((token, i) => {
    fund(h, controller, token, amounts[i] ?? 0n);
  });
  h.vault.addLiquidity(controller, {
    poolId: pool.id,
    from: controller,
    tokens,
    amounts,
    useUserBalance: false,
  });
  return pool.id;
}

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
