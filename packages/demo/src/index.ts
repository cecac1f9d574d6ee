#!/usr/bin/env node
/**
 * @poolvault/demo — Terminal walkthrough of one vault.
 *
 * register pools -> add liquidity -> deposit -> multi-hop swap ->
 * flash loan -> failed swap rolls back -> custody check -> event log
 *
 * Uses the domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import { ONE } from "@poolvault/ledger";
import type { FlashLoanReceiver } from "@poolvault/vault";
import {
  ConstantProductStrategy,
  InMemoryTokenBank,
  RoleAuthorizer,
  StaticStrategyDirectory,
  Vault,
  VaultError,
} from "@poolvault/vault";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function addr(suffix: string): string {
  return `0x${suffix.padStart(40, "0")}`;
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                    POOLVAULT DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Many pools, one vault, net settlement           ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function short(address: string): string {
  return `0x…${address.slice(-5)}`;
}

const TOTAL_STEPS = 8;

// =============================================================================
// Actors
// =============================================================================

const VAULT = addr("ba17");
const ADMIN = addr("ad31");
const CONTROLLER = addr("c0de1");
const ALICE = addr("a11ce");
const BORROWER = addr("b0220");
const USDC = addr("05dc");
const WETH = addr("e7e");
const DAI = addr("da1");

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  One vault holds the tokens of every pool and user."));
  console.log(chalk.gray("  Swaps settle net, per token, once per batch.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const bank = new InMemoryTokenBank(VAULT);
  const strategies = new StaticStrategyDirectory();
  strategies.register(CONTROLLER, new ConstantProductStrategy({ minBalance: 1n }));
  const vault = new Vault({
    address: VAULT,
    transfers: bank,
    strategies,
    authorizer: new RoleAuthorizer(ADMIN),
  });
  vault.setSwapFee(ADMIN, ONE / 1000n);
  vault.setFlashLoanFee(ADMIN, ONE / 2000n);
  ok(`Vault ${short(VAULT)} online`);
  info("swap fee", "0.1%");
  info("flash-loan fee", "0.05%");

  for (const token of [USDC, WETH, DAI]) {
    bank.mint(token, CONTROLLER, 1_000_000n);
    bank.approve(token, CONTROLLER, 1_000_000n);
  }
  bank.mint(USDC, ALICE, 10_000n);
  bank.approve(USDC, ALICE, 10_000n);

  await sleep(DELAY_MS);

  // ─── Step 2: Register pools ─────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Register Pools");

  const usdcWeth = vault.newPool(CONTROLLER, CONTROLLER, "pair");
  const wethDai = vault.newPool(CONTROLLER, CONTROLLER, "pair");
  hashLine("USDC/WETH", usdcWeth.id);
  hashLine("WETH/DAI", wethDai.id);
  ok("Both pools share one controller and one constant-product strategy");

  await sleep(DELAY_MS);

  // ─── Step 3: Liquidity ──────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Add Liquidity");

  vault.addLiquidity(CONTROLLER, {
    poolId: usdcWeth.id,
    from: CONTROLLER,
    tokens: [USDC, WETH],
    amounts: [400_000n, 200_000n],
    useUserBalance: false,
  });
  vault.addLiquidity(CONTROLLER, {
    poolId: wethDai.id,
    from: CONTROLLER,
    tokens: [WETH, DAI],
    amounts: [200_000n, 400_000n],
    useUserBalance: false,
  });
  info("USDC/WETH", vault.getPoolTokens(usdcWeth.id).balances.join(" / "));
  info("WETH/DAI", vault.getPoolTokens(wethDai.id).balances.join(" / "));
  ok("Liquidity pulled into vault custody");

  await sleep(DELAY_MS);

  // ─── Step 4: Deposit ────────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Deposit to Internal Balance");

  const deposited = vault.deposit(ALICE, { user: ALICE, token: USDC, amount: 5_000n });
  info("alice USDC", `${deposited} internal, ${bank.balanceOf(USDC, ALICE)} external`);
  ok("Internal balances skip token transfers on later swaps");

  await sleep(DELAY_MS);

  // ─── Step 5: Multi-hop swap ─────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Batch Swap USDC -> WETH -> DAI");

  const request = {
    kind: "givenIn" as const,
    steps: [
      { poolId: usdcWeth.id, assetInIndex: 0, assetOutIndex: 1, amount: 2_000n },
      { poolId: wethDai.id, assetInIndex: 1, assetOutIndex: 2, amount: 0n },
    ],
    assets: [USDC, WETH, DAI],
  };
  const quoted = vault.queryBatchSwap(request);
  info("quoted deltas", quoted.join(", "));

  const result = vault.batchSwap(ALICE, {
    ...request,
    funds: { sender: ALICE, fromUserBalance: true, recipient: ALICE, toUserBalance: false },
    limits: [2_000n, 0n, -1n],
  });
  info("settled deltas", result.deltas.join(", "));
  for (const swap of result.swaps) {
    info("hop", `${swap.amountIn} in, ${swap.amountOut} out, fee ${swap.fee}`);
  }
  ok(`WETH nets to ${result.deltas[1] ?? 0n}: no WETH moved in or out of the vault`);
  info("alice DAI", String(bank.balanceOf(DAI, ALICE)));

  await sleep(DELAY_MS);

  // ─── Step 6: Flash loan ─────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Flash Loan");

  bank.mint(WETH, BORROWER, 100n);
  const borrower: FlashLoanReceiver = {
    address: BORROWER,
    receiveFlashLoan: (tokens, amounts, feeAmounts) => {
      tokens.forEach((token, i) => {
        bank.transfer(token, BORROWER, VAULT, (amounts[i] ?? 0n) + (feeAmounts[i] ?? 0n));
      });
    },
  };
  const loan = vault.flashLoan(BORROWER, { receiver: borrower, tokens: [WETH], amounts: [50_000n] });
  info("borrowed", "50000 WETH");
  info("fee paid", String(loan.feeAmounts[0] ?? 0n));
  ok("Repaid within the same operation");

  await sleep(DELAY_MS);

  // ─── Step 7: Rollback ───────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Failed Swap Rolls Back");

  const before = vault.events.position();
  try {
    vault.batchSwap(ALICE, {
      ...request,
      funds: { sender: ALICE, fromUserBalance: true, recipient: ALICE, toUserBalance: false },
      limits: [2_000n, 0n, -1_000_000n],
    });
    warn("Swap unexpectedly settled");
  } catch (err: unknown) {
    if (!(err instanceof VaultError)) {
      throw err;
    }
    info("rejected", `${err.code} (${err.category})`);
  }
  info("events", `${vault.events.position()} (was ${before})`);
  ok("Nothing from the failed batch was recorded");

  await sleep(DELAY_MS);

  // ─── Step 8: Custody and event log ──────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Custody and Event Log");

  for (const [label, token] of [["USDC", USDC], ["WETH", WETH], ["DAI", DAI]] as const) {
    const held = bank.balanceOf(token, VAULT);
    const accounted = vault.accountedBalanceOf(token);
    const mark = held === accounted ? chalk.green("balanced") : chalk.red("MISMATCH");
    console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(`${held} held, ${accounted} accounted `) + mark);
  }

  const integrity = vault.events.verifyIntegrity();
  info("events", String(vault.events.position()));
  hashLine("head hash", vault.events.headHash());
  if (integrity.valid) {
    ok("Hash chain verified");
  } else {
    warn(`${integrity.errors.length} integrity errors`);
  }
  console.log();
  for (const stored of vault.events.read()) {
    const line = JSON.stringify({
      position: stored.position,
      type: stored.event.type,
      block: stored.event.metadata.blockNumber,
      hash: stored.hash.slice(0, 12) + "...",
    });
    console.log(chalk.gray("    ") + chalk.dim(line));
  }
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
