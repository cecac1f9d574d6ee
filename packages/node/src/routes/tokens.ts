/**
 * Sandbox token routes over the in-memory token bank.
 *
 * POST /api/v1/tokens/:token/mint               — Create tokens for an account
 * POST /api/v1/tokens/:token/approve            — Caller lets the vault pull an amount
 * GET  /api/v1/tokens/:token/accounts/:account  — Balance and allowance
 * GET  /api/v1/tokens/:token/custody            — Vault holdings against its ledgers
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, ApproveSchema, MintSchema } from "../types/dto.js";
import { callerOf } from "../middleware/caller.js";
import { parseInput, validateBody } from "../middleware/validate.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:token/mint", validateBody(MintSchema), (c) => {
    const { bank } = c.get("service");
    const token = parseInput(AddressSchema, c.req.param("token"), "token");
    const { to, amount } = c.get("validatedBody");

    bank.mint(token, to, amount);
    return c.json({ data: { token, account: to, balance: bank.balanceOf(token, to).toString() } }, 201);
  });

  routes.post("/:token/approve", validateBody(ApproveSchema), (c) => {
    const { bank } = c.get("service");
    const token = parseInput(AddressSchema, c.req.param("token"), "token");
    const owner = callerOf(c);

    bank.approve(token, owner, c.get("validatedBody").amount);
    return c.json({ data: { token, account: owner, allowance: bank.allowance(token, owner).toString() } });
  });

  routes.get("/:token/accounts/:account", (c) => {
    const { bank } = c.get("service");
    const token = parseInput(AddressSchema, c.req.param("token"), "token");
    const account = parseInput(AddressSchema, c.req.param("account"), "account");

    return c.json({
      data: {
        token,
        account,
        balance: bank.balanceOf(token, account).toString(),
        allowance: bank.allowance(token, account).toString(),
      },
    });
  });

  routes.get("/:token/custody", (c) => {
    const { bank, vault } = c.get("service");
    const token = parseInput(AddressSchema, c.req.param("token"), "token");
    const held = bank.balanceOf(token, vault.address);
    const accounted = vault.accountedBalanceOf(token);

    return c.json({
      data: {
        token,
        held: held.toString(),
        accounted: accounted.toString(),
        balanced: held === accounted,
      },
    });
  });

  return routes;
}
