/**
 * User balance and agent routes.
 *
 * GET    /api/v1/users/:user/balances?tokens=a,b   — Internal balances
 * GET    /api/v1/users/:user/agents                — Explicit and universal agents
 * POST   /api/v1/users/:user/deposit               — Pull tokens into the balance
 * POST   /api/v1/users/:user/withdraw              — Push tokens out (withdraw fee applies)
 * POST   /api/v1/users/:user/transfer              — Move balance to another user
 * POST   /api/v1/agents                            — Add an agent for the caller
 * DELETE /api/v1/agents/:agent                     — Remove an agent of the caller
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  AgentSchema,
  DepositSchema,
  TokenListSchema,
  TransferUserBalanceSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { callerOf } from "../middleware/caller.js";
import { parseInput, validateBody } from "../middleware/validate.js";

export function createUserRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:user/balances", (c) => {
    const service = c.get("service");
    const user = parseInput(AddressSchema, c.req.param("user"), "user");
    const tokens = parseInput(TokenListSchema, c.req.query("tokens"), "tokens");

    const balances = service.vault.getUserBalances(user, tokens);
    return c.json({
      data: tokens.map((token, i) => ({ token, balance: (balances[i] ?? 0n).toString() })),
    });
  });

  routes.get("/:user/agents", (c) => {
    const service = c.get("service");
    const user = parseInput(AddressSchema, c.req.param("user"), "user");

    return c.json({
      data: {
        agents: service.vault.getAgents(user),
        universalAgents: service.vault.getUniversalAgents(),
      },
    });
  });

  routes.post("/:user/deposit", validateBody(DepositSchema), (c) => {
    const service = c.get("service");
    const user = parseInput(AddressSchema, c.req.param("user"), "user");
    const body = c.get("validatedBody");

    const balance = service.vault.deposit(callerOf(c), { user, token: body.token, amount: body.amount });
    return c.json({ data: { token: body.token, balance: balance.toString() } });
  });

  routes.post("/:user/withdraw", validateBody(WithdrawSchema), (c) => {
    const service = c.get("service");
    const user = parseInput(AddressSchema, c.req.param("user"), "user");
    const body = c.get("validatedBody");

    const fee = service.vault.withdraw(callerOf(c), {
      user,
      token: body.token,
      amount: body.amount,
      recipient: body.recipient ?? user,
    });
    return c.json({
      data: {
        token: body.token,
        fee: fee.toString(),
        balance: service.vault.getUserBalance(user, body.token).toString(),
      },
    });
  });

  routes.post("/:user/transfer", validateBody(TransferUserBalanceSchema), (c) => {
    const service = c.get("service");
    const from = parseInput(AddressSchema, c.req.param("user"), "user");
    const body = c.get("validatedBody");

    service.vault.transferUserBalance(callerOf(c), { from, to: body.to, token: body.token, amount: body.amount });
    return c.json({
      data: {
        token: body.token,
        balance: service.vault.getUserBalance(from, body.token).toString(),
      },
    });
  });

  return routes;
}

export function createAgentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(AgentSchema), (c) => {
    const service = c.get("service");
    const caller = callerOf(c);

    service.vault.addAgent(caller, c.get("validatedBody").agent);
    return c.json({ data: { agents: service.vault.getAgents(caller) } });
  });

  routes.delete("/:agent", (c) => {
    const service = c.get("service");
    const caller = callerOf(c);
    const agent = parseInput(AddressSchema, c.req.param("agent"), "agent");

    service.vault.removeAgent(caller, agent);
    return c.json({ data: { agents: service.vault.getAgents(caller) } });
  });

  return routes;
}
