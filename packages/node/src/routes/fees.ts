/**
 * Protocol fee routes.
 *
 * GET  /api/v1/fees                        — Fee percentages (18-decimal fixed point)
 * PUT  /api/v1/fees/:kind                  — Set swap, flash-loan or withdraw fee
 * GET  /api/v1/fees/collected?tokens=a,b   — Collected fees per token
 * POST /api/v1/fees/withdraw               — Pay collected fees out
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  FeeKindSchema,
  SetFeeSchema,
  TokenListSchema,
  toFeesView,
  toTokenAmounts,
  WithdrawFeesSchema,
} from "../types/dto.js";
import { callerOf } from "../middleware/caller.js";
import { parseInput, validateBody } from "../middleware/validate.js";

export function createFeeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: toFeesView(c.get("service").vault.getProtocolFees()) });
  });

  routes.get("/collected", (c) => {
    const tokens = parseInput(TokenListSchema, c.req.query("tokens"), "tokens");
    return c.json({ data: toTokenAmounts(tokens, c.get("service").vault.getCollectedFees(tokens)) });
  });

  routes.post("/withdraw", validateBody(WithdrawFeesSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    service.vault.withdrawCollectedFees(callerOf(c), body.tokens, body.amounts, body.recipient);
    return c.json({ data: toTokenAmounts(body.tokens, service.vault.getCollectedFees(body.tokens)) });
  });

  routes.put("/:kind", validateBody(SetFeeSchema), (c) => {
    const service = c.get("service");
    const kind = parseInput(FeeKindSchema, c.req.param("kind"), "fee kind");
    const caller = callerOf(c);
    const { fee } = c.get("validatedBody");

    switch (kind) {
      case "swap":
        service.vault.setSwapFee(caller, fee);
        break;
      case "flash-loan":
        service.vault.setFlashLoanFee(caller, fee);
        break;
      case "withdraw":
        service.vault.setWithdrawFee(caller, fee);
        break;
    }
    return c.json({ data: toFeesView(service.vault.getProtocolFees()) });
  });

  return routes;
}
