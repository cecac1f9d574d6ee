/**
 * Pool routes.
 *
 * POST   /api/v1/pools                                  — Register a pool
 * GET    /api/v1/pools                                  — List pools (cursor pagination)
 * GET    /api/v1/pools/:poolId                          — Pool record and balances
 * GET    /api/v1/pools/:poolId/tokens/:token            — Cash, managed, manager
 * POST   /api/v1/pools/:poolId/liquidity/add            — Add liquidity (controller)
 * POST   /api/v1/pools/:poolId/liquidity/remove         — Remove liquidity (controller)
 * PUT    /api/v1/pools/:poolId/tokens/:token/manager    — Authorize investment manager
 * DELETE /api/v1/pools/:poolId/tokens/:token/manager    — Revoke investment manager
 * POST   /api/v1/pools/:poolId/tokens/:token/invest     — Move cash to the manager
 * POST   /api/v1/pools/:poolId/tokens/:token/divest     — Return managed funds to cash
 * POST   /api/v1/pools/:poolId/tokens/:token/managed    — Report the managed balance
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddLiquiditySchema,
  AddressSchema,
  CreatePoolSchema,
  InvestmentAmountSchema,
  PaginationQuerySchema,
  PoolIdSchema,
  RemoveLiquiditySchema,
  SetManagerSchema,
  toPoolTokenInfoView,
  toPoolTokensView,
  toPoolView,
  UpdateInvestedSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { callerOf } from "../middleware/caller.js";
import { parseInput, validateBody } from "../middleware/validate.js";

interface PoolTokenParams {
  readonly poolId: string;
  readonly token: string;
}

function poolTokenParams(params: PoolTokenParams): { poolId: string; token: string } {
  return {
    poolId: parseInput(PoolIdSchema, params.poolId, "pool id"),
    token: parseInput(AddressSchema, params.token, "token"),
  };
}

export function createPoolRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/pools — Register
  routes.post("/", validateBody(CreatePoolSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const pool = service.createPool(callerOf(c), body.controller, body.strategy);
    return c.json({ data: toPoolView(pool) }, 201);
  });

  // GET /api/v1/pools — List
  routes.get("/", (c) => {
    const service = c.get("service");
    const query = parseInput(PaginationQuerySchema, c.req.query(), "query parameters");

    const result = paginate(
      service.vault.listPools().map(toPoolView),
      query,
      (pool) => pool.index,
      "index",
    );
    return c.json(result);
  });

  // GET /api/v1/pools/:poolId — Get one
  routes.get("/:poolId", (c) => {
    const service = c.get("service");
    const poolId = parseInput(PoolIdSchema, c.req.param("poolId"), "pool id");
    const pool = service.vault.getPool(poolId);

    if (pool === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Pool '${poolId}' not found`), 404);
    }

    return c.json({
      data: { ...toPoolView(pool), ...toPoolTokensView(service.vault.getPoolTokens(poolId)) },
    });
  });

  // GET /api/v1/pools/:poolId/tokens/:token
  routes.get("/:poolId/tokens/:token", (c) => {
    const service = c.get("service");
    const { poolId, token } = poolTokenParams(c.req.param());

    return c.json({ data: toPoolTokenInfoView(token, service.vault.getPoolTokenInfo(poolId, token)) });
  });

  // ─── Liquidity ─────────────────────────────────────────────────────

  routes.post("/:poolId/liquidity/add", validateBody(AddLiquiditySchema), (c) => {
    const service = c.get("service");
    const poolId = parseInput(PoolIdSchema, c.req.param("poolId"), "pool id");
    const body = c.get("validatedBody");

    service.vault.addLiquidity(callerOf(c), { poolId, ...body });
    return c.json({ data: toPoolTokensView(service.vault.getPoolTokens(poolId)) });
  });

  routes.post("/:poolId/liquidity/remove", validateBody(RemoveLiquiditySchema), (c) => {
    const service = c.get("service");
    const poolId = parseInput(PoolIdSchema, c.req.param("poolId"), "pool id");
    const body = c.get("validatedBody");

    service.vault.removeLiquidity(callerOf(c), { poolId, ...body });
    return c.json({ data: toPoolTokensView(service.vault.getPoolTokens(poolId)) });
  });

  // ─── Investment ────────────────────────────────────────────────────

  routes.put("/:poolId/tokens/:token/manager", validateBody(SetManagerSchema), (c) => {
    const service = c.get("service");
    const { poolId, token } = poolTokenParams(c.req.param());

    service.vault.authorizePoolInvestmentManager(callerOf(c), poolId, token, c.get("validatedBody").manager);
    return c.json({ data: toPoolTokenInfoView(token, service.vault.getPoolTokenState(poolId, token)) });
  });

  routes.delete("/:poolId/tokens/:token/manager", (c) => {
    const service = c.get("service");
    const { poolId, token } = poolTokenParams(c.req.param());

    service.vault.revokePoolInvestmentManager(callerOf(c), poolId, token);
    return c.json({ data: toPoolTokenInfoView(token, service.vault.getPoolTokenState(poolId, token)) });
  });

  routes.post("/:poolId/tokens/:token/invest", validateBody(InvestmentAmountSchema), (c) => {
    const service = c.get("service");
    const { poolId, token } = poolTokenParams(c.req.param());

    service.vault.investPoolBalance(callerOf(c), poolId, token, c.get("validatedBody").amount);
    return c.json({ data: toPoolTokenInfoView(token, service.vault.getPoolTokenState(poolId, token)) });
  });

  routes.post("/:poolId/tokens/:token/divest", validateBody(InvestmentAmountSchema), (c) => {
    const service = c.get("service");
    const { poolId, token } = poolTokenParams(c.req.param());

    service.vault.divestPoolBalance(callerOf(c), poolId, token, c.get("validatedBody").amount);
    return c.json({ data: toPoolTokenInfoView(token, service.vault.getPoolTokenState(poolId, token)) });
  });

  routes.post("/:poolId/tokens/:token/managed", validateBody(UpdateInvestedSchema), (c) => {
    const service = c.get("service");
    const { poolId, token } = poolTokenParams(c.req.param());

    service.vault.updateInvested(callerOf(c), poolId, token, c.get("validatedBody").managed);
    return c.json({ data: toPoolTokenInfoView(token, service.vault.getPoolTokenState(poolId, token)) });
  });

  return routes;
}
