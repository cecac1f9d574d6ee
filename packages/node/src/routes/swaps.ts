/**
 * Swap routes.
 *
 * POST /api/v1/swaps/batch  — Execute a batch swap and settle net deltas
 * POST /api/v1/swaps/query  — Deltas a batch would produce, nothing applied
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BatchSwapSchema, QueryBatchSwapSchema, toBatchSwapView } from "../types/dto.js";
import { callerOf } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";

export function createSwapRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/batch", validateBody(BatchSwapSchema), (c) => {
    const service = c.get("service");
    const result = service.vault.batchSwap(callerOf(c), c.get("validatedBody"));
    return c.json({ data: toBatchSwapView(result) });
  });

  routes.post("/query", validateBody(QueryBatchSwapSchema), (c) => {
    const deltas = c.get("service").vault.queryBatchSwap(c.get("validatedBody"));
    return c.json({ data: { deltas: deltas.map(String) } });
  });

  return routes;
}
