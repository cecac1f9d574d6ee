/**
 * Event query routes.
 *
 * GET /api/v1/events            — List committed vault events (cursor pagination)
 * GET /api/v1/events/integrity  — Verify the hash chain
 * GET /api/v1/events/:position  — One event by log position
 */

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema, toEventView } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { parseInput } from "../middleware/validate.js";

const PositionSchema = z.coerce.number().int().min(1);

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { vault } = c.get("service");
    const query = parseInput(ListEventsQuerySchema, c.req.query(), "query parameters");

    const events = vault.events.read({
      ...(query.type !== undefined ? { type: query.type } : {}),
      ...(query.poolId !== undefined ? { poolId: query.poolId } : {}),
      ...(query.correlationId !== undefined ? { correlationId: query.correlationId } : {}),
      ...(query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : {}),
    });

    const result = paginate(
      events.map(toEventView),
      { cursor: query.cursor, limit: query.limit },
      (e) => e.position,
      "position",
    );
    return c.json(result);
  });

  routes.get("/integrity", (c) => {
    const { vault } = c.get("service");
    return c.json({ data: { ...vault.events.verifyIntegrity(), headHash: vault.events.headHash() } });
  });

  routes.get("/:position", (c) => {
    const { vault } = c.get("service");
    const position = parseInput(PositionSchema, c.req.param("position"), "position");
    const stored = vault.events.get(position);

    if (stored === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `No event at position ${position}`), 404);
    }
    return c.json({ data: toEventView(stored) });
  });

  return routes;
}
