/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (service started, event log chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const service = c.get("service");
    const integrity = service.checkEventLog();
    const ready = service.isReady() && integrity.valid;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        blockNumber: service.vault.blockNumber,
        eventLog: {
          status: integrity.valid ? "ok" : "down",
          lastVerifiedPosition: integrity.lastVerifiedPosition,
          errors: integrity.errors.length,
        },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
