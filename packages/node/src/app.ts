/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests can build the app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { VaultService } from "./services/vault-service.js";
import type { VaultServiceConfig } from "./services/vault-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPoolRoutes } from "./routes/pools.js";
import { createAgentRoutes, createUserRoutes } from "./routes/users.js";
import { createUniversalAgentRoutes } from "./routes/universal-agents.js";
import { createSwapRoutes } from "./routes/swaps.js";
import { createFeeRoutes } from "./routes/fees.js";
import { createTokenRoutes } from "./routes/tokens.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: VaultServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VaultService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new VaultService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Errors ─────────────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/api/v1/pools", createPoolRoutes());
  app.route("/api/v1/users", createUserRoutes());
  app.route("/api/v1/agents", createAgentRoutes());
  app.route("/api/v1/universal-agents", createUniversalAgentRoutes());
  app.route("/api/v1/swaps", createSwapRoutes());
  app.route("/api/v1/fees", createFeeRoutes());
  app.route("/api/v1/tokens", createTokenRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
