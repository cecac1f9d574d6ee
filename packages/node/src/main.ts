/**
 * @poolvault/node — Entry point.
 *
 * Loads config, builds the sandbox vault and the Hono app, starts the
 * HTTP server, and handles graceful shutdown.
 */

import { fileURLToPath } from "node:url";
import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Re-exports (package public API)
// =============================================================================

export { VaultService } from "./services/vault-service.js";
export type { VaultServiceConfig } from "./services/vault-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, service } = createApp({
    serviceConfig: {
      vaultAddress: config.VAULT_ADDRESS,
      adminAddress: config.ADMIN_ADDRESS,
      swapFee: config.SWAP_FEE,
      flashLoanFee: config.FLASH_LOAN_FEE,
      withdrawFee: config.WITHDRAW_FEE,
      minPoolBalance: config.MIN_POOL_BALANCE,
      onSubscriberError: (err, stored) => {
        logger.error(
          { err, position: stored.position, type: stored.event.type },
          "Vault event subscriber failed",
        );
      },
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const subscription = service.vault.events.subscribe((stored) => {
    logger.debug(
      {
        position: stored.position,
        type: stored.event.type,
        correlationId: stored.event.metadata.correlationId,
        block: stored.event.metadata.blockNumber,
      },
      "Vault event committed",
    );
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      vault: service.vault.address,
      admin: service.admin,
    },
    "Pool vault node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    subscription.unsubscribe();
    service.stop();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

// Only run when executed directly (not when imported)
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal startup error:", err);
    process.exit(1);
  });
}
