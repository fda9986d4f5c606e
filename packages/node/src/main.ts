/**
 * @allotment/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { apiKeyMap, loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";

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

  const apiKeys = parseApiKeys(config.API_KEYS);
  if (apiKeys.length > 0) {
    logger.info({ apiKeyCount: apiKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; callers are taken from the X-Caller header");
  }

  const { app, service } = createApp({
    serviceConfig: {
      owner: config.OWNER_ADDRESS,
      vestingAddress: config.VESTING_ADDRESS,
      distributionAddress: config.DISTRIBUTION_ADDRESS,
      decimals: config.TOKEN_DECIMALS,
      admins: config.ADMIN_ADDRESSES,
      scripts: config.SCRIPT_ADDRESSES,
      approvedContracts: config.APPROVED_CONTRACTS,
    },
    logger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    apiKeys: apiKeyMap(apiKeys),
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
      decimals: service.decimals,
      symbol: service.allocation.tokens.symbol,
    },
    "Allotment node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
