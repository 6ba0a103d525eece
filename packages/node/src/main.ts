/**
 * @strata/node — Entry point.
 *
 * Loads config, builds the app on a wall-clock block clock, starts the
 * HTTP server and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { WallBlockClock } from "./services/block-clock.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  if (config.FAUCET_ENABLED) {
    logger.warn("Custody faucet enabled: any caller can mint balances");
  }

  const { app } = createApp({
    serviceConfig: {
      ownerId: config.OWNER_ID,
      lendingCustodianId: config.LENDING_CUSTODIAN_ID,
      ammCustodianId: config.AMM_CUSTODIAN_ID,
      settlementAsset: config.SETTLEMENT_ASSET,
      interestRatePerBlock: config.INTEREST_RATE_PER_BLOCK,
      clock: new WallBlockClock(config.BLOCK_TIME_MS),
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    faucetEnabled: config.FAUCET_ENABLED,
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
      asset: config.SETTLEMENT_ASSET,
      blockTimeMs: config.BLOCK_TIME_MS,
    },
    "Strata node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing the server");
        process.exit(1);
      }
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
