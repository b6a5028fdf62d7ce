/**
 * @starkexit/node: Entry point.
 *
 * Loads config, replays the event log, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { Logger } from "pino";
import {
  createDisbursementSystem,
  createViemTransferClient,
  EvmTransferer,
  InMemoryTransferer,
} from "@starkexit/disburser";
import type { ValueTransferer } from "@starkexit/disburser";
import { JsonlEventStore } from "@starkexit/event-store";
import {
  loadConfig,
  parseAllowedCallers,
  parseApiKeys,
  parseCustody,
} from "./config.js";
import type { AppConfig } from "./config.js";
import { createApp } from "./app.js";
import { DisbursementService } from "./services/disbursement-service.js";

// =============================================================================
// Bootstrap
// =============================================================================

function createTransferer(config: AppConfig, logger: Logger): ValueTransferer {
  if (config.TRANSFER_MODE === "evm") {
    const { CHAIN_ID, RPC_URL, DISBURSER_PRIVATE_KEY } = config;
    // loadConfig already rejects evm mode without these
    if (CHAIN_ID === undefined || RPC_URL === undefined || DISBURSER_PRIVATE_KEY === undefined) {
      throw new Error("TRANSFER_MODE=evm requires CHAIN_ID, RPC_URL and DISBURSER_PRIVATE_KEY");
    }
    logger.info({ chainId: CHAIN_ID }, "EVM transfers enabled");
    return new EvmTransferer(
      createViemTransferClient({ chainId: CHAIN_ID, rpcUrl: RPC_URL, privateKey: DISBURSER_PRIVATE_KEY }),
    );
  }

  const transferer = new InMemoryTransferer();
  for (const { token, amount } of parseCustody(config.MEMORY_CUSTODY)) {
    transferer.fund(token, amount);
  }
  logger.warn("In-memory transfers: no value leaves this process");
  return transferer;
}

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
    logger.warn("No API keys configured; admin routes will refuse every request");
  }

  const events = new JsonlEventStore({ filePath: config.EVENT_LOG_PATH });
  const system = createDisbursementSystem({
    owner: config.OWNER_IDENTITY,
    rootProvider: config.ROOT_PROVIDER_IDENTITY,
    transferer: createTransferer(config, logger),
    events,
    allowRootOverride: config.ALLOW_ROOT_OVERRIDE,
    allowedCallers: parseAllowedCallers(config.DISBURSE_ALLOWED_CALLERS),
  });
  logger.info(
    { eventLog: config.EVENT_LOG_PATH, ...system.state() },
    "State restored from event log",
  );
  if (config.ALLOW_ROOT_OVERRIDE) {
    logger.warn("Root override is enabled; do not run this in production");
  }

  const { app } = createApp({
    service: new DisbursementService({ system, logger }),
    apiKeys,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onInternalError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Disbursement node started");

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
