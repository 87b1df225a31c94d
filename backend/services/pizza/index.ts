// backend/services/pizza/index.ts
/**
 * Start-up: load env (bootstrap), connect DB, then start HTTP with the
 * shared startHttpService. Mongo is disconnected on SIGTERM/SIGINT.
 */
import "tsconfig-paths/register";
import "./src/bootstrap"; // loads env + sets SERVICE_NAME

import { createApp } from "./src/app";
import { config, SERVICE_NAME } from "./src/config";
import { connectDb, disconnectDb } from "./src/db";
import { MongoStoreProvider } from "./src/repo/mongoStore";
import { logger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";

// Top-level guards
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start() {
  try {
    await connectDb();
    const stores = new MongoStoreProvider({ transactions: config.mongoTransactions });
    startHttpService({
      app: createApp({ stores }),
      port: config.port,
      serviceName: SERVICE_NAME,
      logger,
      onShutdown: disconnectDb,
    });
  } catch (err) {
    logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
    process.exit(1);
  }
}

void start();
