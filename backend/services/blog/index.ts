// backend/services/blog/index.ts
/**
 * Start-up order: load env (bootstrap), read config, init logs from it,
 * open the DB, then start HTTP with the shared startHttpService.
 */

import "./src/bootstrap"; // loads env

import { initLogger, logger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { SERVICE_NAME, loadConfig } from "./src/config";
import { openDatabase } from "./src/db";
import { createBlogApp } from "./src/app";
import { createScopeFactory } from "./src/scope";

// Top-level guards
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start() {
  try {
    const config = loadConfig();
    initLogger(SERVICE_NAME, { level: config.logLevel, fsDir: config.logFsDir });
    const handle = await openDatabase(config.dbUrl, logger);
    const app = createBlogApp({
      scopeFactory: createScopeFactory(handle.db),
      isDevelopment: config.isDevelopment,
      readiness: handle.ping,
    });
    startHttpService({
      app,
      port: config.port,
      serviceName: SERVICE_NAME,
      logger,
      onShutdown: () => handle.close(),
    });
  } catch (err) {
    logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
    process.exit(1);
  }
}

void start();
