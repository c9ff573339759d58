#!/usr/bin/env node
import YahooFinance from "yahoo-finance2";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { HistoryService } from "./history/service.js";
import { logger, pruneOldLogs } from "./logging.js";
import { YahooProvider } from "./providers/yahoo.js";
import { startRestServer } from "./rest/server.js";

async function main() {
  logger.info({ pid: process.pid, debug: config.log.debug }, "Stock history service starting");

  // Validate configuration early
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  // Prune old log files (keep 30 days)
  pruneOldLogs();

  // One upstream client for the life of the process, handed to the provider
  const yf = new YahooFinance({ suppressNotices: ["yahooSurvey"] });
  const provider = new YahooProvider(yf, config.provider);
  const service = new HistoryService(provider);

  const server = await startRestServer(service, config.rest.host, config.rest.port);

  // Graceful shutdown
  const shutdown = () => {
    logger.info("Shutting down...");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "Error while closing REST server");
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection");
  });
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
