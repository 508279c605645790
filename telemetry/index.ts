#!/usr/bin/env node
/**
 * gpulse telemetry - samples GPU and host metrics into bounded history
 * and keeps a consistent snapshot available to readers
 */

import { loadConfig } from "./src/config.js";
import { summarizeSnapshot } from "./src/query/summary.js";
import { TelemetryService } from "./src/telemetry-service.js";
import { serializeError } from "./src/utils/errors.js";
import { logger } from "./src/utils/logger.js";

let summaryTimer: ReturnType<typeof setInterval> | null = null;
let service: TelemetryService | null = null;

// Graceful shutdown
const shutdown = async (signal: string) => {
  logger.info({ signal }, "Received shutdown signal");

  if (summaryTimer) {
    clearInterval(summaryTimer);
    summaryTimer = null;
  }

  try {
    await service?.shutdown();
    logger.info("Shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error({ error: serializeError(error) }, "Error during shutdown");
    process.exit(1);
  }
};

// Initialize and start
(async () => {
  try {
    const config = loadConfig();
    logger.info(
      { config: { ...config, thresholds: undefined } },
      "Starting telemetry"
    );

    service = new TelemetryService(config);
    await service.start();

    const running = service;
    summaryTimer = setInterval(() => {
      logger.info(
        {
          summary: summarizeSnapshot(running.currentSnapshot()),
          diagnostics: running.diagnostics(),
        },
        "Telemetry summary"
      );
    }, config.summaryIntervalMs);

    process.on("SIGTERM", () => void shutdown("SIGTERM"));
    process.on("SIGINT", () => void shutdown("SIGINT"));

    logger.info("Telemetry running");
  } catch (error) {
    logger.error(
      { error: serializeError(error) },
      "Fatal error during telemetry startup"
    );
    process.exit(1);
  }
})();
