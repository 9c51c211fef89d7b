/**
 * Graceful Shutdown Handler
 * Ensures clean shutdown of all connections
 */

import type { Server } from "http";
import { logger, logShutdown } from "../config/logger.js";
import type { ScanRunnerService } from "../services/scan-runner.service.js";
import { errorMessage } from "./errors.js";

/**
 * Shutdown state
 */
let isShuttingDown = false;

export interface ShutdownTargets {
  server: Server;
  scanRunner: Pick<ScanRunnerService, "isRunning" | "waitForIdle">;
  /** Closes storage and cache connections */
  closeResources: () => Promise<void>;
  /** How long a running scan may take to settle */
  timeoutMs?: number;
}

/**
 * Register shutdown handlers
 */
export function registerShutdownHandlers(targets: ShutdownTargets): void {
  const shutdown = (signal: string): void => {
    handleShutdown(targets, signal)
      .then((code) => process.exit(code))
      .catch((error: unknown) => {
        logger.fatal({ error: errorMessage(error) }, "Shutdown failed");
        process.exit(1);
      });
  };

  // Handle SIGTERM (Docker, Kubernetes)
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  // Handle SIGINT (Ctrl+C)
  process.on("SIGINT", () => shutdown("SIGINT"));

  process.on("uncaughtException", (error) => {
    logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
    shutdown("uncaughtException");
  });

  process.on("unhandledRejection", (reason) => {
    logger.fatal({ reason }, "Unhandled promise rejection");
    shutdown("unhandledRejection");
  });
}

/**
 * Handle graceful shutdown
 * A running scan is not interrupted mid-write; its checkpoints let the
 * next start resume it if the timeout forces an exit.
 * @returns Process exit code
 */
async function handleShutdown(targets: ShutdownTargets, signal: string): Promise<number> {
  if (isShuttingDown) {
    logger.warn("Shutdown already in progress");
    return 1;
  }

  isShuttingDown = true;
  logShutdown(signal);

  const forceShutdownTimeout = setTimeout(() => {
    logger.error("Forced shutdown after timeout");
    process.exit(1);
  }, targets.timeoutMs ?? 30000);

  try {
    // 1. Stop accepting new connections
    logger.info("Closing HTTP server...");
    await new Promise<void>((resolve, reject) => {
      targets.server.close((err) => {
        if (err) {
          reject(err);
        } else {
          logger.info("HTTP server closed");
          resolve();
        }
      });
    });

    // 2. Let the running batch settle
    if (targets.scanRunner.isRunning()) {
      logger.info("Waiting for the running scan to finish...");
      await targets.scanRunner.waitForIdle();
    }

    // 3. Close storage and cache connections
    await targets.closeResources();

    clearTimeout(forceShutdownTimeout);
    logger.info("Graceful shutdown complete");
    return 0;
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "Error during graceful shutdown");
    clearTimeout(forceShutdownTimeout);
    return 1;
  }
}
