import { env } from "./config/environment.js";
import { logger, logStartup } from "./config/logger.js";
import { createApp } from "./app.js";
import { createRuntime } from "./runtime.js";
import { ScanRunnerService } from "./services/scan-runner.service.js";
import { registerShutdownHandlers } from "./utils/graceful-shutdown.js";
import { errorMessage } from "./utils/errors.js";

async function main(): Promise<void> {
  const runtime = await createRuntime(env, logger);
  const scanRunner = new ScanRunnerService(
    runtime.engine.orchestrator,
    logger.child({ component: "scan-runner" })
  );

  const app = createApp({
    apiSecret: env.API_SECRET,
    scanRunner,
    classifier: runtime.engine.classifier,
    checkpoints: runtime.storage.checkpoints,
    directoryCache: runtime.directoryCache,
    pingStorage: runtime.storage.ping,
    cache: runtime.persistentCache,
    allowedOrigins: env.ALLOWED_ORIGINS,
  });

  if (!env.API_SECRET) {
    logger.warn("API_SECRET is not set; /api/v1 routes will refuse every request");
  }

  const server = app.listen(env.PORT, () => {
    logStartup(env.PORT, env.NODE_ENV);
  });

  registerShutdownHandlers({
    server,
    scanRunner,
    closeResources: runtime.close,
  });
}

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, "Failed to start server");
  process.exit(1);
});
