import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import { isDevelopment } from "./config/environment.js";
import { logger } from "./config/logger.js";
import type { ApiResponse } from "./types/index.js";
import { requestIdMiddleware, getRequestId } from "./middleware/request-id.middleware.js";
import { createAuthMiddleware } from "./middleware/auth.middleware.js";
import { errorHandler, notFoundHandler } from "./middleware/error-handler.middleware.js";
import { createHealthRouter, type HealthDependencies } from "./controllers/health.controller.js";
import {
  createScanController,
  type ScanControllerDependencies,
} from "./controllers/scan.controller.js";
import { createScanRouter } from "./routes/scan.routes.js";

export interface AppDependencies extends ScanControllerDependencies {
  apiSecret: string | undefined;
  pingStorage: HealthDependencies["pingStorage"];
  cache: HealthDependencies["cache"];
  allowedOrigins?: string[];
}

/**
 * Create the Express application
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // ===========================================================================
  // MIDDLEWARE
  // ===========================================================================

  app.use(
    cors({
      origin: isDevelopment ? "*" : deps.allowedOrigins ?? [],
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
    })
  );

  app.use(requestIdMiddleware);

  // Job lists can be long
  app.use(express.json({ limit: "10mb" }));

  if (isDevelopment) {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug({ requestId: getRequestId(req), method: req.method, path: req.path }, "Request");
      next();
    });
  }

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use(
    "/health",
    createHealthRouter({
      pingStorage: deps.pingStorage,
      cache: deps.cache,
      isScanRunning: () => deps.scanRunner.isRunning(),
    })
  );

  app.get(
    "/api/v1",
    (_req: Request, res: Response<ApiResponse<{ version: string; name: string }>>) => {
      res.status(200).json({
        success: true,
        data: {
          version: "1.0.0",
          name: "Inheritance Auditor API",
        },
      });
    }
  );

  // ===========================================================================
  // PROTECTED ROUTES (require the shared secret)
  // ===========================================================================

  app.use("/api/v1", createAuthMiddleware(deps.apiSecret));
  app.use("/api/v1", createScanRouter(createScanController(deps)));

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
