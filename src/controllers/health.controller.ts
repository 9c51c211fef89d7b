/**
 * Health Check Controller
 * Provides endpoints for monitoring system health
 */

import { Router, type Request, type Response } from "express";
import { logger } from "../config/logger.js";
import type { CacheService } from "../services/cache.service.js";
import type { DependencyCheck } from "../types/index.js";
import { errorMessage } from "../utils/errors.js";

/**
 * Health status response
 */
interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  scanRunning: boolean;
  checks: {
    storage: DependencyCheck;
    cache: DependencyCheck;
  };
}

export interface HealthDependencies {
  /** Rejects when output/checkpoint storage is unusable */
  pingStorage: () => Promise<void>;
  /** Null when no persistent cache is configured */
  cache: Pick<CacheService, "isAvailable" | "set" | "get"> | null;
  isScanRunning: () => boolean;
}

/**
 * Get version from package.json
 */
const VERSION = process.env["npm_package_version"] || "1.0.0";

/**
 * Server start time for uptime calculation
 */
const startTime = Date.now();

async function checkStorage(deps: HealthDependencies): Promise<DependencyCheck> {
  const start = Date.now();
  try {
    await deps.pingStorage();
    return { status: "ok", latency: Date.now() - start };
  } catch (error) {
    const message = errorMessage(error);
    logger.error({ error: message }, "Storage health check failed");
    return { status: "error", error: message };
  }
}

/**
 * Check Redis connectivity
 * The cache is optional: unconfigured reports "disabled", not an error
 */
async function checkCache(deps: HealthDependencies): Promise<DependencyCheck> {
  const cache = deps.cache;
  if (!cache) {
    return { status: "disabled" };
  }
  if (!cache.isAvailable()) {
    return { status: "error", error: "Cache not connected" };
  }

  const start = Date.now();
  try {
    await cache.set("auditor:health:check", "ok", 10);
    const result = await cache.get("auditor:health:check");
    if (result === "ok") {
      return { status: "ok", latency: Date.now() - start };
    }
    return { status: "error", error: "Cache write/read mismatch" };
  } catch (error) {
    const message = errorMessage(error);
    logger.error({ error: message }, "Cache health check failed");
    return { status: "error", error: message };
  }
}

export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();

  /**
   * GET /health
   * Storage is required; a broken cache only degrades
   */
  router.get("/", (_req: Request, res: Response<HealthStatus>, next) => {
    Promise.all([checkStorage(deps), checkCache(deps)])
      .then(([storage, cache]) => {
        const status: HealthStatus["status"] =
          storage.status !== "ok"
            ? "unhealthy"
            : cache.status === "error"
            ? "degraded"
            : "healthy";

        res.status(status === "unhealthy" ? 503 : 200).json({
          status,
          timestamp: new Date().toISOString(),
          version: VERSION,
          uptime: Math.floor((Date.now() - startTime) / 1000),
          scanRunning: deps.isScanRunning(),
          checks: { storage, cache },
        });
      })
      .catch(next);
  });

  /**
   * GET /health/live
   * Liveness probe
   */
  router.get("/live", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * GET /health/ready
   * Readiness probe
   */
  router.get("/ready", (_req: Request, res: Response, next) => {
    checkStorage(deps)
      .then((storage) => {
        if (storage.status === "ok") {
          res.status(200).json({ status: "ready", timestamp: new Date().toISOString() });
        } else {
          res.status(503).json({
            status: "not_ready",
            timestamp: new Date().toISOString(),
            error: "Storage not available",
          });
        }
      })
      .catch(next);
  });

  return router;
}
