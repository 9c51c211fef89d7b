/**
 * Scan Routes
 * Route definitions for scans, runs and the classifier dry run
 */

import { Router } from "express";
import { asyncHandler } from "../utils/async-handler.js";
import type { ScanController } from "../controllers/scan.controller.js";

export function createScanRouter(controller: ScanController): Router {
  const router = Router();

  /**
   * POST /scans
   * Start a batch; 202 with its initial state
   */
  router.post("/scans", asyncHandler(controller.startScan));

  /**
   * GET /scans/current
   * State of the running or most recent batch
   */
  router.get("/scans/current", asyncHandler(controller.getCurrentScan));

  /**
   * GET /runs
   * Run ids with stored checkpoints
   */
  router.get("/runs", asyncHandler(controller.listRuns));

  /**
   * GET /runs/:runId/checkpoints
   */
  router.get("/runs/:runId/checkpoints", asyncHandler(controller.getCheckpoints));

  /**
   * POST /classify
   * Classify one URL without scanning it
   */
  router.post("/classify", asyncHandler(controller.classifyUrl));

  /**
   * DELETE /cache/directory-groups
   */
  router.delete("/cache/directory-groups", asyncHandler(controller.purgeDirectoryCache));

  return router;
}
