/**
 * Scan Controller
 * Controller functions for starting scans and inspecting their progress
 */

import type { Request, Response } from "express";
import type { JobCheckpoint } from "../types/audit.js";
import type { CheckpointStore } from "../types/clients.js";
import type { DirectoryGroupCache } from "../services/directory-group-cache.js";
import type { ScanRunnerService, ScanState } from "../services/scan-runner.service.js";
import type { Classification, UrlClassifierService } from "../services/url-classifier.service.js";
import type { ControllerFunction } from "../utils/async-handler.js";
import { NotFoundError, ValidationError } from "../utils/errors.js";
import { deriveRunId, parseJobList } from "../utils/job-source.js";
import {
  ClassifyUrlSchema,
  RunIdParamSchema,
  StartScanSchema,
} from "../validators/scan.validator.js";

export interface ScanControllerDependencies {
  scanRunner: ScanRunnerService;
  classifier: Pick<UrlClassifierService, "classify">;
  checkpoints: CheckpointStore;
  directoryCache: Pick<DirectoryGroupCache, "purge">;
}

export interface ScanController {
  startScan: ControllerFunction<ScanState>;
  getCurrentScan: ControllerFunction<ScanState>;
  listRuns: ControllerFunction<{ runs: string[] }>;
  getCheckpoints: ControllerFunction<{ runId: string; checkpoints: JobCheckpoint[] }>;
  classifyUrl: ControllerFunction<Classification>;
  purgeDirectoryCache: ControllerFunction<{ removed: number }>;
}

export function createScanController(deps: ScanControllerDependencies): ScanController {
  /**
   * Start a batch in the background
   * Responds 202 with the initial state; 409 while another batch runs
   */
  async function startScan(req: Request, res: Response): Promise<ScanState> {
    const parsed = StartScanSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError("Invalid input", parsed.error.flatten().fieldErrors);
    }

    const { urls, jobs: jobText, runId, fresh } = parsed.data;
    const jobs = urls
      ? urls.map((url, jobIndex) => ({ url, jobIndex }))
      : parseJobList(jobText ?? "");
    if (jobs.length === 0) {
      throw new ValidationError("Job list contains no URLs");
    }

    const state = deps.scanRunner.start(jobs, {
      runId: runId ?? deriveRunId(jobs),
      fresh,
    });
    res.statusCode = 202;
    return state;
  }

  async function getCurrentScan(): Promise<ScanState> {
    const state = deps.scanRunner.getCurrent();
    if (!state) {
      throw new NotFoundError("Scan");
    }
    return state;
  }

  async function listRuns(): Promise<{ runs: string[] }> {
    return { runs: await deps.checkpoints.listRuns() };
  }

  async function getCheckpoints(
    req: Request
  ): Promise<{ runId: string; checkpoints: JobCheckpoint[] }> {
    const parsed = RunIdParamSchema.safeParse(req.params);
    if (!parsed.success) {
      throw new ValidationError("Invalid run id", parsed.error.flatten().fieldErrors);
    }

    const { runId } = parsed.data;
    const checkpoints = await deps.checkpoints.load(runId);
    if (checkpoints.length === 0) {
      throw new NotFoundError("Run", runId);
    }
    return { runId, checkpoints };
  }

  /**
   * Dry run of the classifier for one URL
   */
  async function classifyUrl(req: Request): Promise<Classification> {
    const parsed = ClassifyUrlSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError("Invalid input", parsed.error.flatten().fieldErrors);
    }
    return deps.classifier.classify(parsed.data.url);
  }

  async function purgeDirectoryCache(): Promise<{ removed: number }> {
    return { removed: await deps.directoryCache.purge() };
  }

  return {
    startScan,
    getCurrentScan,
    listRuns,
    getCheckpoints,
    classifyUrl,
    purgeDirectoryCache,
  };
}
