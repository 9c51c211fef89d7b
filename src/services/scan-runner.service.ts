/**
 * Scan Runner Service
 * Runs one batch at a time in the background and reports its progress
 */

import type { Logger } from "../config/logger.js";
import type { Job, ScanCounts } from "../types/audit.js";
import { ConflictError, errorMessage } from "../utils/errors.js";
import type {
  AuditOrchestratorService,
  BatchOptions,
  JobResult,
} from "./audit-orchestrator.service.js";

export type ScanStatus = "running" | "completed" | "failed";

export interface ScanState {
  runId: string;
  status: ScanStatus;
  startedAt: string;
  finishedAt?: string;
  totalJobs: number;
  jobs: JobResult[];
  totals?: ScanCounts;
  error?: string;
}

export class ScanRunnerService {
  private current: ScanState | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly orchestrator: Pick<AuditOrchestratorService, "runBatch">,
    private readonly logger: Logger
  ) {}

  /**
   * Start a batch
   * @throws ConflictError - a batch is already running
   */
  start(jobs: Job[], options: Omit<BatchOptions, "onJobFinished">): ScanState {
    if (this.current?.status === "running") {
      throw new ConflictError("A scan is already running", { runId: this.current.runId });
    }

    const state: ScanState = {
      runId: options.runId,
      status: "running",
      startedAt: new Date().toISOString(),
      totalJobs: jobs.length,
      jobs: [],
    };
    this.current = state;
    this.running = this.execute(jobs, options, state);
    return { ...state, jobs: [...state.jobs] };
  }

  getCurrent(): ScanState | null {
    return this.current ? { ...this.current, jobs: [...this.current.jobs] } : null;
  }

  isRunning(): boolean {
    return this.current?.status === "running";
  }

  /**
   * Resolves once the running batch (if any) has settled
   */
  async waitForIdle(): Promise<void> {
    await this.running;
  }

  private async execute(
    jobs: Job[],
    options: Omit<BatchOptions, "onJobFinished">,
    state: ScanState
  ): Promise<void> {
    try {
      const result = await this.orchestrator.runBatch(jobs, {
        ...options,
        onJobFinished: (job) => {
          state.jobs.push(job);
        },
      });
      state.status = "completed";
      state.totals = result.totals;
    } catch (error) {
      state.status = "failed";
      state.error = errorMessage(error);
      this.logger.error({ runId: state.runId, error: state.error }, "Scan failed");
    } finally {
      state.finishedAt = new Date().toISOString();
    }
  }
}
