/**
 * Audit Orchestrator Service
 * Runs a batch of jobs: classify, walk, commit rows with their checkpoint at boundaries
 */

import { createJobLogger, type Logger } from "../config/logger.js";
import {
  START_CURSOR,
  addCounts,
  batchRowCount,
  emptyBatch,
  emptyCounts,
  type CheckpointStatus,
  type Job,
  type JobCheckpoint,
  type OutputBatch,
  type ScanCounts,
  type WalkCursor,
} from "../types/audit.js";
import type { CheckpointStore, OutputSink } from "../types/clients.js";
import { SinkError, errorMessage } from "../utils/errors.js";
import type { BoundaryKind, ContentWalkerService } from "./content-walker.service.js";
import type { ResolutionContext, JobScope } from "./resolution-context.js";
import { isClassificationFailure, type UrlClassifierService } from "./url-classifier.service.js";

// =============================================================================
// TYPES
// =============================================================================

export interface JobResult {
  jobIndex: number;
  url: string;
  status: Exclude<CheckpointStatus, "in_progress">;
  /** Finished in an earlier run and not touched now */
  fromCheckpoint: boolean;
  /** Continued from an in-progress checkpoint */
  resumed: boolean;
  counts: ScanCounts;
  message?: string;
}

export interface BatchResult {
  runId: string;
  jobs: JobResult[];
  totals: ScanCounts;
  startedAt: string;
  finishedAt: string;
}

export interface BatchOptions {
  runId: string;
  /** Drop existing checkpoints and output of the run before starting */
  fresh?: boolean;
  onJobFinished?: (result: JobResult) => void;
}

export interface OrchestratorDependencies {
  classifier: UrlClassifierService;
  walker: ContentWalkerService;
  /** Output for one run */
  createSink: (runId: string) => OutputSink;
  checkpoints: CheckpointStore;
  context: ResolutionContext;
  outputBatchSize: number;
  logger: Logger;
}

// =============================================================================
// SERVICE
// =============================================================================

export class AuditOrchestratorService {
  constructor(private readonly deps: OrchestratorDependencies) {}

  /**
   * Process jobs sequentially in order
   * @throws SinkError - output or checkpoint write failed; the run stops
   */
  async runBatch(jobs: Job[], options: BatchOptions): Promise<BatchResult> {
    const { runId } = options;
    const log = this.deps.logger.child({ runId });
    const startedAt = new Date().toISOString();

    const sink = this.deps.createSink(runId);
    if (options.fresh) {
      try {
        await this.deps.checkpoints.clear(runId);
        await sink.reset();
      } catch (error) {
        throw new SinkError(`Previous output could not be cleared: ${errorMessage(error)}`, { runId });
      }
    }

    const saved = new Map<number, JobCheckpoint>();
    let latest: JobCheckpoint | undefined;
    for (const checkpoint of await this.deps.checkpoints.load(runId)) {
      saved.set(checkpoint.jobIndex, checkpoint);
      if (!latest || checkpoint.jobIndex > latest.jobIndex) {
        latest = checkpoint;
      }
    }

    if (!options.fresh) {
      // Rows written after the last checkpoint are produced again on resume
      try {
        await sink.restore(latest);
      } catch (error) {
        throw new SinkError(`Output could not be restored: ${errorMessage(error)}`, { runId });
      }
    }

    log.info({ jobs: jobs.length, checkpoints: saved.size }, "Batch started");

    const results: JobResult[] = [];
    const totals = emptyCounts();

    for (const job of jobs) {
      const result = await this.runJob(job, saved.get(job.jobIndex), runId, sink);
      results.push(result);
      addCounts(totals, result.counts);
      options.onJobFinished?.(result);
    }

    try {
      await sink.close();
    } catch (error) {
      throw new SinkError(`Output could not be closed: ${errorMessage(error)}`, { runId });
    }

    const finishedAt = new Date().toISOString();
    log.info(
      {
        completed: results.filter((result) => result.status === "completed").length,
        skipped: results.filter((result) => result.status === "skipped").length,
        ...totals,
      },
      "Batch finished"
    );

    return { runId, jobs: results, totals, startedAt, finishedAt };
  }

  private async runJob(
    job: Job,
    checkpoint: JobCheckpoint | undefined,
    runId: string,
    sink: OutputSink
  ): Promise<JobResult> {
    const log = createJobLogger(this.deps.logger, runId, job.jobIndex, job.url);

    if (checkpoint && checkpoint.status !== "in_progress") {
      log.info({ status: checkpoint.status }, "Job already finished in this run");
      return {
        jobIndex: job.jobIndex,
        url: job.url,
        status: checkpoint.status,
        fromCheckpoint: true,
        resumed: false,
        counts: checkpoint.counts,
        ...(checkpoint.message !== undefined && { message: checkpoint.message }),
      };
    }

    this.deps.context.resetForJob();

    const classification = await this.deps.classifier.classify(job.url);
    if (isClassificationFailure(classification)) {
      const message = `${classification.reason}: ${classification.message}`;
      log.warn({ reason: classification.reason }, "Job skipped");
      const counts = emptyCounts();
      await this.commit(sink, emptyBatch(), runId, job, "skipped", START_CURSOR, counts, message);
      return {
        jobIndex: job.jobIndex,
        url: job.url,
        status: "skipped",
        fromCheckpoint: false,
        resumed: false,
        counts,
        message,
      };
    }

    const resumed = checkpoint !== undefined;
    const resume: WalkCursor = checkpoint
      ? {
          siteIndex: checkpoint.siteIndex,
          siteLevelDone: checkpoint.siteLevelDone,
          lastListIndex: checkpoint.lastListIndex,
          lastItemId: checkpoint.lastItemId,
        }
      : START_CURSOR;
    const counts: ScanCounts = checkpoint ? { ...checkpoint.counts } : emptyCounts();

    log.info({ kind: classification.kind, siteUrl: classification.siteUrl, resumed, resume }, "Job started");

    const scope: JobScope = {
      jobIndex: job.jobIndex,
      jobUrl: job.url,
      log,
      context: this.deps.context,
      counts,
    };

    let buffer: OutputBatch = emptyBatch();
    let position: WalkCursor = resume;

    const flush = async (status: CheckpointStatus, cursor: WalkCursor): Promise<void> => {
      const pending = buffer;
      buffer = emptyBatch();
      await this.commit(sink, pending, runId, job, status, cursor, counts);
      log.debug({ rows: batchRowCount(pending), status }, "Committed");
    };

    await this.deps.walker.walk(classification, resume, scope, {
      emit: (rows) => {
        buffer.siteContents.push(...(rows.siteContents ?? []));
        buffer.siteGroups.push(...(rows.siteGroups ?? []));
        buffer.siteUsers.push(...(rows.siteUsers ?? []));
        buffer.brokenNodes.push(...(rows.brokenNodes ?? []));
        buffer.accessEntries.push(...(rows.accessEntries ?? []));
      },
      boundary: async (cursor: WalkCursor, kind: BoundaryKind) => {
        position = cursor;
        if (kind === "item" && batchRowCount(buffer) < this.deps.outputBatchSize) {
          return;
        }
        await flush("in_progress", cursor);
      },
    });

    await flush("completed", position);
    log.info({ ...counts }, "Job completed");

    return {
      jobIndex: job.jobIndex,
      url: job.url,
      status: "completed",
      fromCheckpoint: false,
      resumed,
      counts,
    };
  }

  /**
   * Hand rows and the checkpoint that covers them to the sink as one unit
   * @throws SinkError - the rows or the checkpoint could not be stored
   */
  private async commit(
    sink: OutputSink,
    batch: OutputBatch,
    runId: string,
    job: Job,
    status: CheckpointStatus,
    cursor: WalkCursor,
    counts: ScanCounts,
    message?: string
  ): Promise<void> {
    const checkpoint: JobCheckpoint = {
      runId,
      jobIndex: job.jobIndex,
      jobUrl: job.url,
      status,
      siteIndex: cursor.siteIndex,
      siteLevelDone: cursor.siteLevelDone,
      lastListIndex: cursor.lastListIndex,
      lastItemId: cursor.lastItemId,
      counts: { ...counts },
      ...(message !== undefined && { message }),
      updatedAt: new Date().toISOString(),
    };

    try {
      await sink.commit(batch, checkpoint);
    } catch (error) {
      throw new SinkError(`Output write failed: ${errorMessage(error)}`, {
        runId,
        jobIndex: job.jobIndex,
        jobUrl: job.url,
      });
    }
  }
}
