/**
 * PostgreSQL Checkpoint Store
 * One row per (run, job), upserted in a transaction
 */

import { asc, eq } from "drizzle-orm";
import type { Database, Transaction } from "../db/index.js";
import { checkpoints, type CheckpointRecord } from "../db/schema.js";
import type { JobCheckpoint } from "../types/audit.js";
import type { CheckpointStore } from "../types/clients.js";
import { ScanCountsSchema } from "./checkpoint-schema.js";

function toCheckpoint(record: CheckpointRecord): JobCheckpoint {
  return {
    runId: record.runId,
    jobIndex: record.jobIndex,
    jobUrl: record.jobUrl,
    status: record.status,
    siteIndex: record.siteIndex,
    siteLevelDone: record.siteLevelDone,
    lastListIndex: record.lastListIndex,
    lastItemId: record.lastItemId,
    // jsonb comes back untyped at runtime
    counts: ScanCountsSchema.parse(record.counts),
    ...(record.message !== null && { message: record.message }),
    updatedAt: record.updatedAt.toISOString(),
  };
}

/**
 * Insert or replace the checkpoint of (runId, jobIndex) inside a transaction
 */
export async function upsertCheckpoint(tx: Transaction, checkpoint: JobCheckpoint): Promise<void> {
  const values = {
    jobUrl: checkpoint.jobUrl,
    status: checkpoint.status,
    siteIndex: checkpoint.siteIndex,
    siteLevelDone: checkpoint.siteLevelDone,
    lastListIndex: checkpoint.lastListIndex,
    lastItemId: checkpoint.lastItemId,
    counts: checkpoint.counts,
    message: checkpoint.message ?? null,
    updatedAt: new Date(checkpoint.updatedAt),
  };

  await tx
    .insert(checkpoints)
    .values({ runId: checkpoint.runId, jobIndex: checkpoint.jobIndex, ...values })
    .onConflictDoUpdate({
      target: [checkpoints.runId, checkpoints.jobIndex],
      set: values,
    });
}

export class DrizzleCheckpointStore implements CheckpointStore {
  constructor(private readonly db: Database) {}

  async load(runId: string): Promise<JobCheckpoint[]> {
    const records = await this.db
      .select()
      .from(checkpoints)
      .where(eq(checkpoints.runId, runId))
      .orderBy(asc(checkpoints.jobIndex));
    return records.map(toCheckpoint);
  }

  async save(checkpoint: JobCheckpoint): Promise<void> {
    await this.db.transaction((tx) => upsertCheckpoint(tx, checkpoint));
  }

  async clear(runId: string): Promise<void> {
    await this.db.delete(checkpoints).where(eq(checkpoints.runId, runId));
  }

  async listRuns(): Promise<string[]> {
    const rows = await this.db
      .selectDistinct({ runId: checkpoints.runId })
      .from(checkpoints)
      .orderBy(asc(checkpoints.runId));
    return rows.map((row) => row.runId);
  }
}
