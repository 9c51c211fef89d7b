/**
 * PostgreSQL Output Sink
 * Writes each batch and its checkpoint in a single transaction
 */

import { eq } from "drizzle-orm";
import type { Database } from "../db/index.js";
import {
  accessEntries,
  brokenNodes,
  siteContents,
  siteGroups,
  siteUsers,
  type NewAccessRecord,
} from "../db/schema.js";
import type { AccessRow, JobCheckpoint, OutputBatch } from "../types/audit.js";
import type { OutputSink } from "../types/clients.js";
import { upsertCheckpoint } from "./drizzle-checkpoint-store.js";

/** Rows per INSERT statement, well under the bind parameter limit */
const INSERT_CHUNK = 500;

function chunks<T>(rows: T[]): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < rows.length; i += INSERT_CHUNK) {
    result.push(rows.slice(i, i + INSERT_CHUNK));
  }
  return result;
}

function toAccessRecord(runId: string, row: AccessRow): NewAccessRecord {
  return {
    runId,
    jobIndex: row.jobIndex,
    resourceId: row.resourceId,
    resourceKind: row.resourceKind,
    resourceUrl: row.resourceUrl,
    principalId: row.principalId,
    principalKind: row.principalKind,
    loginName: row.loginName,
    displayName: row.displayName,
    email: row.email,
    permissionLevel: row.permissionLevel,
    viaGroup: row.viaGroup,
    viaGroupId: row.viaGroupId,
    viaGroupKind: row.viaGroupKind,
    viaGroupChain: row.viaGroupChain,
    nestingLevel: row.nestingLevel,
    parentGroup: row.parentGroup,
    assignmentType: row.assignmentType,
    resolution: row.resolution,
    sharedAt: row.sharedAt ?? null,
    sharedByLogin: row.sharedByLogin ?? null,
    sharedByDisplayName: row.sharedByDisplayName ?? null,
  };
}

export class DrizzleOutputSink implements OutputSink {
  constructor(
    private readonly db: Database,
    private readonly runId: string
  ) {}

  async commit(batch: OutputBatch, checkpoint: JobCheckpoint): Promise<void> {
    const runId = this.runId;

    await this.db.transaction(async (tx) => {
      for (const rows of chunks(batch.siteContents)) {
        await tx.insert(siteContents).values(rows.map((row) => ({ runId, ...row })));
      }
      for (const rows of chunks(batch.siteGroups)) {
        await tx.insert(siteGroups).values(rows.map((row) => ({ runId, ...row })));
      }
      for (const rows of chunks(batch.siteUsers)) {
        await tx.insert(siteUsers).values(rows.map((row) => toAccessRecord(runId, row)));
      }
      for (const rows of chunks(batch.brokenNodes)) {
        await tx.insert(brokenNodes).values(rows.map((row) => ({ runId, ...row })));
      }
      for (const rows of chunks(batch.accessEntries)) {
        await tx.insert(accessEntries).values(rows.map((row) => toAccessRecord(runId, row)));
      }
      await upsertCheckpoint(tx, checkpoint);
    });
  }

  async restore(): Promise<void> {
    // Rows are only ever stored together with their checkpoint
  }

  async reset(): Promise<void> {
    const runId = this.runId;
    await this.db.transaction(async (tx) => {
      await tx.delete(siteContents).where(eq(siteContents.runId, runId));
      await tx.delete(siteGroups).where(eq(siteGroups.runId, runId));
      await tx.delete(siteUsers).where(eq(siteUsers.runId, runId));
      await tx.delete(brokenNodes).where(eq(brokenNodes.runId, runId));
      await tx.delete(accessEntries).where(eq(accessEntries.runId, runId));
    });
  }

  async close(): Promise<void> {
    // The pool outlives a run and is closed on shutdown
  }
}
