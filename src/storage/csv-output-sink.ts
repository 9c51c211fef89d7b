/**
 * CSV Output Sink
 * Appends the five output streams to CSV files in a per-run folder.
 * Each checkpoint records the file sizes it covers; restore truncates back to them.
 */

import { existsSync } from "node:fs";
import { appendFile, mkdir, rm, stat, truncate } from "node:fs/promises";
import path from "node:path";
import type {
  AccessRow,
  BrokenNodeRow,
  JobCheckpoint,
  OutputBatch,
  SiteContentRow,
  SiteGroupRow,
} from "../types/audit.js";
import type { CheckpointStore, OutputSink } from "../types/clients.js";

type Column<T> = readonly [header: string, value: (row: T) => string | number | undefined];

export const OUTPUT_FILES = {
  siteContents: "01_SiteContents.csv",
  siteGroups: "02_SiteGroups.csv",
  siteUsers: "03_SiteUsers.csv",
  brokenNodes: "04_IndividualPermissionItems.csv",
  accessEntries: "05_IndividualPermissionItemAccess.csv",
} as const satisfies Record<keyof OutputBatch, string>;

const SITE_CONTENT_COLUMNS: ReadonlyArray<Column<SiteContentRow>> = [
  ["JobIndex", (row) => row.jobIndex],
  ["Id", (row) => row.resourceId],
  ["Type", (row) => row.type],
  ["Title", (row) => row.title],
  ["Url", (row) => row.url],
];

const SITE_GROUP_COLUMNS: ReadonlyArray<Column<SiteGroupRow>> = [
  ["JobIndex", (row) => row.jobIndex],
  ["SiteUrl", (row) => row.siteUrl],
  ["Id", (row) => row.groupId],
  ["Role", (row) => row.role],
  ["Title", (row) => row.title],
  ["PermissionLevel", (row) => row.permissionLevel],
  ["Owner", (row) => row.owner],
];

const BROKEN_NODE_COLUMNS: ReadonlyArray<Column<BrokenNodeRow>> = [
  ["JobIndex", (row) => row.jobIndex],
  ["Id", (row) => row.resourceId],
  ["Type", (row) => row.type],
  ["Title", (row) => row.title],
  ["Url", (row) => row.url],
];

const PROVENANCE_COLUMNS: ReadonlyArray<Column<AccessRow>> = [
  ["ViaGroup", (row) => row.viaGroup],
  ["ViaGroupId", (row) => row.viaGroupId],
  ["ViaGroupType", (row) => row.viaGroupKind],
  ["ViaGroupChain", (row) => row.viaGroupChain.join(" > ")],
  ["AssignmentType", (row) => row.assignmentType],
  ["NestingLevel", (row) => row.nestingLevel],
  ["ParentGroup", (row) => row.parentGroup],
  ["Resolution", (row) => row.resolution],
];

const ACCOUNT_COLUMNS: ReadonlyArray<Column<AccessRow>> = [
  ["JobIndex", (row) => row.jobIndex],
  ["Id", (row) => row.resourceId],
  ["Type", (row) => row.resourceKind],
  ["Url", (row) => row.resourceUrl],
  ["PrincipalType", (row) => row.principalKind],
  ["LoginName", (row) => row.loginName],
  ["DisplayName", (row) => row.displayName],
  ["Email", (row) => row.email],
  ["PermissionLevel", (row) => row.permissionLevel],
];

const SITE_USER_COLUMNS: ReadonlyArray<Column<AccessRow>> = [
  ...ACCOUNT_COLUMNS,
  ...PROVENANCE_COLUMNS,
];

const ACCESS_COLUMNS: ReadonlyArray<Column<AccessRow>> = [
  ...ACCOUNT_COLUMNS,
  ["SharedDateTime", (row) => row.sharedAt],
  ["SharedByDisplayName", (row) => row.sharedByDisplayName],
  ["SharedByLoginName", (row) => row.sharedByLogin],
  ...PROVENANCE_COLUMNS,
];

function csvField(value: string | number | undefined): string {
  return `"${String(value ?? "").replace(/"/g, '""')}"`;
}

export function csvLine<T>(columns: ReadonlyArray<Column<T>>, row: T): string {
  return columns.map(([, value]) => csvField(value(row))).join(",");
}

export function csvHeader<T>(columns: ReadonlyArray<Column<T>>): string {
  return columns.map(([header]) => header).join(",");
}

export class CsvOutputSink implements OutputSink {
  readonly directory: string;

  /**
   * @param outputDir - Root output folder; rows go to <outputDir>/<runId>/
   * @param checkpoints - Store that receives the checkpoint of each commit
   */
  constructor(
    outputDir: string,
    runId: string,
    private readonly checkpoints: CheckpointStore
  ) {
    this.directory = path.join(outputDir, runId);
  }

  async commit(batch: OutputBatch, checkpoint: JobCheckpoint): Promise<void> {
    await this.write(batch);
    await this.checkpoints.save({ ...checkpoint, outputPosition: await this.position() });
  }

  async restore(checkpoint: JobCheckpoint | undefined): Promise<void> {
    if (!checkpoint) {
      await this.reset();
      return;
    }
    const position = checkpoint.outputPosition;
    if (!position) {
      return;
    }

    for (const fileName of Object.values(OUTPUT_FILES)) {
      const filePath = path.join(this.directory, fileName);
      const size = position[fileName] ?? 0;
      if (size === 0) {
        // Removed so the next append writes the header again
        await rm(filePath, { force: true });
      } else if (existsSync(filePath) && (await stat(filePath)).size > size) {
        await truncate(filePath, size);
      }
    }
  }

  /** Byte size of every output file, 0 for files not written yet */
  async position(): Promise<Record<string, number>> {
    const sizes: Record<string, number> = {};
    for (const fileName of Object.values(OUTPUT_FILES)) {
      const filePath = path.join(this.directory, fileName);
      sizes[fileName] = existsSync(filePath) ? (await stat(filePath)).size : 0;
    }
    return sizes;
  }

  async write(batch: OutputBatch): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await this.append(OUTPUT_FILES.siteContents, SITE_CONTENT_COLUMNS, batch.siteContents);
    await this.append(OUTPUT_FILES.siteGroups, SITE_GROUP_COLUMNS, batch.siteGroups);
    await this.append(OUTPUT_FILES.siteUsers, SITE_USER_COLUMNS, batch.siteUsers);
    await this.append(OUTPUT_FILES.brokenNodes, BROKEN_NODE_COLUMNS, batch.brokenNodes);
    await this.append(OUTPUT_FILES.accessEntries, ACCESS_COLUMNS, batch.accessEntries);
  }

  async reset(): Promise<void> {
    for (const fileName of Object.values(OUTPUT_FILES)) {
      await rm(path.join(this.directory, fileName), { force: true });
    }
  }

  async close(): Promise<void> {
    // Every write is appended and closed immediately
  }

  private async append<T>(
    fileName: string,
    columns: ReadonlyArray<Column<T>>,
    rows: T[]
  ): Promise<void> {
    if (rows.length === 0) {
      return;
    }

    const filePath = path.join(this.directory, fileName);
    const lines = rows.map((row) => csvLine(columns, row));
    if (!existsSync(filePath)) {
      lines.unshift(csvHeader(columns));
    }
    await appendFile(filePath, `${lines.join("\n")}\n`, "utf8");
  }
}
