/**
 * File Checkpoint Store
 * One JSON document per run, replaced atomically through a temp file and rename
 */

import { existsSync } from "node:fs";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { JobCheckpoint } from "../types/audit.js";
import type { CheckpointStore } from "../types/clients.js";
import { ValidationError } from "../utils/errors.js";
import { CheckpointFileSchema } from "./checkpoint-schema.js";

export const CHECKPOINT_FILE = "checkpoints.json";

export class FileCheckpointStore implements CheckpointStore {
  /**
   * @param outputDir - Root output folder; checkpoints go to <outputDir>/<runId>/checkpoints.json
   */
  constructor(private readonly outputDir: string) {}

  async load(runId: string): Promise<JobCheckpoint[]> {
    const filePath = this.filePath(runId);
    if (!existsSync(filePath)) {
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(filePath, "utf8"));
    } catch (error) {
      throw new ValidationError(`Checkpoint file is not valid JSON: ${filePath}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = CheckpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Checkpoint file is malformed: ${filePath}`, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data.sort((a, b) => a.jobIndex - b.jobIndex);
  }

  async save(checkpoint: JobCheckpoint): Promise<void> {
    const existing = await this.load(checkpoint.runId);
    const next = existing.filter((entry) => entry.jobIndex !== checkpoint.jobIndex);
    next.push(checkpoint);
    next.sort((a, b) => a.jobIndex - b.jobIndex);

    const filePath = this.filePath(checkpoint.runId);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(next, null, 2), "utf8");
    await rename(tempPath, filePath);
  }

  async clear(runId: string): Promise<void> {
    await rm(this.filePath(runId), { force: true });
  }

  async listRuns(): Promise<string[]> {
    if (!existsSync(this.outputDir)) {
      return [];
    }
    const entries = await readdir(this.outputDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && existsSync(this.filePath(entry.name)))
      .map((entry) => entry.name)
      .sort();
  }

  private filePath(runId: string): string {
    return path.join(this.outputDir, runId, CHECKPOINT_FILE);
  }
}
