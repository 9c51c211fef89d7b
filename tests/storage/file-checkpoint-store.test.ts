import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CHECKPOINT_FILE, FileCheckpointStore } from "../../src/storage/file-checkpoint-store.js";
import { emptyCounts, type JobCheckpoint } from "../../src/types/audit.js";
import { ValidationError } from "../../src/utils/errors.js";

function checkpoint(runId: string, jobIndex: number, overrides: Partial<JobCheckpoint> = {}): JobCheckpoint {
  return {
    runId,
    jobIndex,
    jobUrl: `https://contoso.sharepoint.com/sites/J${jobIndex}`,
    status: "in_progress",
    siteIndex: 0,
    siteLevelDone: true,
    lastListIndex: 1,
    lastItemId: 40,
    counts: { ...emptyCounts(), itemsScanned: 40 },
    updatedAt: "2024-03-01T10:00:00.000Z",
    ...overrides,
  };
}

describe("FileCheckpointStore", () => {
  let dir: string;
  let store: FileCheckpointStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "auditor-checkpoints-"));
    store = new FileCheckpointStore(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns nothing for an unknown run", async () => {
    expect(await store.load("run-1")).toEqual([]);
  });

  it("keeps one checkpoint per job, sorted by job index", async () => {
    await store.save(checkpoint("run-1", 2));
    await store.save(checkpoint("run-1", 0, { status: "completed" }));
    await store.save(checkpoint("run-1", 2, { lastItemId: 90 }));

    const saved = await store.load("run-1");
    expect(saved.map((entry) => [entry.jobIndex, entry.status, entry.lastItemId])).toEqual([
      [0, "completed", 40],
      [2, "in_progress", 90],
    ]);
  });

  it("keeps the optional message of a skipped job", async () => {
    await store.save(checkpoint("run-1", 0, { status: "skipped", message: "NotFound: No site found" }));

    expect((await store.load("run-1"))[0]?.message).toBe("NotFound: No site found");
  });

  it("clears one run and lists the others", async () => {
    await store.save(checkpoint("run-b", 0));
    await store.save(checkpoint("run-a", 0));
    await mkdir(path.join(dir, "not-a-run"));

    expect(await store.listRuns()).toEqual(["run-a", "run-b"]);

    await store.clear("run-a");

    expect(await store.load("run-a")).toEqual([]);
    expect(await store.listRuns()).toEqual(["run-b"]);
  });

  it("lists no runs when the output folder does not exist", async () => {
    expect(await new FileCheckpointStore(path.join(dir, "missing")).listRuns()).toEqual([]);
  });

  it("rejects a checkpoint file that is not JSON", async () => {
    await mkdir(path.join(dir, "run-1"));
    await writeFile(path.join(dir, "run-1", CHECKPOINT_FILE), "{");

    await expect(store.load("run-1")).rejects.toBeInstanceOf(ValidationError);
  });

  it("rejects a checkpoint file with the wrong shape", async () => {
    await mkdir(path.join(dir, "run-1"));
    await writeFile(path.join(dir, "run-1", CHECKPOINT_FILE), JSON.stringify([{ runId: "run-1" }]));

    await expect(store.load("run-1")).rejects.toThrow("Checkpoint file is malformed");
  });
});
