import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CsvOutputSink, OUTPUT_FILES } from "../../src/storage/csv-output-sink.js";
import { FileCheckpointStore } from "../../src/storage/file-checkpoint-store.js";
import {
  START_CURSOR,
  emptyBatch,
  emptyCounts,
  type AccessRow,
  type BrokenNodeRow,
  type JobCheckpoint,
  type OutputBatch,
} from "../../src/types/audit.js";

function checkpoint(overrides: Partial<JobCheckpoint> = {}): JobCheckpoint {
  return {
    runId: "run-1",
    jobIndex: 0,
    jobUrl: "https://contoso.sharepoint.com/sites/A",
    status: "in_progress",
    ...START_CURSOR,
    counts: emptyCounts(),
    updatedAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

function accessRow(overrides: Partial<AccessRow> = {}): AccessRow {
  return {
    jobIndex: 0,
    resourceId: "L1:3",
    resourceKind: "Item",
    resourceUrl: "https://contoso.sharepoint.com/sites/A/Shared Documents/x.docx",
    principalId: "7",
    principalKind: "User",
    loginName: "i:0#.f|membership|alice@contoso.com",
    displayName: "Alice",
    email: "alice@contoso.com",
    permissionLevel: "Edit",
    viaGroup: "Engineering",
    viaGroupId: "g-eng",
    viaGroupKind: "SecurityGroup",
    viaGroupChain: ["Site Members", "Engineering"],
    nestingLevel: 2,
    parentGroup: "Site Members",
    assignmentType: "Group",
    resolution: "Resolved",
    ...overrides,
  };
}

describe("CsvOutputSink", () => {
  let dir: string;
  let store: FileCheckpointStore;
  let sink: CsvOutputSink;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "auditor-csv-"));
    store = new FileCheckpointStore(dir);
    sink = new CsvOutputSink(dir, "run-1", store);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const read = (fileName: string) => readFile(path.join(dir, "run-1", fileName), "utf8");

  it("quotes every field and doubles embedded quotes", async () => {
    const batch: OutputBatch = {
      ...emptyBatch(),
      siteContents: [
        { jobIndex: 0, resourceId: "L1", type: "LIBRARY", title: 'Say "hi"', url: "https://x/y" },
      ],
    };

    await sink.write(batch);

    expect(await read(OUTPUT_FILES.siteContents)).toBe(
      'JobIndex,Id,Type,Title,Url\n"0","L1","LIBRARY","Say ""hi""","https://x/y"\n'
    );
  });

  it("writes the header once across batches and skips empty streams", async () => {
    const row = { jobIndex: 1, resourceId: "L2", type: "LIST" as const, title: "Tasks", url: "https://x/t" };

    await sink.write({ ...emptyBatch(), brokenNodes: [row] });
    await sink.write({ ...emptyBatch(), brokenNodes: [{ ...row, resourceId: "L3" }] });

    expect(await read(OUTPUT_FILES.brokenNodes)).toBe(
      'JobIndex,Id,Type,Title,Url\n"1","L2","LIST","Tasks","https://x/t"\n"1","L3","LIST","Tasks","https://x/t"\n'
    );
    expect(existsSync(path.join(dir, "run-1", OUTPUT_FILES.siteGroups))).toBe(false);
  });

  it("writes access rows with sharing details and the group chain", async () => {
    await sink.write({
      ...emptyBatch(),
      accessEntries: [accessRow({ sharedAt: "2024-03-01T10:00:00.000Z", sharedByLogin: "bob@contoso.com" })],
    });

    const [header, line] = (await read(OUTPUT_FILES.accessEntries)).split("\n");
    expect(header).toBe(
      "JobIndex,Id,Type,Url,PrincipalType,LoginName,DisplayName,Email,PermissionLevel," +
        "SharedDateTime,SharedByDisplayName,SharedByLoginName," +
        "ViaGroup,ViaGroupId,ViaGroupType,ViaGroupChain,AssignmentType,NestingLevel,ParentGroup,Resolution"
    );
    expect(line).toBe(
      '"0","L1:3","Item","https://contoso.sharepoint.com/sites/A/Shared Documents/x.docx","User",' +
        '"i:0#.f|membership|alice@contoso.com","Alice","alice@contoso.com","Edit",' +
        '"2024-03-01T10:00:00.000Z","","bob@contoso.com",' +
        '"Engineering","g-eng","SecurityGroup","Site Members > Engineering","Group","2","Site Members","Resolved"'
    );
  });

  it("leaves sharing columns out of the site users stream", async () => {
    await sink.write({ ...emptyBatch(), siteUsers: [accessRow()] });

    const [header] = (await read(OUTPUT_FILES.siteUsers)).split("\n");
    expect(header).toBe(
      "JobIndex,Id,Type,Url,PrincipalType,LoginName,DisplayName,Email,PermissionLevel," +
        "ViaGroup,ViaGroupId,ViaGroupType,ViaGroupChain,AssignmentType,NestingLevel,ParentGroup,Resolution"
    );
  });

  it("removes earlier output on reset", async () => {
    await sink.write({ ...emptyBatch(), siteUsers: [accessRow()] });

    await sink.reset();
    await sink.write({ ...emptyBatch(), siteUsers: [accessRow({ displayName: "Alice B" })] });

    const lines = (await read(OUTPUT_FILES.siteUsers)).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[1]).toContain('"Alice B"');
  });

  it("resets a run that has no output yet", async () => {
    await expect(sink.reset()).resolves.toBeUndefined();
  });

  it("saves the checkpoint of a commit with the size of every file", async () => {
    const row: BrokenNodeRow = { jobIndex: 1, resourceId: "L2", type: "LIST", title: "Tasks", url: "https://x/t" };

    await sink.commit({ ...emptyBatch(), brokenNodes: [row] }, checkpoint({ lastListIndex: 0 }));

    const [saved] = await store.load("run-1");
    expect(saved?.lastListIndex).toBe(0);
    expect(saved?.outputPosition).toEqual({
      [OUTPUT_FILES.siteContents]: 0,
      [OUTPUT_FILES.siteGroups]: 0,
      [OUTPUT_FILES.siteUsers]: 0,
      [OUTPUT_FILES.brokenNodes]: Buffer.byteLength(
        'JobIndex,Id,Type,Title,Url\n"1","L2","LIST","Tasks","https://x/t"\n'
      ),
      [OUTPUT_FILES.accessEntries]: 0,
    });
  });

  it("truncates rows written after the checkpoint on restore", async () => {
    const row: BrokenNodeRow = { jobIndex: 1, resourceId: "L2", type: "LIST", title: "Tasks", url: "https://x/t" };
    await sink.commit({ ...emptyBatch(), brokenNodes: [row] }, checkpoint());
    await sink.write({
      ...emptyBatch(),
      brokenNodes: [{ ...row, resourceId: "L3" }],
      siteUsers: [accessRow()],
    });

    const [saved] = await store.load("run-1");
    await new CsvOutputSink(dir, "run-1", store).restore(saved);

    expect(await read(OUTPUT_FILES.brokenNodes)).toBe(
      'JobIndex,Id,Type,Title,Url\n"1","L2","LIST","Tasks","https://x/t"\n'
    );
    expect(existsSync(path.join(dir, "run-1", OUTPUT_FILES.siteUsers))).toBe(false);

    await sink.write({ ...emptyBatch(), siteUsers: [accessRow()] });
    const [header] = (await read(OUTPUT_FILES.siteUsers)).split("\n");
    expect(header).toMatch(/^JobIndex,Id,Type,Url,/);
  });

  it("removes uncommitted output on restore without a checkpoint", async () => {
    await sink.write({ ...emptyBatch(), siteUsers: [accessRow()] });

    await sink.restore(undefined);

    expect(existsSync(path.join(dir, "run-1", OUTPUT_FILES.siteUsers))).toBe(false);
  });

  it("keeps output when the checkpoint carries no file sizes", async () => {
    await sink.write({ ...emptyBatch(), siteUsers: [accessRow()] });

    await sink.restore(checkpoint());

    expect((await read(OUTPUT_FILES.siteUsers)).trimEnd().split("\n")).toHaveLength(2);
  });
});
