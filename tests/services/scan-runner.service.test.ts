import { describe, it, expect } from "vitest";
import { ScanRunnerService } from "../../src/services/scan-runner.service.js";
import type { Job } from "../../src/types/audit.js";
import { ConflictError } from "../../src/utils/errors.js";
import { ORIGIN, silentLogger } from "../helpers/fakes.js";
import { ControlledOrchestrator } from "../helpers/engine.js";

const jobs: Job[] = [{ url: `${ORIGIN}/sites/A`, jobIndex: 0 }];

describe("ScanRunnerService", () => {
  it("reports a running scan, refuses a second one, then reports completion", async () => {
    const orchestrator = new ControlledOrchestrator();
    const runner = new ScanRunnerService(orchestrator, silentLogger);

    const started = runner.start(jobs, { runId: "run-1" });
    expect(started).toMatchObject({ runId: "run-1", status: "running", totalJobs: 1, jobs: [] });
    expect(runner.isRunning()).toBe(true);
    expect(() => runner.start(jobs, { runId: "run-2" })).toThrow(ConflictError);

    orchestrator.finish();
    await runner.waitForIdle();

    const state = runner.getCurrent();
    expect(state?.status).toBe("completed");
    expect(state?.jobs.map((job) => job.jobIndex)).toEqual([0]);
    expect(state?.totals?.sitesScanned).toBe(1);
    expect(state?.finishedAt).toBeDefined();
    expect(runner.isRunning()).toBe(false);
  });

  it("records the error when the batch fails", async () => {
    const orchestrator = new ControlledOrchestrator();
    const runner = new ScanRunnerService(orchestrator, silentLogger);

    runner.start(jobs, { runId: "run-1" });
    orchestrator.fail(new Error("Output write failed: disk full"));
    await runner.waitForIdle();

    expect(runner.getCurrent()).toMatchObject({
      status: "failed",
      error: "Output write failed: disk full",
    });
  });

  it("allows a new scan once the previous one has finished", async () => {
    const orchestrator = new ControlledOrchestrator();
    const runner = new ScanRunnerService(orchestrator, silentLogger);

    runner.start(jobs, { runId: "run-1" });
    orchestrator.finish();
    await runner.waitForIdle();

    expect(runner.start(jobs, { runId: "run-2" }).runId).toBe("run-2");
  });

  it("has no state before the first scan", async () => {
    const runner = new ScanRunnerService(new ControlledOrchestrator(), silentLogger);

    expect(runner.getCurrent()).toBeNull();
    await expect(runner.waitForIdle()).resolves.toBeUndefined();
  });
});
