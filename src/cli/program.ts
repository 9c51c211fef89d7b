/**
 * CLI Program
 * Commands of the auditor CLI, built around an injected runtime and output
 */

import { Command } from "commander";
import type { Runtime } from "../runtime.js";
import { isClassificationFailure } from "../services/url-classifier.service.js";
import { errorMessage, isAppError } from "../utils/errors.js";
import { assertRunId, deriveRunId, readJobFile } from "../utils/job-source.js";

interface RunOptions {
  jobs: string;
  runId?: string;
  fresh?: boolean;
  purgeDirectoryCache?: boolean;
}

export type CliRuntime = Pick<Runtime, "engine" | "storage" | "directoryCache" | "close">;

export interface CliDependencies {
  /** Builds the runtime for one command; it is closed when the command ends */
  createRuntime: () => Promise<CliRuntime>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  setExitCode: (code: number) => void;
}

/** Exit code of `classify` when the URL does not resolve */
export const CLASSIFICATION_FAILED_EXIT_CODE = 2;

export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name("inheritance-auditor")
    .description("Audit broken permission inheritance across SharePoint sites")
    .version("1.0.0");

  /**
   * Build the runtime, run the action, always release connections
   */
  const withRuntime = async (action: (runtime: CliRuntime) => Promise<void>): Promise<void> => {
    const runtime = await deps.createRuntime();
    try {
      await action(runtime);
    } finally {
      await runtime.close();
    }
  };

  const report = (context: string, error: unknown): void => {
    const code = isAppError(error) ? ` [${error.code}]` : "";
    deps.stderr(`${context}${code}: ${errorMessage(error)}\n`);
    if (isAppError(error) && error.details) {
      deps.stderr(JSON.stringify(error.details, null, 2) + "\n");
    }
    deps.setExitCode(1);
  };

  program
    .command("run")
    .description("Scan every URL of a job list; re-running the same list resumes it")
    .requiredOption("--jobs <file>", "Job list: one absolute URL per line")
    .option("--run-id <id>", "Run id (default: derived from the job list)")
    .option("--fresh", "Discard checkpoints of the run and start over")
    .option("--purge-directory-cache", "Forget cached directory group members first")
    .action(async (options: RunOptions) => {
      try {
        const jobs = await readJobFile(options.jobs);
        const runId = options.runId ? assertRunId(options.runId) : deriveRunId(jobs);

        await withRuntime(async (runtime) => {
          if (options.purgeDirectoryCache) {
            await runtime.directoryCache.purge();
          }

          const result = await runtime.engine.orchestrator.runBatch(jobs, {
            runId,
            fresh: options.fresh ?? false,
          });

          for (const job of result.jobs) {
            const note = job.fromCheckpoint ? " (from checkpoint)" : job.resumed ? " (resumed)" : "";
            const detail = job.message ? ` - ${job.message}` : "";
            deps.stdout(`#${job.jobIndex} ${job.status}${note} ${job.url}${detail}\n`);
          }
          deps.stdout(`\nRun ${result.runId} finished\n`);
          deps.stdout(JSON.stringify(result.totals, null, 2) + "\n");
        });
      } catch (error) {
        report("Run failed", error);
      }
    });

  program
    .command("classify")
    .description("Show what a URL resolves to without scanning it")
    .argument("<url>", "Absolute URL inside the tenant")
    .action(async (url: string) => {
      try {
        await withRuntime(async (runtime) => {
          const classification = await runtime.engine.classifier.classify(url);
          deps.stdout(JSON.stringify(classification, null, 2) + "\n");
          if (isClassificationFailure(classification)) {
            deps.setExitCode(CLASSIFICATION_FAILED_EXIT_CODE);
          }
        });
      } catch (error) {
        report("Classification failed", error);
      }
    });

  program
    .command("checkpoints")
    .description("Print the stored checkpoints of a run, or list runs")
    .argument("[runId]", "Run id")
    .action(async (runId: string | undefined) => {
      try {
        await withRuntime(async (runtime) => {
          const output = runId
            ? await runtime.storage.checkpoints.load(assertRunId(runId))
            : await runtime.storage.checkpoints.listRuns();
          deps.stdout(JSON.stringify(output, null, 2) + "\n");
        });
      } catch (error) {
        report("Reading checkpoints failed", error);
      }
    });

  program
    .command("clear-cache")
    .description("Forget cached directory group members")
    .action(async () => {
      try {
        await withRuntime(async (runtime) => {
          const removed = await runtime.directoryCache.purge();
          deps.stdout(`Removed ${removed} persisted group entries\n`);
        });
      } catch (error) {
        report("Clearing the cache failed", error);
      }
    });

  return program;
}
