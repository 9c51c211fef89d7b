/**
 * Job Source
 * Reads the ordered list of URLs to audit
 */

import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import type { Job } from "../types/audit.js";
import { ValidationError } from "./errors.js";

/** Run ids become folder names and database keys */
export const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

/**
 * Parse a job list: one absolute URL per line, blank lines and # comments ignored.
 * Duplicates are kept; each line is its own job.
 * @throws ValidationError - a line is not an absolute http(s) URL
 */
export function parseJobList(text: string): Job[] {
  const jobs: Job[] = [];
  const invalid: string[] = [];

  text.split(/\r?\n/).forEach((rawLine, lineIndex) => {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) {
      return;
    }

    let url: URL | null = null;
    try {
      url = new URL(line);
    } catch {
      url = null;
    }
    if (!url || (url.protocol !== "https:" && url.protocol !== "http:")) {
      invalid.push(`line ${lineIndex + 1}: ${line}`);
      return;
    }

    jobs.push({ url: line, jobIndex: jobs.length });
  });

  if (invalid.length > 0) {
    throw new ValidationError("Job list contains lines that are not absolute URLs", {
      lines: invalid,
    });
  }

  return jobs;
}

/**
 * Read and parse a job list file
 */
export async function readJobFile(filePath: string): Promise<Job[]> {
  return parseJobList(await readFile(filePath, "utf8"));
}

/**
 * Stable run id for a job list, so re-running the same list resumes it
 */
export function deriveRunId(jobs: Job[]): string {
  const hash = createHash("sha256");
  for (const job of jobs) {
    hash.update(`${job.jobIndex}\t${job.url}\n`);
  }
  return `run-${hash.digest("hex").slice(0, 12)}`;
}

export function assertRunId(runId: string): string {
  if (!RUN_ID_PATTERN.test(runId)) {
    throw new ValidationError("Invalid run id", { runId });
  }
  return runId;
}
