import { z } from "zod";
import { RUN_ID_PATTERN } from "../utils/job-source.js";

const runIdSchema = z
  .string()
  .regex(RUN_ID_PATTERN, "Run id may contain letters, digits, '.', '_' and '-' only");

const absoluteUrl = z
  .string()
  .trim()
  .url("Must be an absolute URL")
  .refine((value) => /^https?:\/\//i.test(value), "Must be an http(s) URL");

/**
 * Schema for starting a scan
 * Jobs come either as a URL array or as the text of a job list file
 */
export const StartScanSchema = z
  .object({
    urls: z.array(absoluteUrl).min(1, "At least one URL is required").optional(),
    jobs: z.string().min(1, "Job list is empty").optional(),
    runId: runIdSchema.optional(),
    fresh: z.boolean().default(false),
  })
  .refine((body) => (body.urls === undefined) !== (body.jobs === undefined), {
    message: "Provide exactly one of 'urls' or 'jobs'",
    path: ["urls"],
  });

export type StartScanInput = z.infer<typeof StartScanSchema>;

/**
 * Schema for classifying a single URL
 */
export const ClassifyUrlSchema = z.object({
  url: absoluteUrl,
});

/**
 * Schema for run id parameter
 */
export const RunIdParamSchema = z.object({
  runId: runIdSchema,
});
