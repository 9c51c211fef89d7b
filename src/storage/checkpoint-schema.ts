import { z } from "zod";
import type { JobCheckpoint } from "../types/audit.js";

export const ScanCountsSchema = z.object({
  sitesScanned: z.number().int().default(0),
  listsScanned: z.number().int().default(0),
  itemsScanned: z.number().int().default(0),
  brokenNodes: z.number().int().default(0),
  accessRows: z.number().int().default(0),
  siteGroups: z.number().int().default(0),
  siteUsers: z.number().int().default(0),
  externalUsers: z.number().int().default(0),
  sharedWithEveryone: z.number().int().default(0),
  failedLists: z.number().int().default(0),
  failedNodes: z.number().int().default(0),
});

/**
 * Stored checkpoint shape, checked whenever checkpoints are read back
 */
export const JobCheckpointSchema = z.object({
  runId: z.string(),
  jobIndex: z.number().int().min(0),
  jobUrl: z.string(),
  status: z.enum(["in_progress", "completed", "skipped"]),
  siteIndex: z.number().int().min(0),
  siteLevelDone: z.boolean(),
  lastListIndex: z.number().int().min(-1),
  lastItemId: z.number().int().min(0),
  counts: ScanCountsSchema,
  message: z.string().optional(),
  outputPosition: z.record(z.number().int().min(0)).optional(),
  updatedAt: z.string(),
}) satisfies z.ZodType<JobCheckpoint, z.ZodTypeDef, unknown>;

export const CheckpointFileSchema = z.array(JobCheckpointSchema);
