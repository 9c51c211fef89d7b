/**
 * Scanner Settings
 * Tunables for the audit engine, read from a JSON file next to the service.
 * A missing file is created with the defaults below.
 */

import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { logger } from "./logger.js";
import { ValidationError } from "../utils/errors.js";

/**
 * Settings schema
 * Every field has a default so a partial file is valid
 */
export const ScannerSettingsSchema = z.object({
  /** Deepest group nesting that is still expanded (0 = only the assigned group) */
  maxGroupNestingLevel: z.number().int().min(0).max(20).default(5),
  /** Permission levels that grant no substantive access */
  ignorePermissionLevels: z
    .array(z.string())
    .default(["Limited Access", "Web-Only Limited Access"]),
  /** Login fragments of system and service identities */
  ignoreAccounts: z
    .array(z.string())
    .default(["SHAREPOINT\\system", "app@sharepoint"]),
  /** Site groups left out of the site groups stream */
  ignoreSiteGroups: z.array(z.string()).default([]),
  /** Groups too large or blocked from enumeration (display name or id) */
  doNotResolveGroups: z.array(z.string()).default([]),
  /** List titles that are never scanned */
  ignoreLists: z.array(z.string()).default([]),
  /** Built-in system lists that should be scanned anyway */
  allowedSystemLists: z.array(z.string()).default([]),
  /** List base templates that are scanned, keyed by template id */
  listTemplates: z
    .record(z.string().regex(/^\d+$/), z.enum(["List", "DocumentLibrary", "SitePages"]))
    .default({ "100": "List", "101": "DocumentLibrary", "119": "SitePages" }),
  includeSubsites: z.boolean().default(true),
  maxSubsiteDepth: z.number().int().min(0).max(20).default(5),
  /** Sites with very many subsites; scanned but never descended into */
  leafSiteUrls: z.array(z.string()).default([]),
  /** Items requested per page */
  pageSize: z.number().int().min(1).max(5000).default(5000),
  /** Buffered rows that trigger a flush to the output sink */
  outputBatchSize: z.number().int().min(1).default(5000),
});

export type ScannerSettings = z.infer<typeof ScannerSettingsSchema>;

export type ListKind = ScannerSettings["listTemplates"][string];

/**
 * Defaults as written to a fresh settings file
 */
export function defaultScannerSettings(): ScannerSettings {
  return ScannerSettingsSchema.parse({});
}

/**
 * Validate raw settings
 * @param raw - Parsed JSON
 */
export function parseScannerSettings(raw: unknown): ScannerSettings {
  const parsed = ScannerSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("Invalid scanner settings", {
      fieldErrors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

/**
 * Load scanner settings, creating the file with defaults if missing
 * @param settingsPath - Path of the JSON settings file
 */
export async function loadScannerSettings(
  settingsPath: string
): Promise<ScannerSettings> {
  if (!existsSync(settingsPath)) {
    const defaults = defaultScannerSettings();
    await mkdir(path.dirname(settingsPath), { recursive: true });
    await writeFile(settingsPath, JSON.stringify(defaults, null, 2) + "\n", "utf-8");
    logger.info({ settingsPath }, "Created default scanner settings file");
    return defaults;
  }

  const content = await readFile(settingsPath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError("Scanner settings file is not valid JSON", {
      settingsPath,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const settings = parseScannerSettings(raw);
  logger.info({ settingsPath }, "Loaded scanner settings");
  return settings;
}
