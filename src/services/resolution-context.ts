import type { Logger } from "../config/logger.js";
import type { DirectoryGroupPrincipal, Principal, ScanCounts } from "../types/audit.js";
import type { DirectoryGroupCache } from "./directory-group-cache.js";

/**
 * Caches shared by the resolution engine and the accessor.
 * Site groups, display names and directory group objects are job-scoped;
 * directory group members are shared by every job of the process.
 */
export class ResolutionContext {
  /** Site group id -> direct members */
  readonly siteGroupMembers = new Map<string, Principal[]>();
  /** Login -> display name (null when the user is unknown) */
  readonly userDisplayNames = new Map<string, string | null>();
  /** Directory group id -> group object (null when the directory has no such group) */
  readonly groupObjects = new Map<string, DirectoryGroupPrincipal | null>();

  constructor(readonly directoryGroups: DirectoryGroupCache) {}

  resetForJob(): void {
    this.siteGroupMembers.clear();
    this.userDisplayNames.clear();
    this.groupObjects.clear();
  }
}

/**
 * Everything a job threads through the walker and the accessor
 */
export interface JobScope {
  jobIndex: number;
  jobUrl: string;
  log: Logger;
  context: ResolutionContext;
  /** Running totals for the job */
  counts: ScanCounts;
}
