/**
 * Collaborator Interfaces
 * What the audit engine needs from the outside world
 */

import type {
  DirectoryGroupPrincipal,
  JobCheckpoint,
  ListInfo,
  ListItemInfo,
  OutputBatch,
  Principal,
  RoleAssignment,
  RoleAssignmentTarget,
  SiteInfo,
  UserPrincipal,
} from "./audit.js";

/**
 * Content service (SharePoint REST)
 * Lookups of absent objects resolve to null/false; other failures throw
 * ServiceRequestError or, after retries, ResolutionError.
 */
export interface ContentServiceClient {
  /** Connect to a site; null when no site lives at that URL */
  connect(siteUrl: string): Promise<SiteInfo | null>;
  getSubsites(siteUrl: string): Promise<SiteInfo[]>;
  getLists(siteUrl: string): Promise<ListInfo[]>;
  /** List whose root folder has the given server-relative URL */
  getListByUrl(siteUrl: string, serverRelativeUrl: string): Promise<ListInfo | null>;
  folderExists(siteUrl: string, serverRelativeUrl: string): Promise<boolean>;
  /** One page of items with ID greater than afterId, ordered by ID */
  getListItems(
    siteUrl: string,
    listId: string,
    page: { afterId: number; pageSize: number; includeShareDetails?: boolean }
  ): Promise<ListItemInfo[]>;
  getRoleAssignments(
    siteUrl: string,
    target: RoleAssignmentTarget
  ): Promise<RoleAssignment[]>;
  getSiteGroupMembers(siteUrl: string, groupId: string): Promise<Principal[]>;
  getUserDisplayName(siteUrl: string, loginName: string): Promise<string | null>;
}

/**
 * Direct member of a directory group, typed by the directory itself
 */
export type DirectoryMember = UserPrincipal | DirectoryGroupPrincipal;

/**
 * Directory service (Microsoft Graph)
 */
export interface DirectoryServiceClient {
  getGroup(groupId: string): Promise<DirectoryGroupPrincipal | null>;
  getGroupMembers(groupId: string): Promise<DirectoryMember[]>;
}

/**
 * Append-only writer for the five output streams
 */
export interface OutputSink {
  /**
   * Store a batch together with the checkpoint that covers it.
   * After a failure in between, restore drops the rows again.
   */
  commit(batch: OutputBatch, checkpoint: JobCheckpoint): Promise<void>;
  /** Drop rows written after the given checkpoint, or every row when there is none */
  restore(checkpoint: JobCheckpoint | undefined): Promise<void>;
  /** Drop everything written for the run so far */
  reset(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Durable per-job resume state
 */
export interface CheckpointStore {
  load(runId: string): Promise<JobCheckpoint[]>;
  save(checkpoint: JobCheckpoint): Promise<void>;
  clear(runId: string): Promise<void>;
  listRuns(): Promise<string[]>;
}

/**
 * Key/value layer that outlives the process (Redis)
 */
export interface PersistentCache {
  /** Parsed JSON value, or null on a miss */
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttl?: number): Promise<void>;
  clearPattern(pattern: string): Promise<number>;
}

/**
 * Supplies a bearer token for a service call
 */
export type TokenProvider = () => Promise<string>;
