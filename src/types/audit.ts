/**
 * Audit Domain Types
 * Resources, principals, role assignments and the flattened access rows
 */

import type { ListKind } from "../config/scanner-settings.js";

// =============================================================================
// JOBS
// =============================================================================

export interface Job {
  url: string;
  jobIndex: number;
}

// =============================================================================
// PRINCIPALS
// =============================================================================

export type DirectoryGroupKind = "SecurityGroup" | "M365Group";

export type GroupKind = "SiteGroup" | DirectoryGroupKind;

export type PrincipalKind = "User" | GroupKind;

interface PrincipalBase {
  /** Site user id for users and site groups, directory object id for directory groups */
  id: string;
  loginName: string;
  displayName: string;
  email: string;
}

export interface UserPrincipal extends PrincipalBase {
  kind: "User";
  /** Tenant-wide audience claims ("Everyone", "Everyone except external users") */
  isEveryone?: boolean;
}

export interface SiteGroupPrincipal extends PrincipalBase {
  kind: "SiteGroup";
  ownerTitle: string;
  /** Groups the platform creates for sharing links */
  isSharingLink: boolean;
}

export interface DirectoryGroupPrincipal extends PrincipalBase {
  kind: DirectoryGroupKind;
}

export type GroupPrincipal = SiteGroupPrincipal | DirectoryGroupPrincipal;

export type Principal = UserPrincipal | GroupPrincipal;

export function isDirectoryGroup(
  principal: Principal
): principal is DirectoryGroupPrincipal {
  return principal.kind === "SecurityGroup" || principal.kind === "M365Group";
}

// =============================================================================
// RESOURCES
// =============================================================================

export type ResourceKind =
  | "Site"
  | "Subsite"
  | "List"
  | "Library"
  | "SitePages"
  | "Folder"
  | "Item";

/**
 * Who shared an item with an account, and when
 */
export interface ShareRecord {
  /** Login of the account the item was shared with */
  loginName: string;
  sharedAt: string;
  sharedByLogin: string;
}

export interface Resource {
  /** Identifier shared by every output stream */
  id: string;
  kind: ResourceKind;
  title: string;
  url: string;
  hasUniqueRoleAssignments: boolean;
  shares?: ShareRecord[];
}

export interface SiteInfo {
  id: string;
  title: string;
  /** Absolute URL */
  url: string;
  serverRelativeUrl: string;
  hasUniqueRoleAssignments: boolean;
}

export interface ListInfo {
  id: string;
  title: string;
  baseTemplate: number;
  hidden: boolean;
  /** Server-relative URL of the list root folder */
  rootFolderUrl: string;
  hasUniqueRoleAssignments: boolean;
}

export interface ListItemInfo {
  /** Numeric item ID; pages are ordered by it */
  id: number;
  /** Server-relative path of the file or folder */
  fileRef: string;
  fileLeafRef: string;
  isFolder: boolean;
  hasUniqueRoleAssignments: boolean;
  shares?: ShareRecord[];
}

export function listKindToResourceKind(kind: ListKind): ResourceKind {
  switch (kind) {
    case "List":
      return "List";
    case "DocumentLibrary":
      return "Library";
    case "SitePages":
      return "SitePages";
  }
}

/**
 * Resource ids: web id for sites, list id for lists, "<listId>:<itemId>" for items
 */
export function itemResourceId(listId: string, itemId: number): string {
  return `${listId}:${itemId}`;
}

// =============================================================================
// ROLE ASSIGNMENTS
// =============================================================================

export interface RoleAssignment {
  principal: Principal;
  permissionLevels: string[];
}

export type RoleAssignmentTarget =
  | { kind: "site" }
  | { kind: "list"; listId: string }
  | { kind: "item"; listId: string; itemId: number };

// =============================================================================
// RESOLUTION
// =============================================================================

export type AssignmentType = "Direct" | "Group" | "SharingLink";

/**
 * Resolved: a leaf account
 * Excluded: group on the do-not-resolve list
 * DepthLimited: group beyond the nesting cap
 * Failed: membership lookup failed
 */
export type ResolutionStatus = "Resolved" | "Excluded" | "DepthLimited" | "Failed";

/**
 * A leaf account (or a placeholder group) reached through a group
 */
export interface ResolvedMember {
  principal: Principal;
  nestingLevel: number;
  viaGroup: string;
  viaGroupId: string;
  viaGroupKind: GroupKind | "";
  /** Display names from the assigned group down to viaGroup */
  viaGroupChain: string[];
  parentGroup: string;
  assignmentType: AssignmentType;
  resolution: ResolutionStatus;
}

/**
 * Flattened access row
 */
export interface AccessEntry {
  resourceId: string;
  resourceKind: ResourceKind;
  resourceUrl: string;
  principalId: string;
  principalKind: PrincipalKind;
  loginName: string;
  displayName: string;
  email: string;
  permissionLevel: string;
  viaGroup: string;
  viaGroupId: string;
  viaGroupKind: GroupKind | "";
  viaGroupChain: string[];
  nestingLevel: number;
  parentGroup: string;
  assignmentType: AssignmentType;
  resolution: ResolutionStatus;
  sharedAt?: string;
  sharedByLogin?: string;
  sharedByDisplayName?: string;
}

// =============================================================================
// OUTPUT ROWS
// =============================================================================

export type SiteContentType = "LIST" | "LIBRARY" | "SITEPAGES" | "SUBSITE";

export interface SiteContentRow {
  jobIndex: number;
  resourceId: string;
  type: SiteContentType;
  title: string;
  url: string;
}

export type SiteGroupRole = "SiteOwners" | "SiteMembers" | "SiteVisitors" | "Custom";

export interface SiteGroupRow {
  jobIndex: number;
  siteUrl: string;
  groupId: string;
  role: SiteGroupRole;
  title: string;
  permissionLevel: string;
  owner: string;
}

export type BrokenNodeType = "SUBSITE" | "LIST" | "LIBRARY" | "SITEPAGES" | "FOLDER" | "ITEM";

export interface BrokenNodeRow {
  jobIndex: number;
  resourceId: string;
  type: BrokenNodeType;
  title: string;
  url: string;
}

export interface AccessRow extends AccessEntry {
  jobIndex: number;
}

/**
 * One flush worth of rows for the five output streams
 */
export interface OutputBatch {
  siteContents: SiteContentRow[];
  siteGroups: SiteGroupRow[];
  siteUsers: AccessRow[];
  brokenNodes: BrokenNodeRow[];
  accessEntries: AccessRow[];
}

export function emptyBatch(): OutputBatch {
  return {
    siteContents: [],
    siteGroups: [],
    siteUsers: [],
    brokenNodes: [],
    accessEntries: [],
  };
}

export function batchRowCount(batch: OutputBatch): number {
  return (
    batch.siteContents.length +
    batch.siteGroups.length +
    batch.siteUsers.length +
    batch.brokenNodes.length +
    batch.accessEntries.length
  );
}

// =============================================================================
// CHECKPOINTS
// =============================================================================

export interface ScanCounts {
  sitesScanned: number;
  listsScanned: number;
  itemsScanned: number;
  brokenNodes: number;
  accessRows: number;
  siteGroups: number;
  siteUsers: number;
  externalUsers: number;
  sharedWithEveryone: number;
  failedLists: number;
  failedNodes: number;
}

export function emptyCounts(): ScanCounts {
  return {
    sitesScanned: 0,
    listsScanned: 0,
    itemsScanned: 0,
    brokenNodes: 0,
    accessRows: 0,
    siteGroups: 0,
    siteUsers: 0,
    externalUsers: 0,
    sharedWithEveryone: 0,
    failedLists: 0,
    failedNodes: 0,
  };
}

const COUNT_KEYS: ReadonlyArray<keyof ScanCounts> = [
  "sitesScanned",
  "listsScanned",
  "itemsScanned",
  "brokenNodes",
  "accessRows",
  "siteGroups",
  "siteUsers",
  "externalUsers",
  "sharedWithEveryone",
  "failedLists",
  "failedNodes",
];

export function addCounts(target: ScanCounts, source: ScanCounts): void {
  for (const key of COUNT_KEYS) {
    target[key] += source[key];
  }
}

/**
 * Position inside a job's walk
 * siteIndex: depth-first index of the site being processed
 * lastListIndex: last fully processed qualifying list of that site (-1 = none)
 * lastItemId: item ID cursor inside the following list (0 = none)
 */
export interface WalkCursor {
  siteIndex: number;
  siteLevelDone: boolean;
  lastListIndex: number;
  lastItemId: number;
}

export const START_CURSOR: WalkCursor = {
  siteIndex: 0,
  siteLevelDone: false,
  lastListIndex: -1,
  lastItemId: 0,
};

export type CheckpointStatus = "in_progress" | "completed" | "skipped";

export interface JobCheckpoint extends WalkCursor {
  runId: string;
  jobIndex: number;
  jobUrl: string;
  status: CheckpointStatus;
  counts: ScanCounts;
  message?: string;
  /** Size of each output file when the checkpoint was taken (file output only) */
  outputPosition?: Record<string, number>;
  updatedAt: string;
}
