/**
 * Permission Accessor Service
 * Reads role assignments of sites and flagged nodes and flattens them to access rows
 */

import type { ScannerSettings } from "../config/scanner-settings.js";
import type {
  AccessEntry,
  AccessRow,
  BrokenNodeRow,
  BrokenNodeType,
  Resource,
  ResourceKind,
  ResolvedMember,
  RoleAssignment,
  RoleAssignmentTarget,
  ShareRecord,
  SiteGroupRole,
  SiteGroupRow,
} from "../types/audit.js";
import type { ContentServiceClient } from "../types/clients.js";
import { ResolutionError } from "../utils/errors.js";
import {
  isEveryoneAudience,
  isExternalLogin,
  matchesIgnoredAccount,
} from "../utils/principal-filters.js";
import type { GroupResolutionService } from "./group-resolution.service.js";
import type { JobScope } from "./resolution-context.js";

export type AccessorSettings = Pick<
  ScannerSettings,
  "ignorePermissionLevels" | "ignoreAccounts" | "ignoreSiteGroups"
>;

export interface SiteAccess {
  siteGroups: SiteGroupRow[];
  siteUsers: AccessRow[];
}

export interface NodeAccess {
  brokenNode: BrokenNodeRow;
  accessRows: AccessRow[];
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Role of a site group, from the conventional suffix of its title
 */
export function siteGroupRole(title: string): SiteGroupRole {
  const lowered = title.toLowerCase();
  if (lowered.includes("owner")) return "SiteOwners";
  if (lowered.includes("member")) return "SiteMembers";
  if (lowered.includes("visitor")) return "SiteVisitors";
  return "Custom";
}

export function brokenNodeType(kind: ResourceKind): BrokenNodeType {
  switch (kind) {
    case "Site":
    case "Subsite":
      return "SUBSITE";
    case "List":
      return "LIST";
    case "Library":
      return "LIBRARY";
    case "SitePages":
      return "SITEPAGES";
    case "Folder":
      return "FOLDER";
    case "Item":
      return "ITEM";
  }
}

function compareText(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Row order within a resource: display name, login, permission level
 */
export function compareEntries(a: AccessEntry, b: AccessEntry): number {
  return (
    compareText(a.displayName, b.displayName) ||
    compareText(a.loginName, b.loginName) ||
    compareText(a.permissionLevel, b.permissionLevel)
  );
}

function toEntry(resource: Resource, member: ResolvedMember, permissionLevel: string): AccessEntry {
  return {
    resourceId: resource.id,
    resourceKind: resource.kind,
    resourceUrl: resource.url,
    principalId: member.principal.id,
    principalKind: member.principal.kind,
    loginName: member.principal.loginName,
    displayName: member.principal.displayName,
    email: member.principal.email,
    permissionLevel,
    viaGroup: member.viaGroup,
    viaGroupId: member.viaGroupId,
    viaGroupKind: member.viaGroupKind,
    viaGroupChain: member.viaGroupChain,
    nestingLevel: member.nestingLevel,
    parentGroup: member.parentGroup,
    assignmentType: member.assignmentType,
    resolution: member.resolution,
  };
}

/**
 * One row per (account, permission level), keeping the shallowest path
 */
export function dedupeEntries(entries: AccessEntry[]): AccessEntry[] {
  const kept = new Map<string, AccessEntry>();
  for (const entry of entries) {
    const account = entry.loginName
      ? entry.loginName.toLowerCase()
      : `${entry.principalKind}:${entry.principalId.toLowerCase()}`;
    const key = `${account}|${entry.permissionLevel.toLowerCase()}`;
    const existing = kept.get(key);
    if (!existing || entry.nestingLevel < existing.nestingLevel) {
      kept.set(key, entry);
    }
  }
  return [...kept.values()];
}

// =============================================================================
// SERVICE
// =============================================================================

export class PermissionAccessorService {
  private readonly ignoredLevels: Set<string>;
  private readonly ignoredSiteGroups: Set<string>;

  constructor(
    private readonly content: ContentServiceClient,
    private readonly resolver: GroupResolutionService,
    private readonly settings: AccessorSettings
  ) {
    this.ignoredLevels = new Set(settings.ignorePermissionLevels.map((level) => level.toLowerCase()));
    this.ignoredSiteGroups = new Set(settings.ignoreSiteGroups.map((title) => title.toLowerCase()));
  }

  /**
   * Site-level access: site groups with their permission levels and every account
   * that reaches the site
   * @param site - The site as a resource (kind Site or Subsite)
   */
  async processSite(site: Resource, scope: JobScope): Promise<SiteAccess> {
    const assignments = await this.readAssignments(site, site.url, { kind: "site" }, scope);
    if (!assignments) {
      return { siteGroups: [], siteUsers: [] };
    }

    const siteGroups: SiteGroupRow[] = [];
    for (const assignment of assignments) {
      const principal = assignment.principal;
      if (principal.kind !== "SiteGroup" || this.ignoredSiteGroups.has(principal.displayName.toLowerCase())) {
        continue;
      }
      for (const permissionLevel of this.substantiveLevels(assignment)) {
        siteGroups.push({
          jobIndex: scope.jobIndex,
          siteUrl: site.url,
          groupId: principal.id,
          role: siteGroupRole(principal.displayName),
          title: principal.displayName,
          permissionLevel,
          owner: principal.ownerTitle,
        });
      }
    }

    const entries = await this.flatten(site, site.url, assignments, scope);
    const siteUsers = entries.map((entry) => ({ ...entry, jobIndex: scope.jobIndex }));

    scope.counts.siteGroups += siteGroups.length;
    scope.counts.siteUsers += siteUsers.length;
    return { siteGroups, siteUsers };
  }

  /**
   * A node with broken inheritance and its flattened access rows
   * The node row is emitted even when its assignments cannot be read
   */
  async processNode(
    resource: Resource,
    siteUrl: string,
    target: RoleAssignmentTarget,
    scope: JobScope
  ): Promise<NodeAccess> {
    const brokenNode: BrokenNodeRow = {
      jobIndex: scope.jobIndex,
      resourceId: resource.id,
      type: brokenNodeType(resource.kind),
      title: resource.title,
      url: resource.url,
    };

    const assignments = await this.readAssignments(resource, siteUrl, target, scope);
    const entries = assignments ? await this.flatten(resource, siteUrl, assignments, scope) : [];
    const accessRows = entries.map((entry) => ({ ...entry, jobIndex: scope.jobIndex }));

    scope.counts.brokenNodes += 1;
    scope.counts.accessRows += accessRows.length;
    return { brokenNode, accessRows };
  }

  private substantiveLevels(assignment: RoleAssignment): string[] {
    return assignment.permissionLevels.filter(
      (level) => !this.ignoredLevels.has(level.toLowerCase())
    );
  }

  private async readAssignments(
    resource: Resource,
    siteUrl: string,
    target: RoleAssignmentTarget,
    scope: JobScope
  ): Promise<RoleAssignment[] | null> {
    try {
      return await this.content.getRoleAssignments(siteUrl, target);
    } catch (error) {
      if (!(error instanceof ResolutionError)) {
        throw error;
      }
      scope.log.error(
        { resourceId: resource.id, url: resource.url, error: error.message },
        "Role assignments could not be read"
      );
      scope.counts.failedNodes += 1;
      return null;
    }
  }

  /**
   * Resolve, dedupe, decorate with share metadata and sort
   */
  private async flatten(
    resource: Resource,
    siteUrl: string,
    assignments: RoleAssignment[],
    scope: JobScope
  ): Promise<AccessEntry[]> {
    const entries: AccessEntry[] = [];

    for (const assignment of assignments) {
      const levels = this.substantiveLevels(assignment);
      if (levels.length === 0) {
        continue;
      }

      const principal = assignment.principal;
      let members: ResolvedMember[];
      if (principal.kind === "User") {
        if (matchesIgnoredAccount(principal.loginName, this.settings.ignoreAccounts)) {
          continue;
        }
        members = [
          {
            principal,
            nestingLevel: 0,
            viaGroup: "",
            viaGroupId: "",
            viaGroupKind: "",
            viaGroupChain: [],
            parentGroup: "",
            assignmentType: "Direct",
            resolution: "Resolved",
          },
        ];
      } else {
        members = await this.resolver.resolve(principal, siteUrl, scope.context, scope.log);
      }

      for (const member of members) {
        for (const level of levels) {
          entries.push(toEntry(resource, member, level));
        }
      }
    }

    const unique = dedupeEntries(entries);
    const decorated = await this.applyShares(unique, resource.shares ?? [], siteUrl, scope);
    decorated.sort(compareEntries);
    this.count(resource, assignments, decorated, scope);
    return decorated;
  }

  private async applyShares(
    entries: AccessEntry[],
    shares: ShareRecord[],
    siteUrl: string,
    scope: JobScope
  ): Promise<AccessEntry[]> {
    if (shares.length === 0) {
      return entries;
    }

    const byLogin = new Map(shares.map((share) => [share.loginName.toLowerCase(), share]));
    const result: AccessEntry[] = [];
    for (const entry of entries) {
      const share = byLogin.get(entry.loginName.toLowerCase());
      if (!share) {
        result.push(entry);
        continue;
      }
      result.push({
        ...entry,
        sharedAt: share.sharedAt,
        sharedByLogin: share.sharedByLogin,
        sharedByDisplayName: await this.displayName(share.sharedByLogin, siteUrl, scope),
      });
    }
    return result;
  }

  /**
   * Display name of a user, once per job
   */
  private async displayName(loginName: string, siteUrl: string, scope: JobScope): Promise<string> {
    if (!loginName) {
      return "";
    }

    const key = loginName.toLowerCase();
    if (scope.context.userDisplayNames.has(key)) {
      return scope.context.userDisplayNames.get(key) ?? "";
    }

    let name: string | null;
    try {
      name = await this.content.getUserDisplayName(siteUrl, loginName);
    } catch (error) {
      if (!(error instanceof ResolutionError)) {
        throw error;
      }
      scope.log.warn({ loginName, error: error.message }, "User display name lookup failed");
      name = null;
    }
    scope.context.userDisplayNames.set(key, name);
    return name ?? "";
  }

  private count(
    resource: Resource,
    assignments: RoleAssignment[],
    entries: AccessEntry[],
    scope: JobScope
  ): void {
    const external = new Set<string>();
    for (const entry of entries) {
      if (entry.principalKind === "User" && isExternalLogin(entry.loginName)) {
        external.add(entry.loginName.toLowerCase());
      }
    }
    scope.counts.externalUsers += external.size;

    const everyone = assignments.some(
      (assignment) =>
        isEveryoneAudience(assignment.principal) && this.substantiveLevels(assignment).length > 0
    );
    if (everyone) {
      scope.counts.sharedWithEveryone += 1;
      scope.log.debug({ resourceId: resource.id, url: resource.url }, "Shared with everyone");
    }
  }
}
