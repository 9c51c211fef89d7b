/**
 * Group Resolution Service
 * Flattens site groups and directory groups down to individual accounts
 */

import type { Logger } from "../config/logger.js";
import type { ScannerSettings } from "../config/scanner-settings.js";
import {
  isDirectoryGroup,
  type AssignmentType,
  type GroupPrincipal,
  type Principal,
  type ResolutionStatus,
  type ResolvedMember,
} from "../types/audit.js";
import type { ContentServiceClient, DirectoryServiceClient } from "../types/clients.js";
import { ResolutionError } from "../utils/errors.js";
import {
  groupKey,
  isExcludedGroup,
  matchesIgnoredAccount,
} from "../utils/principal-filters.js";
import type { ResolutionContext } from "./resolution-context.js";

export type ResolutionSettings = Pick<
  ScannerSettings,
  "maxGroupNestingLevel" | "doNotResolveGroups" | "ignoreAccounts"
>;

/**
 * One unit of pending work
 */
interface Frame {
  group: GroupPrincipal;
  nestingLevel: number;
  /** Display name of the group this one was found in */
  parentGroup: string;
  /** Groups above this one, root first */
  ancestors: GroupPrincipal[];
}

export class GroupResolutionService {
  constructor(
    private readonly content: ContentServiceClient,
    private readonly directory: DirectoryServiceClient,
    private readonly settings: ResolutionSettings,
    private readonly logger: Logger
  ) {}

  /**
   * Resolve a group to leaf accounts with provenance
   *
   * Groups are expanded breadth-first, so a group reached by several paths is
   * expanded once, at its shallowest nesting level. Accounts are emitted at the
   * nesting level of the group that holds them; groups that cannot or may not
   * be expanded yield one placeholder each.
   *
   * @param group - Group granted on the resource
   * @param siteUrl - Site whose groups are being resolved
   * @param context - Job caches
   * @param log - Job-scoped logger
   */
  async resolve(
    group: GroupPrincipal,
    siteUrl: string,
    context: ResolutionContext,
    log: Logger = this.logger
  ): Promise<ResolvedMember[]> {
    const results: ResolvedMember[] = [];
    const visited = new Set<string>();
    const viaSharingLink = group.kind === "SiteGroup" && group.isSharingLink;
    const assignmentType = (nestingLevel: number): AssignmentType => {
      if (viaSharingLink) {
        return "SharingLink";
      }
      return nestingLevel === 0 ? "Direct" : "Group";
    };

    const queue: Frame[] = [{ group, nestingLevel: 0, parentGroup: "", ancestors: [] }];

    let frame = queue.shift();
    while (frame) {
      const current = await this.describe(frame.group, context, log);
      const key = groupKey(current);
      const chain = [...frame.ancestors.map((ancestor) => ancestor.displayName), current.displayName];

      const placeholder = (resolution: ResolutionStatus, at: Frame): ResolvedMember => ({
        principal: current,
        nestingLevel: at.nestingLevel,
        viaGroup: current.displayName,
        viaGroupId: current.id,
        viaGroupKind: current.kind,
        viaGroupChain: chain,
        parentGroup: at.parentGroup,
        assignmentType: assignmentType(at.nestingLevel),
        resolution,
      });

      if (visited.has(key)) {
        if (frame.ancestors.some((ancestor) => groupKey(ancestor) === key)) {
          log.warn(
            { groupId: current.id, group: current.displayName, chain },
            "Group membership cycle detected"
          );
        }
      } else {
        visited.add(key);

        if (frame.nestingLevel > this.settings.maxGroupNestingLevel) {
          results.push(placeholder("DepthLimited", frame));
        } else if (isExcludedGroup(current, this.settings.doNotResolveGroups)) {
          results.push(placeholder("Excluded", frame));
        } else {
          const members = await this.loadMembers(current, siteUrl, context, log);
          if (members === null) {
            results.push(placeholder("Failed", frame));
          } else {
            const nested: Frame[] = [];
            for (const member of members) {
              if (member.kind === "User") {
                if (matchesIgnoredAccount(member.loginName, this.settings.ignoreAccounts)) {
                  continue;
                }
                results.push({
                  principal: member,
                  nestingLevel: frame.nestingLevel,
                  viaGroup: current.displayName,
                  viaGroupId: current.id,
                  viaGroupKind: current.kind,
                  viaGroupChain: chain,
                  parentGroup: frame.parentGroup,
                  assignmentType: assignmentType(frame.nestingLevel),
                  resolution: "Resolved",
                });
              } else {
                nested.push({
                  group: member,
                  nestingLevel: frame.nestingLevel + 1,
                  parentGroup: current.displayName,
                  ancestors: [...frame.ancestors, current],
                });
              }
            }
            queue.push(...nested);
          }
        }
      }

      frame = queue.shift();
    }

    return results;
  }

  /**
   * Direct members of a group from the job caches, fetching on a miss
   * @returns null when the lookup failed
   */
  private async loadMembers(
    group: GroupPrincipal,
    siteUrl: string,
    context: ResolutionContext,
    log: Logger
  ): Promise<Principal[] | null> {
    try {
      if (group.kind === "SiteGroup") {
        const cached = context.siteGroupMembers.get(group.id);
        if (cached) {
          return cached;
        }
        const members = await this.content.getSiteGroupMembers(siteUrl, group.id);
        context.siteGroupMembers.set(group.id, members);
        return members;
      }

      const cached = await context.directoryGroups.get(group.id);
      if (cached) {
        return cached;
      }
      const members = await this.directory.getGroupMembers(group.id);
      await context.directoryGroups.set(group.id, members);
      return members;
    } catch (error) {
      if (!(error instanceof ResolutionError)) {
        throw error;
      }
      log.error(
        { groupId: group.id, group: group.displayName, kind: group.kind, error: error.message },
        "Group members could not be read"
      );
      return null;
    }
  }

  /**
   * Fill in the display name of a directory group the content service left blank
   */
  private async describe(
    group: GroupPrincipal,
    context: ResolutionContext,
    log: Logger
  ): Promise<GroupPrincipal> {
    if (!isDirectoryGroup(group) || group.displayName) {
      return group;
    }

    let found = context.groupObjects.get(group.id);
    if (found === undefined) {
      try {
        found = await this.directory.getGroup(group.id);
      } catch (error) {
        if (!(error instanceof ResolutionError)) {
          throw error;
        }
        log.warn({ groupId: group.id, error: error.message }, "Group object lookup failed");
        found = null;
      }
      context.groupObjects.set(group.id, found);
    }

    return { ...group, displayName: found?.displayName || group.id };
  }
}
