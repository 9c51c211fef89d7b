/**
 * Content Walker Service
 * Depth-first walk over sites, lists and items; flags nodes with unique permissions
 */

import type { Logger } from "../config/logger.js";
import type { ListKind, ScannerSettings } from "../config/scanner-settings.js";
import {
  itemResourceId,
  listKindToResourceKind,
  type AccessRow,
  type BrokenNodeRow,
  type ListInfo,
  type ListItemInfo,
  type OutputBatch,
  type Resource,
  type SiteContentRow,
  type SiteContentType,
  type SiteInfo,
  type WalkCursor,
} from "../types/audit.js";
import type { ContentServiceClient } from "../types/clients.js";
import { ResolutionError } from "../utils/errors.js";
import { comparablePath, isWithinFolder } from "../utils/url.js";
import type { PermissionAccessorService } from "./permission-accessor.service.js";
import type { JobScope } from "./resolution-context.js";
import type { ClassifiedTarget } from "./url-classifier.service.js";

export type WalkerSettings = Pick<
  ScannerSettings,
  | "listTemplates"
  | "ignoreLists"
  | "allowedSystemLists"
  | "includeSubsites"
  | "maxSubsiteDepth"
  | "leafSiteUrls"
  | "pageSize"
>;

/**
 * Built-in lists the platform creates in every site
 */
export const SYSTEM_LISTS: readonly string[] = [
  "appdata",
  "appfiles",
  "Composed Looks",
  "Converted Forms",
  "Form Templates",
  "List Template Gallery",
  "Master Page Gallery",
  "Microfeed",
  "Preservation Hold Library",
  "Site Assets",
  "Site Collection Documents",
  "Site Collection Images",
  "Solution Gallery",
  "Style Library",
  "TaxonomyHiddenList",
  "Theme Gallery",
  "User Information List",
  "Web Part Gallery",
];

export type BoundaryKind = "item" | "list" | "site";

/**
 * How the walker hands rows and progress to its driver
 */
export interface WalkHooks {
  emit(rows: Partial<OutputBatch>): void;
  /** Called after every item, list and site-level phase with the position reached */
  boundary(cursor: WalkCursor, kind: BoundaryKind): Promise<void>;
}

export interface QualifyingList {
  list: ListInfo;
  kind: ListKind;
}

const CONTENT_TYPES: Record<ListKind, SiteContentType> = {
  List: "LIST",
  DocumentLibrary: "LIBRARY",
  SitePages: "SITEPAGES",
};

interface WalkState {
  target: ClassifiedTarget;
  resume: WalkCursor;
  scope: JobScope;
  hooks: WalkHooks;
  /** Depth-first index of the next site */
  nextSiteIndex: number;
}

export class ContentWalkerService {
  private readonly systemLists: Set<string>;
  private readonly allowedSystemLists: Set<string>;
  private readonly ignoredLists: Set<string>;
  private readonly leafSites: Set<string>;

  constructor(
    private readonly content: ContentServiceClient,
    private readonly accessor: PermissionAccessorService,
    private readonly settings: WalkerSettings
  ) {
    const lower = (values: readonly string[]) => new Set(values.map((value) => value.toLowerCase()));
    this.systemLists = lower(SYSTEM_LISTS);
    this.allowedSystemLists = lower(settings.allowedSystemLists);
    this.ignoredLists = lower(settings.ignoreLists);
    this.leafSites = new Set(settings.leafSiteUrls.map((url) => this.siteKey(url)));
  }

  /**
   * Lists that are scanned, in service order
   */
  qualifyingLists(lists: ListInfo[]): QualifyingList[] {
    const result: QualifyingList[] = [];
    for (const list of lists) {
      const kind = this.settings.listTemplates[String(list.baseTemplate)];
      if (!kind || list.hidden) {
        continue;
      }
      const title = list.title.toLowerCase();
      if (this.ignoredLists.has(title)) {
        continue;
      }
      if (this.systemLists.has(title) && !this.allowedSystemLists.has(title)) {
        continue;
      }
      result.push({ list, kind });
    }
    return result;
  }

  /**
   * Walk a classified target from a resume position
   */
  async walk(
    target: ClassifiedTarget,
    resume: WalkCursor,
    scope: JobScope,
    hooks: WalkHooks
  ): Promise<void> {
    const state: WalkState = { target, resume, scope, hooks, nextSiteIndex: 0 };

    if (target.kind === "Library" || target.kind === "Folder") {
      await this.walkSingleList(state);
      return;
    }

    await this.walkSite(target.site, 0, state);
  }

  // ===========================================================================
  // SITES
  // ===========================================================================

  private async walkSite(site: SiteInfo, depth: number, state: WalkState): Promise<void> {
    const siteIndex = state.nextSiteIndex++;
    const { resume, scope } = state;
    const log = scope.log.child({ siteUrl: site.url });

    if (siteIndex >= resume.siteIndex) {
      const resuming = siteIndex === resume.siteIndex;
      const lists = this.qualifyingLists(await this.readLists(site, log));

      if (!(resuming && resume.siteLevelDone)) {
        await this.processSiteLevel(site, depth, lists, siteIndex, state);
      }

      const lastDone = resuming ? resume.lastListIndex : -1;
      for (const [listIndex, entry] of lists.entries()) {
        if (listIndex <= lastDone) {
          continue;
        }
        const afterId = resuming && listIndex === lastDone + 1 ? resume.lastItemId : 0;
        const cursor = (lastItemId: number): WalkCursor => ({
          siteIndex,
          siteLevelDone: true,
          lastListIndex: listIndex - 1,
          lastItemId,
        });
        await this.walkList(site, entry, afterId, cursor, state, undefined);
        await state.hooks.boundary(
          { siteIndex, siteLevelDone: true, lastListIndex: listIndex, lastItemId: 0 },
          "list"
        );
      }
    }

    if (!this.settings.includeSubsites || depth >= this.settings.maxSubsiteDepth) {
      return;
    }
    if (this.leafSites.has(this.siteKey(site.url))) {
      log.debug("Leaf site, subsites not scanned");
      return;
    }

    for (const subsite of await this.readSubsites(site, log)) {
      await this.walkSite(subsite, depth + 1, state);
    }
  }

  private async processSiteLevel(
    site: SiteInfo,
    depth: number,
    lists: QualifyingList[],
    siteIndex: number,
    state: WalkState
  ): Promise<void> {
    const { scope, hooks } = state;
    const resource: Resource = {
      id: site.id,
      kind: depth === 0 && state.target.kind === "Site" ? "Site" : "Subsite",
      title: site.title,
      url: site.url,
      hasUniqueRoleAssignments: site.hasUniqueRoleAssignments,
    };

    const siteContents: SiteContentRow[] = [];
    const brokenNodes: BrokenNodeRow[] = [];
    const accessEntries: AccessRow[] = [];

    if (depth > 0) {
      siteContents.push({
        jobIndex: scope.jobIndex,
        resourceId: site.id,
        type: "SUBSITE",
        title: site.title,
        url: site.url,
      });
    }

    for (const { list, kind } of lists) {
      siteContents.push({
        jobIndex: scope.jobIndex,
        resourceId: list.id,
        type: CONTENT_TYPES[kind],
        title: list.title,
        url: this.absolute(site, list.rootFolderUrl),
      });
    }

    // Inheritance can only be broken below the scanned root
    if (depth > 0 && site.hasUniqueRoleAssignments) {
      const node = await this.accessor.processNode(resource, site.url, { kind: "site" }, scope);
      brokenNodes.push(node.brokenNode);
      accessEntries.push(...node.accessRows);
    }

    // Inheriting subsites share their parent's groups and users
    const access =
      depth === 0 || site.hasUniqueRoleAssignments
        ? await this.accessor.processSite(resource, scope)
        : { siteGroups: [], siteUsers: [] };

    scope.counts.sitesScanned += 1;
    hooks.emit({
      siteContents,
      siteGroups: access.siteGroups,
      siteUsers: access.siteUsers,
      brokenNodes,
      accessEntries,
    });
    await hooks.boundary(
      { siteIndex, siteLevelDone: true, lastListIndex: -1, lastItemId: 0 },
      "site"
    );
  }

  private async walkSingleList(state: WalkState): Promise<void> {
    const { target, resume, scope, hooks } = state;
    const list = target.list;
    if (!list) {
      return;
    }

    const kind = this.settings.listTemplates[String(list.baseTemplate)] ?? "DocumentLibrary";

    if (!resume.siteLevelDone) {
      hooks.emit({
        siteContents: [
          {
            jobIndex: scope.jobIndex,
            resourceId: list.id,
            type: CONTENT_TYPES[kind],
            title: list.title,
            url: this.absolute(target.site, list.rootFolderUrl),
          },
        ],
      });
      await hooks.boundary({ siteIndex: 0, siteLevelDone: true, lastListIndex: -1, lastItemId: 0 }, "site");
    }

    if (resume.lastListIndex >= 0) {
      return;
    }

    const cursor = (lastItemId: number): WalkCursor => ({
      siteIndex: 0,
      siteLevelDone: true,
      lastListIndex: -1,
      lastItemId,
    });
    await this.walkList(target.site, { list, kind }, resume.lastItemId, cursor, state, target.folderPath);
    await hooks.boundary({ siteIndex: 0, siteLevelDone: true, lastListIndex: 0, lastItemId: 0 }, "list");
  }

  // ===========================================================================
  // LISTS AND ITEMS
  // ===========================================================================

  /**
   * Flag the list if needed, then page through its items by ID
   * @param afterId - Items up to this ID were handled before a restart
   * @param folderPath - Restricts items to this folder and everything under it
   */
  private async walkList(
    site: SiteInfo,
    entry: QualifyingList,
    afterId: number,
    cursor: (lastItemId: number) => WalkCursor,
    state: WalkState,
    folderPath: string | undefined
  ): Promise<void> {
    const { scope, hooks } = state;
    const { list, kind } = entry;
    const log = scope.log.child({ listId: list.id, list: list.title });

    if (afterId === 0 && !folderPath && list.hasUniqueRoleAssignments) {
      const resource: Resource = {
        id: list.id,
        kind: listKindToResourceKind(kind),
        title: list.title,
        url: this.absolute(site, list.rootFolderUrl),
        hasUniqueRoleAssignments: true,
      };
      const node = await this.accessor.processNode(
        resource,
        site.url,
        { kind: "list", listId: list.id },
        scope
      );
      hooks.emit({ brokenNodes: [node.brokenNode], accessEntries: node.accessRows });
    }

    let lastId = afterId;
    for (;;) {
      let items: ListItemInfo[];
      try {
        items = await this.content.getListItems(site.url, list.id, {
          afterId: lastId,
          pageSize: this.settings.pageSize,
          includeShareDetails: kind !== "List",
        });
      } catch (error) {
        if (!(error instanceof ResolutionError)) {
          throw error;
        }
        log.error({ jobUrl: scope.jobUrl, error: error.message }, "List items could not be read, skipping list");
        scope.counts.failedLists += 1;
        return;
      }

      for (const item of items) {
        lastId = item.id;
        if (folderPath && !isWithinFolder(item.fileRef, folderPath)) {
          continue;
        }

        scope.counts.itemsScanned += 1;
        if (item.hasUniqueRoleAssignments) {
          const resource: Resource = {
            id: itemResourceId(list.id, item.id),
            kind: item.isFolder ? "Folder" : "Item",
            title: item.fileLeafRef,
            url: this.absolute(site, item.fileRef),
            hasUniqueRoleAssignments: true,
            ...(item.shares && { shares: item.shares }),
          };
          const node = await this.accessor.processNode(
            resource,
            site.url,
            { kind: "item", listId: list.id, itemId: item.id },
            scope
          );
          hooks.emit({ brokenNodes: [node.brokenNode], accessEntries: node.accessRows });
        }
        await hooks.boundary(cursor(item.id), "item");
      }

      if (items.length < this.settings.pageSize) {
        break;
      }
    }

    scope.counts.listsScanned += 1;
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private async readLists(site: SiteInfo, log: Logger): Promise<ListInfo[]> {
    try {
      return await this.content.getLists(site.url);
    } catch (error) {
      if (!(error instanceof ResolutionError)) {
        throw error;
      }
      log.error({ error: error.message }, "Lists could not be read");
      return [];
    }
  }

  private async readSubsites(site: SiteInfo, log: Logger): Promise<SiteInfo[]> {
    try {
      return await this.content.getSubsites(site.url);
    } catch (error) {
      if (!(error instanceof ResolutionError)) {
        throw error;
      }
      log.error({ error: error.message }, "Subsites could not be read");
      return [];
    }
  }

  private absolute(site: SiteInfo, serverRelativeUrl: string): string {
    return `${new URL(site.url).origin}${serverRelativeUrl}`;
  }

  private siteKey(url: string): string {
    try {
      const parsed = new URL(url);
      return `${parsed.host.toLowerCase()}${comparablePath(parsed.pathname)}`;
    } catch {
      return url.toLowerCase();
    }
  }
}
