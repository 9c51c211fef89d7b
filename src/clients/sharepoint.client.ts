/**
 * SharePoint REST content client
 * Implements ContentServiceClient against the _api/web endpoints
 */

import { z } from "zod";
import type { Logger } from "../config/logger.js";
import type {
  ListInfo,
  ListItemInfo,
  Principal,
  RoleAssignment,
  RoleAssignmentTarget,
  ShareRecord,
  SiteInfo,
} from "../types/audit.js";
import type { ContentServiceClient, TokenProvider } from "../types/clients.js";
import type { RetryPolicy } from "../utils/retry.js";
import { comparablePath, joinUrl } from "../utils/url.js";
import { HttpJsonClient } from "./http-client.js";

// =============================================================================
// RESPONSE SCHEMAS (odata=nometadata)
// =============================================================================

const WebSchema = z.object({
  Id: z.string(),
  Title: z.string(),
  Url: z.string(),
  ServerRelativeUrl: z.string(),
  HasUniqueRoleAssignments: z.boolean().default(false),
});

const ListSchema = z.object({
  Id: z.string(),
  Title: z.string(),
  BaseTemplate: z.number(),
  Hidden: z.boolean().default(false),
  HasUniqueRoleAssignments: z.boolean().default(false),
  RootFolder: z.object({ ServerRelativeUrl: z.string() }).optional(),
});

const ItemSchema = z.object({
  ID: z.number(),
  FileRef: z.string().default(""),
  FileLeafRef: z.string().default(""),
  FSObjType: z.union([z.number(), z.string()]).default(0),
  HasUniqueRoleAssignments: z.boolean().default(false),
  SharedWithDetails: z.string().nullable().optional(),
});

const MemberSchema = z.object({
  Id: z.number(),
  Title: z.string().nullable().default(""),
  LoginName: z.string().nullable().default(""),
  PrincipalType: z.number(),
  Email: z.string().nullable().optional(),
  OwnerTitle: z.string().nullable().optional(),
});

const RoleAssignmentSchema = z.object({
  Member: MemberSchema,
  RoleDefinitionBindings: z.array(z.object({ Name: z.string() })).default([]),
});

const SharedWithDetailsSchema = z.record(
  z.object({
    DateTime: z.string().nullable().optional(),
    LoginName: z.string().nullable().optional(),
  })
);

function collection<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    value: z.array(item),
    "odata.nextLink": z.string().optional(),
  });
}

interface ODataCollection<T> {
  value: T[];
  "odata.nextLink"?: string | undefined;
}

type Member = z.infer<typeof MemberSchema>;

// =============================================================================
// PRINCIPAL MAPPING
// =============================================================================

/** SharePoint PrincipalType values */
const PrincipalType = {
  User: 1,
  DistributionList: 2,
  SecurityGroup: 4,
  SharePointGroup: 8,
} as const;

const EVERYONE_CLAIMS = ["c:0(.s|true", "c:0-.f|rolemanager|spo-grid-all-users"];

/**
 * Map a SharePoint member to a typed principal.
 * Directory groups arrive as claims: c:0t.c|tenant|<id> for security groups,
 * c:0o.c|federateddirectoryclaimprovider|<id>[_o] for M365 groups.
 */
export function toPrincipal(member: Member): Principal {
  const loginName = member.LoginName ?? "";
  const displayName = member.Title ?? "";
  const email = member.Email ?? "";

  if (member.PrincipalType === PrincipalType.SharePointGroup) {
    return {
      kind: "SiteGroup",
      id: String(member.Id),
      loginName,
      displayName,
      email,
      ownerTitle: member.OwnerTitle ?? "",
      isSharingLink: displayName.startsWith("SharingLinks."),
    };
  }

  if (
    member.PrincipalType === PrincipalType.SecurityGroup ||
    member.PrincipalType === PrincipalType.DistributionList
  ) {
    const lowered = loginName.toLowerCase();
    if (EVERYONE_CLAIMS.some((claim) => lowered.startsWith(claim))) {
      return {
        kind: "User",
        id: String(member.Id),
        loginName,
        displayName,
        email,
        isEveryone: true,
      };
    }

    const parts = loginName.split("|");
    const provider = parts[1]?.toLowerCase();
    const rawId = parts.length >= 3 ? parts[parts.length - 1] : undefined;
    if (rawId && (provider === "tenant" || provider === "federateddirectoryclaimprovider")) {
      return {
        kind: provider === "tenant" ? "SecurityGroup" : "M365Group",
        id: rawId.endsWith("_o") ? rawId.slice(0, -2) : rawId,
        loginName,
        displayName,
        email,
      };
    }
  }

  return {
    kind: "User",
    id: String(member.Id),
    loginName,
    displayName,
    email,
  };
}

/**
 * "/Date(1700000000000)/" or ISO to ISO
 */
function toIsoDate(value: string | null | undefined): string {
  if (!value) {
    return "";
  }
  const match = /\/Date\((-?\d+)\)\//.exec(value);
  const date = match?.[1] ? new Date(Number(match[1])) : new Date(value);
  return Number.isNaN(date.getTime()) ? value : date.toISOString();
}

/**
 * Parse the SharedWithDetails JSON blob of a library item
 */
export function parseSharedWithDetails(raw: string | null | undefined): ShareRecord[] {
  if (!raw) {
    return [];
  }
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return [];
  }
  const parsed = SharedWithDetailsSchema.safeParse(payload);
  if (!parsed.success) {
    return [];
  }
  return Object.entries(parsed.data).map(([loginName, detail]) => ({
    loginName,
    sharedAt: toIsoDate(detail.DateTime),
    sharedByLogin: detail.LoginName ?? "",
  }));
}

function odataString(value: string): string {
  return `'${encodeURIComponent(value.replace(/'/g, "''"))}'`;
}

// =============================================================================
// CLIENT
// =============================================================================

export interface SharePointClientOptions {
  getToken: TokenProvider;
  policy: RetryPolicy;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

export class SharePointContentClient implements ContentServiceClient {
  private readonly http: HttpJsonClient;

  constructor(options: SharePointClientOptions) {
    this.http = new HttpJsonClient({
      service: "SharePoint",
      getToken: options.getToken,
      policy: options.policy,
      logger: options.logger,
      headers: { Accept: "application/json;odata=nometadata" },
      ...(options.fetchImpl && { fetchImpl: options.fetchImpl }),
    });
  }

  async connect(siteUrl: string): Promise<SiteInfo | null> {
    const web = await this.http.getJson(
      joinUrl(
        siteUrl,
        "_api/web?$select=Id,Title,Url,ServerRelativeUrl,HasUniqueRoleAssignments"
      ),
      WebSchema,
      "connect"
    );
    if (!web) {
      return null;
    }
    // The endpoint answers for the nearest web above the path; only an exact match is a site
    if (comparablePath(new URL(web.Url).pathname) !== comparablePath(new URL(siteUrl).pathname)) {
      return null;
    }
    return this.toSiteInfo(web);
  }

  async getSubsites(siteUrl: string): Promise<SiteInfo[]> {
    const webs = await this.getCollection(
      joinUrl(
        siteUrl,
        "_api/web/webs?$select=Id,Title,Url,ServerRelativeUrl,HasUniqueRoleAssignments"
      ),
      collection(WebSchema),
      "get subsites"
    );
    return webs.map((web) => this.toSiteInfo(web));
  }

  async getLists(siteUrl: string): Promise<ListInfo[]> {
    const lists = await this.getCollection(
      joinUrl(
        siteUrl,
        "_api/web/lists?$select=Id,Title,BaseTemplate,Hidden,HasUniqueRoleAssignments,RootFolder/ServerRelativeUrl&$expand=RootFolder"
      ),
      collection(ListSchema),
      "get lists"
    );
    return lists.map((list) => this.toListInfo(list));
  }

  async getListByUrl(
    siteUrl: string,
    serverRelativeUrl: string
  ): Promise<ListInfo | null> {
    const list = await this.http.getJson(
      joinUrl(
        siteUrl,
        `_api/web/GetList(@a)?@a=${odataString(serverRelativeUrl)}&$select=Id,Title,BaseTemplate,Hidden,HasUniqueRoleAssignments,RootFolder/ServerRelativeUrl&$expand=RootFolder`
      ),
      ListSchema,
      "get list by url"
    );
    return list ? this.toListInfo(list) : null;
  }

  async folderExists(siteUrl: string, serverRelativeUrl: string): Promise<boolean> {
    const folder = await this.http.getJson(
      joinUrl(
        siteUrl,
        `_api/web/GetFolderByServerRelativePath(decodedurl=@a)?@a=${odataString(serverRelativeUrl)}&$select=Exists`
      ),
      z.object({ Exists: z.boolean() }),
      "folder exists"
    );
    return folder?.Exists ?? false;
  }

  async getListItems(
    siteUrl: string,
    listId: string,
    page: { afterId: number; pageSize: number; includeShareDetails?: boolean }
  ): Promise<ListItemInfo[]> {
    const fields = ["ID", "FileRef", "FileLeafRef", "FSObjType", "HasUniqueRoleAssignments"];
    if (page.includeShareDetails) {
      fields.push("SharedWithDetails");
    }
    const result = await this.http.getJson(
      joinUrl(
        siteUrl,
        `_api/web/lists(guid'${listId}')/items?$select=${fields.join(",")}&$filter=ID gt ${page.afterId}&$orderby=ID&$top=${page.pageSize}`
      ),
      collection(ItemSchema),
      "get list items"
    );
    return (result?.value ?? []).map((item) => {
      const shares = parseSharedWithDetails(item.SharedWithDetails);
      return {
        id: item.ID,
        fileRef: item.FileRef,
        fileLeafRef: item.FileLeafRef,
        isFolder: Number(item.FSObjType) === 1,
        hasUniqueRoleAssignments: item.HasUniqueRoleAssignments,
        ...(shares.length > 0 && { shares }),
      };
    });
  }

  async getRoleAssignments(
    siteUrl: string,
    target: RoleAssignmentTarget
  ): Promise<RoleAssignment[]> {
    let scope = "_api/web";
    if (target.kind === "list") {
      scope = `_api/web/lists(guid'${target.listId}')`;
    } else if (target.kind === "item") {
      scope = `_api/web/lists(guid'${target.listId}')/items(${target.itemId})`;
    }
    const assignments = await this.getCollection(
      joinUrl(siteUrl, `${scope}/roleassignments?$expand=Member,RoleDefinitionBindings`),
      collection(RoleAssignmentSchema),
      "get role assignments"
    );
    return assignments.map((assignment) => ({
      principal: toPrincipal(assignment.Member),
      permissionLevels: assignment.RoleDefinitionBindings.map((binding) => binding.Name),
    }));
  }

  async getSiteGroupMembers(siteUrl: string, groupId: string): Promise<Principal[]> {
    const members = await this.getCollection(
      joinUrl(
        siteUrl,
        `_api/web/sitegroups/getbyid(${groupId})/users?$select=Id,Title,LoginName,PrincipalType,Email`
      ),
      collection(MemberSchema),
      "get site group members"
    );
    return members.map(toPrincipal);
  }

  async getUserDisplayName(siteUrl: string, loginName: string): Promise<string | null> {
    const user = await this.http.getJson(
      joinUrl(siteUrl, `_api/web/siteusers(@v)?@v=${odataString(loginName)}&$select=Title`),
      z.object({ Title: z.string() }),
      "get user"
    );
    return user?.Title ?? null;
  }

  /**
   * Follow odata.nextLink until the collection is exhausted
   */
  private async getCollection<T>(
    url: string,
    schema: z.ZodType<ODataCollection<T>, z.ZodTypeDef, unknown>,
    operation: string
  ): Promise<T[]> {
    const results: T[] = [];
    let next: string | undefined = url;

    while (next) {
      const page: ODataCollection<T> | null = await this.http.getJson(next, schema, operation);
      if (!page) {
        break;
      }
      results.push(...page.value);
      next = page["odata.nextLink"];
    }

    return results;
  }

  private toSiteInfo(web: z.infer<typeof WebSchema>): SiteInfo {
    return {
      id: web.Id,
      title: web.Title,
      url: web.Url,
      serverRelativeUrl: web.ServerRelativeUrl,
      hasUniqueRoleAssignments: web.HasUniqueRoleAssignments,
    };
  }

  private toListInfo(list: z.infer<typeof ListSchema>): ListInfo {
    return {
      id: list.Id,
      title: list.Title,
      baseTemplate: list.BaseTemplate,
      hidden: list.Hidden,
      rootFolderUrl: list.RootFolder?.ServerRelativeUrl ?? "",
      hasUniqueRoleAssignments: list.HasUniqueRoleAssignments,
    };
  }
}
