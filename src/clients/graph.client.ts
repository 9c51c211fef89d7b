/**
 * Microsoft Graph directory client
 * Group lookups and direct membership with @odata.nextLink paging
 */

import { z } from "zod";
import type { Logger } from "../config/logger.js";
import type { DirectoryGroupKind, DirectoryGroupPrincipal } from "../types/audit.js";
import type {
  DirectoryMember,
  DirectoryServiceClient,
  TokenProvider,
} from "../types/clients.js";
import type { RetryPolicy } from "../utils/retry.js";
import { joinUrl } from "../utils/url.js";
import { HttpJsonClient } from "./http-client.js";

const GroupSchema = z.object({
  id: z.string(),
  displayName: z.string().nullable().default(""),
  mail: z.string().nullable().optional(),
  groupTypes: z.array(z.string()).nullable().optional(),
});

const MemberSchema = z.object({
  "@odata.type": z.string(),
  id: z.string(),
  displayName: z.string().nullable().optional(),
  userPrincipalName: z.string().nullable().optional(),
  mail: z.string().nullable().optional(),
  groupTypes: z.array(z.string()).nullable().optional(),
});

const MembersPageSchema = z.object({
  value: z.array(MemberSchema),
  "@odata.nextLink": z.string().optional(),
});

type GraphGroup = z.infer<typeof GroupSchema>;

function groupKind(groupTypes: string[] | null | undefined): DirectoryGroupKind {
  return groupTypes?.includes("Unified") ? "M365Group" : "SecurityGroup";
}

/**
 * Claim the content service uses for the same group, so logins line up across sources
 */
export function directoryGroupLogin(kind: DirectoryGroupKind, id: string): string {
  return kind === "M365Group"
    ? `c:0o.c|federateddirectoryclaimprovider|${id}`
    : `c:0t.c|tenant|${id}`;
}

/**
 * Membership claim of a directory user
 */
export function userLogin(userPrincipalName: string): string {
  return `i:0#.f|membership|${userPrincipalName.toLowerCase()}`;
}

function toGroupPrincipal(group: Pick<GraphGroup, "id" | "displayName" | "mail" | "groupTypes">): DirectoryGroupPrincipal {
  const kind = groupKind(group.groupTypes);
  return {
    kind,
    id: group.id,
    loginName: directoryGroupLogin(kind, group.id),
    displayName: group.displayName ?? "",
    email: group.mail ?? "",
  };
}

export interface GraphClientOptions {
  baseUrl: string;
  getToken: TokenProvider;
  policy: RetryPolicy;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

export class GraphDirectoryClient implements DirectoryServiceClient {
  private readonly http: HttpJsonClient;
  private readonly logger: Logger;

  constructor(private readonly options: GraphClientOptions) {
    this.logger = options.logger;
    this.http = new HttpJsonClient({
      service: "Graph",
      getToken: options.getToken,
      policy: options.policy,
      logger: options.logger,
      ...(options.fetchImpl && { fetchImpl: options.fetchImpl }),
    });
  }

  async getGroup(groupId: string): Promise<DirectoryGroupPrincipal | null> {
    const group = await this.http.getJson(
      joinUrl(
        this.options.baseUrl,
        `groups/${encodeURIComponent(groupId)}?$select=id,displayName,mail,groupTypes`
      ),
      GroupSchema,
      "get group"
    );
    return group ? toGroupPrincipal(group) : null;
  }

  /**
   * Direct members of a group; devices, service principals and contacts are skipped
   * A group the directory does not know has no members
   */
  async getGroupMembers(groupId: string): Promise<DirectoryMember[]> {
    const members: DirectoryMember[] = [];
    let next: string | undefined = joinUrl(
      this.options.baseUrl,
      `groups/${encodeURIComponent(groupId)}/members?$select=id,displayName,userPrincipalName,mail,groupTypes&$top=999`
    );

    while (next) {
      const page: z.infer<typeof MembersPageSchema> | null = await this.http.getJson(
        next,
        MembersPageSchema,
        "get group members"
      );
      if (!page) {
        break;
      }

      for (const member of page.value) {
        const type = member["@odata.type"];
        if (type === "#microsoft.graph.user") {
          const upn = member.userPrincipalName ?? member.mail ?? "";
          members.push({
            kind: "User",
            id: member.id,
            loginName: upn ? userLogin(upn) : "",
            displayName: member.displayName ?? "",
            email: member.mail ?? "",
          });
        } else if (type === "#microsoft.graph.group") {
          members.push(
            toGroupPrincipal({
              id: member.id,
              displayName: member.displayName ?? "",
              mail: member.mail,
              groupTypes: member.groupTypes,
            })
          );
        } else {
          this.logger.debug({ groupId, memberId: member.id, type }, "Skipping non-account member");
        }
      }

      next = page["@odata.nextLink"];
    }

    return members;
  }
}
