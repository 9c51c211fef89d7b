import { describe, it, expect } from "vitest";
import {
  SharePointContentClient,
  parseSharedWithDetails,
  toPrincipal,
} from "../../src/clients/sharepoint.client.js";
import { ResolutionError } from "../../src/utils/errors.js";
import { fakeFetch, json, noDelayPolicy } from "../helpers/fetch.js";
import { silentLogger } from "../helpers/fakes.js";

const SITE = "https://contoso.sharepoint.com/sites/A";

function web(path: string, id: string) {
  return {
    Id: id,
    Title: id,
    Url: `https://contoso.sharepoint.com${path}`,
    ServerRelativeUrl: path,
    HasUniqueRoleAssignments: false,
  };
}

function client(handler: (url: string) => Response) {
  const { fetchImpl, requests } = fakeFetch(handler);
  const sharepoint = new SharePointContentClient({
    getToken: async () => "test-token",
    policy: noDelayPolicy,
    logger: silentLogger,
    fetchImpl,
  });
  return { sharepoint, requests };
}

describe("toPrincipal", () => {
  const member = { Id: 11, Title: "Visitors", LoginName: "Visitors", PrincipalType: 8 };

  it("maps site groups and recognises sharing links", () => {
    expect(toPrincipal({ ...member, OwnerTitle: "Owners" })).toEqual({
      kind: "SiteGroup",
      id: "11",
      loginName: "Visitors",
      displayName: "Visitors",
      email: "",
      ownerTitle: "Owners",
      isSharingLink: false,
    });
    const link = toPrincipal({ ...member, Title: "SharingLinks.abc.OrganizationEdit" });
    expect(link.kind === "SiteGroup" && link.isSharingLink).toBe(true);
  });

  it("takes directory group ids from their claims", () => {
    expect(
      toPrincipal({ Id: 20, Title: "Engineering", LoginName: "c:0t.c|tenant|sg-1", PrincipalType: 4 })
    ).toMatchObject({ kind: "SecurityGroup", id: "sg-1" });
    expect(
      toPrincipal({
        Id: 21,
        Title: "Project X Owners",
        LoginName: "c:0o.c|federateddirectoryclaimprovider|m365-1_o",
        PrincipalType: 4,
      })
    ).toMatchObject({ kind: "M365Group", id: "m365-1" });
  });

  it("treats the everyone claims as a user flagged as everyone", () => {
    expect(
      toPrincipal({ Id: 3, Title: "Everyone", LoginName: "c:0(.s|true", PrincipalType: 4 })
    ).toEqual({
      kind: "User",
      id: "3",
      loginName: "c:0(.s|true",
      displayName: "Everyone",
      email: "",
      isEveryone: true,
    });
  });

  it("maps accounts and null fields", () => {
    expect(toPrincipal({ Id: 7, Title: null, LoginName: null, PrincipalType: 1, Email: null })).toEqual({
      kind: "User",
      id: "7",
      loginName: "",
      displayName: "",
      email: "",
    });
  });
});

describe("parseSharedWithDetails", () => {
  it("reads share dates in the legacy date format", () => {
    const raw = JSON.stringify({
      "i:0#.f|membership|bob@contoso.com": {
        DateTime: "/Date(1709287200000)/",
        LoginName: "i:0#.f|membership|alice@contoso.com",
      },
    });

    expect(parseSharedWithDetails(raw)).toEqual([
      {
        loginName: "i:0#.f|membership|bob@contoso.com",
        sharedAt: "2024-03-01T10:00:00.000Z",
        sharedByLogin: "i:0#.f|membership|alice@contoso.com",
      },
    ]);
  });

  it("ignores empty and unreadable values", () => {
    expect(parseSharedWithDetails(null)).toEqual([]);
    expect(parseSharedWithDetails("not json")).toEqual([]);
    expect(parseSharedWithDetails("[1, 2]")).toEqual([]);
  });
});

describe("SharePointContentClient", () => {
  it("connects to a site and sends the bearer token", async () => {
    const { sharepoint, requests } = client(() => json(web("/sites/A", "web-a")));

    const site = await sharepoint.connect(SITE);

    expect(site).toEqual({
      id: "web-a",
      title: "web-a",
      url: "https://contoso.sharepoint.com/sites/A",
      serverRelativeUrl: "/sites/A",
      hasUniqueRoleAssignments: false,
    });
    expect(requests[0]?.url).toBe(
      `${SITE}/_api/web?$select=Id,Title,Url,ServerRelativeUrl,HasUniqueRoleAssignments`
    );
    expect(requests[0]?.authorization).toBe("Bearer test-token");
  });

  it("does not accept the parent web as the requested site", async () => {
    const { sharepoint } = client(() => json(web("/sites/A", "web-a")));

    expect(await sharepoint.connect(`${SITE}/Shared Documents`)).toBeNull();
  });

  it("returns null when the site does not exist", async () => {
    const { sharepoint } = client(() => new Response("", { status: 404 }));

    expect(await sharepoint.connect(SITE)).toBeNull();
  });

  it("follows nextLink paging", async () => {
    const nextLink = `${SITE}/_api/web/webs?$skiptoken=2`;
    const { sharepoint, requests } = client((url) =>
      url === nextLink
        ? json({ value: [web("/sites/A/two", "web-2")] })
        : json({ value: [web("/sites/A/one", "web-1")], "odata.nextLink": nextLink })
    );

    const subsites = await sharepoint.getSubsites(SITE);

    expect(subsites.map((subsite) => subsite.id)).toEqual(["web-1", "web-2"]);
    expect(requests).toHaveLength(2);
  });

  it("pages items by id and reads folder flags and shares", async () => {
    const { sharepoint, requests } = client(() =>
      json({
        value: [
          { ID: 4, FileRef: "/sites/A/Docs/Sub", FileLeafRef: "Sub", FSObjType: "1", HasUniqueRoleAssignments: true },
          { ID: 5, FileRef: "/sites/A/Docs/a.docx", FileLeafRef: "a.docx", FSObjType: 0, SharedWithDetails: "" },
        ],
      })
    );

    const items = await sharepoint.getListItems(SITE, "list-1", {
      afterId: 3,
      pageSize: 2,
      includeShareDetails: true,
    });

    expect(items).toEqual([
      { id: 4, fileRef: "/sites/A/Docs/Sub", fileLeafRef: "Sub", isFolder: true, hasUniqueRoleAssignments: true },
      { id: 5, fileRef: "/sites/A/Docs/a.docx", fileLeafRef: "a.docx", isFolder: false, hasUniqueRoleAssignments: false },
    ]);
    expect(requests[0]?.url).toBe(
      `${SITE}/_api/web/lists(guid'list-1')/items?$select=ID,FileRef,FileLeafRef,FSObjType,HasUniqueRoleAssignments,SharedWithDetails&$filter=ID gt 3&$orderby=ID&$top=2`
    );
  });

  it("maps role assignments of an item", async () => {
    const { sharepoint, requests } = client(() =>
      json({
        value: [
          {
            Member: { Id: 7, Title: "Alice", LoginName: "i:0#.f|membership|alice@contoso.com", PrincipalType: 1 },
            RoleDefinitionBindings: [{ Name: "Edit" }, { Name: "Limited Access" }],
          },
        ],
      })
    );

    const assignments = await sharepoint.getRoleAssignments(SITE, { kind: "item", listId: "list-1", itemId: 9 });

    expect(assignments).toEqual([
      {
        principal: {
          kind: "User",
          id: "7",
          loginName: "i:0#.f|membership|alice@contoso.com",
          displayName: "Alice",
          email: "",
        },
        permissionLevels: ["Edit", "Limited Access"],
      },
    ]);
    expect(requests[0]?.url).toBe(
      `${SITE}/_api/web/lists(guid'list-1')/items(9)/roleassignments?$expand=Member,RoleDefinitionBindings`
    );
  });

  it("fails without retrying when access is denied", async () => {
    const { sharepoint, requests } = client(() => new Response("Access denied", { status: 403 }));

    const error = await sharepoint.getLists(SITE).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ResolutionError);
    expect(error instanceof ResolutionError && error.upstreamStatus).toBe(403);
    expect(requests).toHaveLength(1);
  });

  it("retries throttled requests", async () => {
    let calls = 0;
    const { sharepoint, requests } = client(() => {
      calls += 1;
      return calls === 1
        ? new Response("slow down", { status: 429, headers: { "retry-after": "0" } })
        : json({ Title: "Alice" });
    });

    expect(await sharepoint.getUserDisplayName(SITE, "i:0#.f|membership|alice@contoso.com")).toBe("Alice");
    expect(requests).toHaveLength(2);
  });
});
