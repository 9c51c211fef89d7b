import { describe, it, expect, beforeEach } from "vitest";
import { GroupResolutionService } from "../../src/services/group-resolution.service.js";
import {
  PermissionAccessorService,
  dedupeEntries,
  siteGroupRole,
} from "../../src/services/permission-accessor.service.js";
import type { AccessEntry, AccessRow, Resource, UserPrincipal } from "../../src/types/audit.js";
import {
  FakeContentClient,
  FakeDirectoryClient,
  ORIGIN,
  securityGroup,
  silentLogger,
  siteGroup,
  user,
} from "../helpers/fakes.js";
import { jobScope, testSettings } from "../helpers/engine.js";

const SITE_URL = `${ORIGIN}/sites/A`;

const alice = user("alice@contoso.com", "Alice Smith");
const bob = user("bob@contoso.com", "Bob Jones");
const carol = user("carol@contoso.com", "Carol White");
const guest: UserPrincipal = {
  kind: "User",
  id: "31",
  loginName: "i:0#.f|membership|guest_fabrikam.com#ext#@contoso.onmicrosoft.com",
  displayName: "Guest User",
  email: "guest@fabrikam.com",
};
const everyone: UserPrincipal = {
  kind: "User",
  id: "40",
  loginName: "c:0(.s|true",
  displayName: "Everyone",
  email: "",
  isEveryone: true,
};

const planItem: Resource = {
  id: "L1:5",
  kind: "Item",
  title: "Plan.docx",
  url: `${ORIGIN}/sites/A/Shared Documents/Plan.docx`,
  hasUniqueRoleAssignments: true,
  shares: [
    {
      loginName: alice.loginName,
      sharedAt: "2024-03-01T10:00:00.000Z",
      sharedByLogin: "i:0#.f|membership|zoe@contoso.com",
    },
  ],
};

function rowsOf(rows: AccessRow[]) {
  return rows.map((row) => [row.displayName, row.permissionLevel, row.viaGroup]);
}

describe("PermissionAccessorService", () => {
  let content: FakeContentClient;
  let directory: FakeDirectoryClient;
  let accessor: PermissionAccessorService;

  beforeEach(() => {
    content = new FakeContentClient();
    directory = new FakeDirectoryClient();
    const settings = testSettings({
      ignorePermissionLevels: ["Limited Access"],
      ignoreSiteGroups: ["Excel Services Viewers"],
    });
    const resolver = new GroupResolutionService(content, directory, settings, silentLogger);
    accessor = new PermissionAccessorService(content, resolver, settings);
  });

  describe("processNode", () => {
    it("flattens, filters, decorates and sorts the access rows of a node", async () => {
      content.groupMembers.set("7", [alice, bob]);
      content.displayNames.set("i:0#.f|membership|zoe@contoso.com", "Zoe Admin");
      content.setItemAssignments("L1", 5, [
        { principal: guest, permissionLevels: ["Read"] },
        { principal: alice, permissionLevels: ["Contribute", "Limited Access"] },
        { principal: siteGroup("7", "Eng Members"), permissionLevels: ["Read"] },
        { principal: bob, permissionLevels: ["Limited Access"] },
      ]);
      const scope = jobScope(3);

      const { brokenNode, accessRows } = await accessor.processNode(
        planItem,
        SITE_URL,
        { kind: "item", listId: "L1", itemId: 5 },
        scope
      );

      expect(brokenNode).toEqual({
        jobIndex: 3,
        resourceId: "L1:5",
        type: "ITEM",
        title: "Plan.docx",
        url: `${ORIGIN}/sites/A/Shared Documents/Plan.docx`,
      });
      expect(rowsOf(accessRows)).toEqual([
        ["Alice Smith", "Contribute", ""],
        ["Alice Smith", "Read", "Eng Members"],
        ["Bob Jones", "Read", "Eng Members"],
        ["Guest User", "Read", ""],
      ]);
      expect(accessRows[0]).toMatchObject({
        jobIndex: 3,
        resourceKind: "Item",
        sharedAt: "2024-03-01T10:00:00.000Z",
        sharedByLogin: "i:0#.f|membership|zoe@contoso.com",
        sharedByDisplayName: "Zoe Admin",
      });
      expect(accessRows[2]?.sharedAt).toBeUndefined();
      expect(content.calls.getUserDisplayName).toBe(1);
      expect(scope.counts).toMatchObject({ brokenNodes: 1, accessRows: 4, externalUsers: 1 });
    });

    it("keeps the shallowest path when an account is reached twice", async () => {
      content.groupMembers.set("7", [securityGroup("sg-eng", "Engineering")]);
      directory.members.set("sg-eng", [alice]);
      content.setListAssignments("L2", [
        { principal: siteGroup("7", "Eng Members"), permissionLevels: ["Read"] },
        { principal: alice, permissionLevels: ["Read"] },
      ]);
      const resource: Resource = {
        id: "L2",
        kind: "List",
        title: "Tasks",
        url: `${ORIGIN}/sites/A/Lists/Tasks`,
        hasUniqueRoleAssignments: true,
      };

      const { accessRows } = await accessor.processNode(
        resource,
        SITE_URL,
        { kind: "list", listId: "L2" },
        jobScope()
      );

      expect(accessRows).toHaveLength(1);
      expect(accessRows[0]).toMatchObject({
        displayName: "Alice Smith",
        nestingLevel: 0,
        viaGroup: "",
        assignmentType: "Direct",
      });
    });

    it("still reports the node when its assignments cannot be read", async () => {
      content.failingAssignments.add("item:L1:6");
      const scope = jobScope();

      const { brokenNode, accessRows } = await accessor.processNode(
        { ...planItem, id: "L1:6" },
        SITE_URL,
        { kind: "item", listId: "L1", itemId: 6 },
        scope
      );

      expect(brokenNode.resourceId).toBe("L1:6");
      expect(accessRows).toEqual([]);
      expect(scope.counts).toMatchObject({ brokenNodes: 1, failedNodes: 1, accessRows: 0 });
    });
  });

  describe("processSite", () => {
    it("reports site groups with roles and every account on the site", async () => {
      content.groupMembers.set("3", [alice]);
      content.groupMembers.set("5", [bob]);
      content.groupMembers.set("8", [carol]);
      content.setSiteAssignments(SITE_URL, [
        {
          principal: siteGroup("3", "Team Owners", { owner: "Team Owners" }),
          permissionLevels: ["Full Control"],
        },
        {
          principal: siteGroup("5", "Team Visitors", { owner: "Team Owners" }),
          permissionLevels: ["Read", "Limited Access"],
        },
        { principal: siteGroup("8", "Excel Services Viewers"), permissionLevels: ["View Only"] },
        { principal: everyone, permissionLevels: ["Read"] },
      ]);
      const scope = jobScope(1);
      const siteResource: Resource = {
        id: "site-a",
        kind: "Site",
        title: "A",
        url: SITE_URL,
        hasUniqueRoleAssignments: true,
      };

      const { siteGroups, siteUsers } = await accessor.processSite(siteResource, scope);

      expect(siteGroups).toEqual([
        {
          jobIndex: 1,
          siteUrl: SITE_URL,
          groupId: "3",
          role: "SiteOwners",
          title: "Team Owners",
          permissionLevel: "Full Control",
          owner: "Team Owners",
        },
        {
          jobIndex: 1,
          siteUrl: SITE_URL,
          groupId: "5",
          role: "SiteVisitors",
          title: "Team Visitors",
          permissionLevel: "Read",
          owner: "Team Owners",
        },
      ]);
      expect(rowsOf(siteUsers)).toEqual([
        ["Alice Smith", "Full Control", "Team Owners"],
        ["Bob Jones", "Read", "Team Visitors"],
        ["Carol White", "View Only", "Excel Services Viewers"],
        ["Everyone", "Read", ""],
      ]);
      expect(scope.counts).toMatchObject({ siteGroups: 2, siteUsers: 4, sharedWithEveryone: 1 });
    });
  });
});

describe("siteGroupRole", () => {
  it("derives the role from the group title", () => {
    expect(siteGroupRole("Contoso Owners")).toBe("SiteOwners");
    expect(siteGroupRole("Contoso Members")).toBe("SiteMembers");
    expect(siteGroupRole("Contoso Visitors")).toBe("SiteVisitors");
    expect(siteGroupRole("Approvers")).toBe("Custom");
  });
});

describe("dedupeEntries", () => {
  it("treats logins case-insensitively and keeps the first of equal depth", () => {
    const base: Omit<AccessEntry, "loginName" | "viaGroup"> = {
      resourceId: "L1",
      resourceKind: "Library",
      resourceUrl: `${ORIGIN}/sites/A/Shared Documents`,
      principalId: "11",
      principalKind: "User",
      displayName: "Alice Smith",
      email: "alice@contoso.com",
      permissionLevel: "Read",
      viaGroupId: "",
      viaGroupKind: "",
      viaGroupChain: [],
      nestingLevel: 0,
      parentGroup: "",
      assignmentType: "Direct",
      resolution: "Resolved",
    };

    const result = dedupeEntries([
      { ...base, loginName: "i:0#.f|membership|alice@contoso.com", viaGroup: "First" },
      { ...base, loginName: "I:0#.F|MEMBERSHIP|ALICE@CONTOSO.COM", viaGroup: "Second" },
    ]);

    expect(result.map((entry) => entry.viaGroup)).toEqual(["First"]);
  });
});
