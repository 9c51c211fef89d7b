import { describe, it, expect, beforeEach } from "vitest";
import { DirectoryGroupCache } from "../../src/services/directory-group-cache.js";
import {
  GroupResolutionService,
  type ResolutionSettings,
} from "../../src/services/group-resolution.service.js";
import { ResolutionContext } from "../../src/services/resolution-context.js";
import type { ResolvedMember } from "../../src/types/audit.js";
import {
  FakeContentClient,
  FakeDirectoryClient,
  ORIGIN,
  securityGroup,
  silentLogger,
  siteGroup,
  user,
} from "../helpers/fakes.js";

const SITE_URL = `${ORIGIN}/sites/eng`;

const alice = user("alice@contoso.com", "Alice Smith");
const bob = user("bob@contoso.com", "Bob Jones");
const carol = user("carol@contoso.com", "Carol White");
const engMembers = siteGroup("7", "Eng Members");
const engineering = securityGroup("sg-eng", "Engineering");
const platform = securityGroup("sg-plat", "Platform");

function settings(overrides: Partial<ResolutionSettings> = {}): ResolutionSettings {
  return {
    maxGroupNestingLevel: 5,
    doNotResolveGroups: [],
    ignoreAccounts: ["SHAREPOINT\\system"],
    ...overrides,
  };
}

function summary(members: ResolvedMember[]) {
  return members.map((member) => ({
    name: member.principal.displayName,
    nestingLevel: member.nestingLevel,
    viaGroup: member.viaGroup,
    parentGroup: member.parentGroup,
    assignmentType: member.assignmentType,
    resolution: member.resolution,
  }));
}

describe("GroupResolutionService", () => {
  let content: FakeContentClient;
  let directory: FakeDirectoryClient;
  let context: ResolutionContext;

  beforeEach(() => {
    content = new FakeContentClient();
    directory = new FakeDirectoryClient();
    context = new ResolutionContext(new DirectoryGroupCache(silentLogger));

    content.groupMembers.set("7", [alice, engineering]);
    directory.members.set("sg-eng", [bob, platform]);
    directory.members.set("sg-plat", [carol]);
  });

  function resolver(overrides: Partial<ResolutionSettings> = {}) {
    return new GroupResolutionService(content, directory, settings(overrides), silentLogger);
  }

  it("flattens nested groups with provenance", async () => {
    const members = await resolver().resolve(engMembers, SITE_URL, context);

    expect(summary(members)).toEqual([
      {
        name: "Alice Smith",
        nestingLevel: 0,
        viaGroup: "Eng Members",
        parentGroup: "",
        assignmentType: "Direct",
        resolution: "Resolved",
      },
      {
        name: "Bob Jones",
        nestingLevel: 1,
        viaGroup: "Engineering",
        parentGroup: "Eng Members",
        assignmentType: "Group",
        resolution: "Resolved",
      },
      {
        name: "Carol White",
        nestingLevel: 2,
        viaGroup: "Platform",
        parentGroup: "Engineering",
        assignmentType: "Group",
        resolution: "Resolved",
      },
    ]);
    expect(members[2]?.viaGroupChain).toEqual(["Eng Members", "Engineering", "Platform"]);
    expect(members[2]?.viaGroupId).toBe("sg-plat");
    expect(members[2]?.viaGroupKind).toBe("SecurityGroup");
  });

  it("reads each group once per job and each directory group once per process", async () => {
    const service = resolver();

    await service.resolve(engMembers, SITE_URL, context);
    await service.resolve(engMembers, SITE_URL, context);
    expect(content.calls.getSiteGroupMembers).toBe(1);
    expect(directory.calls.getGroupMembers).toBe(2);

    context.resetForJob();
    await service.resolve(engMembers, SITE_URL, context);
    expect(content.calls.getSiteGroupMembers).toBe(2);
    expect(directory.calls.getGroupMembers).toBe(2);
  });

  it("stops at the nesting cap with a DepthLimited placeholder", async () => {
    const members = await resolver({ maxGroupNestingLevel: 1 }).resolve(
      engMembers,
      SITE_URL,
      context
    );

    expect(summary(members).map((entry) => [entry.name, entry.resolution])).toEqual([
      ["Alice Smith", "Resolved"],
      ["Bob Jones", "Resolved"],
      ["Platform", "DepthLimited"],
    ]);
    expect(members[2]?.nestingLevel).toBe(2);
    expect(members[2]?.parentGroup).toBe("Engineering");
    expect(directory.calls.getGroupMembers).toBe(1);
  });

  it("does not expand groups on the do-not-resolve list", async () => {
    const members = await resolver({ doNotResolveGroups: ["ENGINEERING"] }).resolve(
      engMembers,
      SITE_URL,
      context
    );

    expect(summary(members).map((entry) => [entry.name, entry.resolution])).toEqual([
      ["Alice Smith", "Resolved"],
      ["Engineering", "Excluded"],
    ]);
    expect(directory.calls.getGroupMembers).toBe(0);
  });

  it("terminates on membership cycles", async () => {
    const groupA = securityGroup("sg-a", "Group A");
    const groupB = securityGroup("sg-b", "Group B");
    directory.members.set("sg-a", [alice, groupB]);
    directory.members.set("sg-b", [bob, groupA]);

    const members = await resolver().resolve(groupA, SITE_URL, context);

    expect(summary(members).map((entry) => [entry.name, entry.nestingLevel])).toEqual([
      ["Alice Smith", 0],
      ["Bob Jones", 1],
    ]);
  });

  it("lists a user reachable through two nested groups once", async () => {
    const team = securityGroup("sg-team", "Team");
    content.groupMembers.set("12", [engineering, team]);
    directory.members.set("sg-team", [platform]);

    const members = await resolver().resolve(siteGroup("12", "Diamond"), SITE_URL, context);

    expect(members.filter((member) => member.principal.id === carol.id)).toHaveLength(1);
  });

  it("expands a group reached beyond the cap when a shorter path reaches it within the cap", async () => {
    const dave = user("dave@contoso.com", "Dave Brown");
    const groupA = securityGroup("sg-a", "Group A");
    const groupD = securityGroup("sg-d", "Group D");
    content.groupMembers.set("20", [groupA, groupD]);
    directory.members.set("sg-a", [groupD]);
    directory.members.set("sg-d", [dave]);

    const members = await resolver({ maxGroupNestingLevel: 1 }).resolve(
      siteGroup("20", "Root"),
      SITE_URL,
      context
    );

    expect(members.map((member) => [member.principal.displayName, member.nestingLevel, member.resolution])).toEqual([
      ["Dave Brown", 1, "Resolved"],
    ]);
    expect(members[0]?.viaGroupChain).toEqual(["Root", "Group D"]);
  });

  it("reports a user reached through two paths at the shallower one", async () => {
    const g1 = securityGroup("sg-1", "G1");
    const g2 = securityGroup("sg-2", "G2");
    content.groupMembers.set("21", [g1, g2]);
    directory.members.set("sg-1", [g2]);
    directory.members.set("sg-2", [alice]);

    const members = await resolver().resolve(siteGroup("21", "Root"), SITE_URL, context);

    expect(members.map((member) => [member.principal.displayName, member.nestingLevel, member.viaGroupChain])).toEqual([
      ["Alice Smith", 1, ["Root", "G2"]],
    ]);
    expect(members[0]?.parentGroup).toBe("Root");
  });

  it("yields a Failed placeholder when members cannot be read", async () => {
    directory.failing.add("sg-eng");

    const members = await resolver().resolve(engMembers, SITE_URL, context);

    expect(summary(members).map((entry) => [entry.name, entry.resolution])).toEqual([
      ["Alice Smith", "Resolved"],
      ["Engineering", "Failed"],
    ]);
  });

  it("marks members of sharing link groups", async () => {
    content.groupMembers.set("9", [bob]);

    const members = await resolver().resolve(
      siteGroup("9", "SharingLinks.abc.OrganizationView", { sharingLink: true }),
      SITE_URL,
      context
    );

    expect(members.map((member) => member.assignmentType)).toEqual(["SharingLink"]);
  });

  it("skips ignored system accounts", async () => {
    content.groupMembers.set("7", [
      alice,
      {
        kind: "User",
        id: "1073741823",
        loginName: "SHAREPOINT\\system",
        displayName: "System Account",
        email: "",
      },
    ]);

    const members = await resolver().resolve(engMembers, SITE_URL, context);

    expect(members.map((member) => member.principal.displayName)).toEqual(["Alice Smith"]);
  });

  it("looks up the name of a directory group the content service left blank", async () => {
    const unnamed = securityGroup("sg-fin", "");
    directory.groups.set("sg-fin", securityGroup("sg-fin", "Finance"));
    directory.members.set("sg-fin", [alice]);
    const service = resolver();

    const first = await service.resolve(unnamed, SITE_URL, context);
    await service.resolve(unnamed, SITE_URL, context);

    expect(first[0]?.viaGroup).toBe("Finance");
    expect(directory.calls.getGroup).toBe(1);
  });
});
