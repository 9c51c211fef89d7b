import { describe, it, expect } from "vitest";
import { DirectoryGroupCache } from "../../src/services/directory-group-cache.js";
import { MemoryPersistentCache, securityGroup, silentLogger, user } from "../helpers/fakes.js";

describe("DirectoryGroupCache", () => {
  const members = [user("alice@contoso.com", "Alice Smith"), securityGroup("sg-2", "Nested")];

  it("keys groups case-insensitively", async () => {
    const cache = new DirectoryGroupCache(silentLogger);

    await cache.set("SG-1", members);

    expect(await cache.get("sg-1")).toEqual(members);
    expect(cache.size).toBe(1);
  });

  it("survives a restart through the persistent layer", async () => {
    const persistent = new MemoryPersistentCache();
    await new DirectoryGroupCache(silentLogger, persistent, 60).set("sg-1", members);

    const restarted = new DirectoryGroupCache(silentLogger, persistent, 60);

    expect([...persistent.entries.keys()]).toEqual(["auditor:directory-group:sg-1:members"]);
    expect(await restarted.get("sg-1")).toEqual(members);
  });

  it("ignores persisted entries of the wrong shape", async () => {
    const persistent = new MemoryPersistentCache();
    persistent.entries.set("auditor:directory-group:sg-1:members", [{ kind: "Device" }]);

    const cache = new DirectoryGroupCache(silentLogger, persistent);

    expect(await cache.get("sg-1")).toBeUndefined();
  });

  it("purges memory and persisted entries", async () => {
    const persistent = new MemoryPersistentCache();
    const cache = new DirectoryGroupCache(silentLogger, persistent);
    await cache.set("sg-1", members);
    await cache.set("sg-3", []);

    expect(await cache.purge()).toBe(2);
    expect(await cache.get("sg-1")).toBeUndefined();
    expect(cache.size).toBe(0);
  });
});
