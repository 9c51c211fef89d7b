import { z } from "zod";
import type { Logger } from "../config/logger.js";
import type { DirectoryMember, PersistentCache } from "../types/clients.js";
import { CachePatterns, directoryGroupMembersKey } from "../utils/cache-keys.js";

const DirectoryMemberSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("User"),
    id: z.string(),
    loginName: z.string(),
    displayName: z.string(),
    email: z.string(),
    isEveryone: z.boolean().optional(),
  }),
  z.object({
    kind: z.enum(["SecurityGroup", "M365Group"]),
    id: z.string(),
    loginName: z.string(),
    displayName: z.string(),
    email: z.string(),
  }),
]);

const CachedMembersSchema = z.array(DirectoryMemberSchema);

/**
 * Direct members of directory groups
 * Lives for the whole process; with a persistent layer it also survives restarts.
 */
export class DirectoryGroupCache {
  private readonly memory = new Map<string, DirectoryMember[]>();

  constructor(
    private readonly logger: Logger,
    private readonly persistent: PersistentCache | null = null,
    private readonly ttlSeconds?: number
  ) {}

  get size(): number {
    return this.memory.size;
  }

  /**
   * Cached members, or undefined on a miss
   */
  async get(groupId: string): Promise<DirectoryMember[] | undefined> {
    const key = groupId.toLowerCase();
    const local = this.memory.get(key);
    if (local) {
      return local;
    }

    if (!this.persistent) {
      return undefined;
    }

    const stored = await this.persistent.get(directoryGroupMembersKey(key));
    if (stored === null) {
      return undefined;
    }

    const parsed = CachedMembersSchema.safeParse(stored);
    if (!parsed.success) {
      this.logger.warn({ groupId }, "Discarding malformed cached directory group");
      return undefined;
    }

    this.memory.set(key, parsed.data);
    return parsed.data;
  }

  async set(groupId: string, members: DirectoryMember[]): Promise<void> {
    const key = groupId.toLowerCase();
    this.memory.set(key, members);
    if (this.persistent) {
      await this.persistent.set(directoryGroupMembersKey(key), members, this.ttlSeconds);
    }
  }

  /**
   * Drop every cached group, in memory and in the persistent layer
   * @returns Number of persistent keys removed
   */
  async purge(): Promise<number> {
    this.memory.clear();
    const removed = this.persistent
      ? await this.persistent.clearPattern(CachePatterns.directoryGroupsAll())
      : 0;
    this.logger.info({ removed }, "Directory group cache purged");
    return removed;
  }
}
