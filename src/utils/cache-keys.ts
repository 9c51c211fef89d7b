/**
 * Cache Key Utilities
 * Consistent key naming for everything kept in Redis
 */

const PREFIX = "auditor";

/**
 * Generate cache key for a directory group's direct members
 * @param groupId - Directory object id
 */
export function directoryGroupMembersKey(groupId: string): string {
  return `${PREFIX}:directory-group:${groupId.toLowerCase()}:members`;
}

/**
 * Cache key patterns for bulk invalidation
 */
export const CachePatterns = {
  /** Every cached directory group */
  directoryGroupsAll: () => `${PREFIX}:directory-group:*`,
} as const;
