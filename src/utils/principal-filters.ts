/**
 * Principal Filters
 * Pure checks used by the resolution engine and the accessor
 */

import type { GroupPrincipal, Principal } from "../types/audit.js";

/**
 * Whether a login contains any of the ignored fragments (case-insensitive)
 * @param patterns - Fragments such as "SHAREPOINT\\system"
 */
export function matchesIgnoredAccount(loginName: string, patterns: string[]): boolean {
  const login = loginName.toLowerCase();
  return patterns.some(
    (pattern) => pattern.length > 0 && login.includes(pattern.toLowerCase())
  );
}

/**
 * Whether a group is on the do-not-resolve list, by display name or id
 */
export function isExcludedGroup(group: GroupPrincipal, excluded: string[]): boolean {
  const name = group.displayName.toLowerCase();
  const id = group.id.toLowerCase();
  return excluded.some((entry) => {
    const candidate = entry.toLowerCase();
    return candidate === name || candidate === id;
  });
}

/**
 * Guest accounts carry #ext# in their login
 */
export function isExternalLogin(loginName: string): boolean {
  return loginName.toLowerCase().includes("#ext#");
}

export function isEveryoneAudience(principal: Principal): boolean {
  return principal.kind === "User" && principal.isEveryone === true;
}

/**
 * Visited-set key for a group
 */
export function groupKey(group: GroupPrincipal): string {
  return `${group.kind}:${group.id.toLowerCase()}`;
}
