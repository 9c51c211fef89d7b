/**
 * URL helpers for tenant paths
 */

import { ClassificationError } from "./errors.js";

/** Managed paths that host site collections */
const MANAGED_PATHS = new Set(["sites", "teams"]);

export interface NormalizedUrl {
  /** Scheme and host, lowercase, no trailing slash */
  origin: string;
  /** Decoded, non-empty path segments */
  segments: string[];
}

/**
 * Join a base URL and a relative part with exactly one slash
 */
export function joinUrl(base: string, relative: string): string {
  return `${base.replace(/\/+$/, "")}/${relative.replace(/^\/+/, "")}`;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Path form used for equality checks: decoded, lowercase, single slashes, no trailing slash
 */
export function comparablePath(path: string): string {
  const segments = path
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => decodeSegment(segment).toLowerCase());
  return `/${segments.join("/")}`;
}

/**
 * Remove view pages and application pages from the end of a path
 * /Shared Documents/Forms/AllItems.aspx -> /Shared Documents
 * /Lists/Tasks/AllItems.aspx -> /Lists/Tasks
 * /sites/A/_layouts/15/viewlsts.aspx -> /sites/A
 */
function stripPageTail(segments: string[]): string[] {
  const layouts = segments.findIndex((segment) =>
    segment.toLowerCase().startsWith("_layouts")
  );
  let result = layouts >= 0 ? segments.slice(0, layouts) : [...segments];

  const last = result[result.length - 1];
  if (last !== undefined && last.toLowerCase().endsWith(".aspx")) {
    const parent = result[result.length - 2]?.toLowerCase();
    const grandParent = result[result.length - 3]?.toLowerCase();
    if (parent === "forms") {
      result = result.slice(0, -2);
    } else if (grandParent === "lists") {
      result = result.slice(0, -1);
    }
  }

  return result;
}

/**
 * Normalize an input URL under the tenant root
 * @throws ClassificationError - Malformed or OutsideTenant
 */
export function normalizeUrl(input: string, tenantRootUrl: string): NormalizedUrl {
  let parsed: URL;
  try {
    parsed = new URL(input.trim());
  } catch {
    throw new ClassificationError("Malformed", `Not an absolute URL: ${input}`);
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new ClassificationError("Malformed", `Unsupported scheme: ${parsed.protocol}`);
  }

  const tenant = new URL(tenantRootUrl);
  if (parsed.host.toLowerCase() !== tenant.host.toLowerCase()) {
    throw new ClassificationError(
      "OutsideTenant",
      `${parsed.host} is not under ${tenant.host}`
    );
  }

  const segments = parsed.pathname
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(decodeSegment);

  return {
    origin: `${parsed.protocol}//${parsed.host.toLowerCase()}`,
    segments: stripPageTail(segments),
  };
}

/**
 * Number of leading segments that form the site collection root
 * /sites/<name> and /teams/<name> have two, the tenant root none
 */
export function siteCollectionDepth(segments: string[]): number {
  const first = segments[0]?.toLowerCase();
  return first !== undefined && MANAGED_PATHS.has(first) && segments.length >= 2 ? 2 : 0;
}

/**
 * Absolute URL from an origin and decoded segments
 */
export function toAbsoluteUrl(origin: string, segments: string[]): string {
  return segments.length === 0 ? origin : `${origin}/${segments.join("/")}`;
}

/**
 * Server-relative path from decoded segments
 */
export function toServerRelative(segments: string[]): string {
  return `/${segments.join("/")}`;
}

/**
 * Whether a path equals a folder or lies beneath it (case-insensitive)
 */
export function isWithinFolder(path: string, folder: string): boolean {
  const target = comparablePath(path);
  const root = comparablePath(folder);
  return target === root || target.startsWith(`${root}/`);
}
