import type { Logger } from "../config/logger.js";
import type { ListInfo, SiteInfo } from "../types/audit.js";
import type { ContentServiceClient } from "../types/clients.js";
import {
  ClassificationError,
  ResolutionError,
  type ClassificationFailure,
} from "../utils/errors.js";
import {
  normalizeUrl,
  siteCollectionDepth,
  toAbsoluteUrl,
  toServerRelative,
} from "../utils/url.js";

// =============================================================================
// TYPES
// =============================================================================

export type TargetKind = "Site" | "Subsite" | "Library" | "Folder";

export interface ClassifiedTarget {
  kind: TargetKind;
  inputUrl: string;
  /** Absolute URL of the site that holds the target */
  siteUrl: string;
  siteCollectionUrl: string;
  /** Path under siteUrl; empty for sites */
  relativePath: string;
  site: SiteInfo;
  /** Set for Library and Folder */
  list?: ListInfo;
  /** Server-relative folder path, set for Folder */
  folderPath?: string;
}

export interface ClassificationFailed {
  kind: "Error";
  inputUrl: string;
  reason: ClassificationFailure;
  message: string;
}

export type Classification = ClassifiedTarget | ClassificationFailed;

export function isClassificationFailure(
  classification: Classification
): classification is ClassificationFailed {
  return classification.kind === "Error";
}

// =============================================================================
// SERVICE
// =============================================================================

/**
 * URL Classifier
 * Maps an arbitrary tenant URL to the site, library or folder it points at
 */
export class UrlClassifierService {
  constructor(
    private readonly client: ContentServiceClient,
    private readonly tenantRootUrl: string,
    private readonly logger: Logger
  ) {}

  /**
   * Classify an input URL
   * Never throws for bad input or service failures; those come back as kind "Error"
   */
  async classify(inputUrl: string): Promise<Classification> {
    try {
      return await this.resolve(inputUrl);
    } catch (error) {
      if (error instanceof ClassificationError) {
        return this.fail(inputUrl, error.reason, error.message);
      }
      if (error instanceof ResolutionError) {
        const reason: ClassificationFailure = error.isAuthorizationFailure
          ? "Unauthorized"
          : "Unresolvable";
        return this.fail(inputUrl, reason, error.message);
      }
      throw error;
    }
  }

  private async resolve(inputUrl: string): Promise<ClassifiedTarget> {
    const { origin, segments } = normalizeUrl(inputUrl, this.tenantRootUrl);
    const collectionDepth = siteCollectionDepth(segments);
    const siteCollectionUrl = toAbsoluteUrl(origin, segments.slice(0, collectionDepth));

    // Longest prefix that is a site wins
    let site: SiteInfo | null = null;
    let boundary = segments.length;
    for (; boundary >= collectionDepth; boundary--) {
      site = await this.client.connect(toAbsoluteUrl(origin, segments.slice(0, boundary)));
      if (site) {
        break;
      }
    }

    if (!site) {
      throw new ClassificationError("NotFound", `No site found at ${inputUrl}`);
    }

    const siteSegments = segments.slice(0, boundary);
    const siteUrl = toAbsoluteUrl(origin, siteSegments);
    const remainder = segments.slice(boundary);
    const base = { inputUrl, siteUrl, siteCollectionUrl, site };

    if (remainder.length === 0) {
      return {
        ...base,
        kind: boundary === collectionDepth ? "Site" : "Subsite",
        relativePath: "",
      };
    }

    // Libraries sit one segment below the site, lists under Lists/<name>
    let list: ListInfo | null = null;
    let consumed = 0;
    for (const width of [1, 2]) {
      if (remainder.length < width) {
        break;
      }
      list = await this.client.getListByUrl(
        siteUrl,
        toServerRelative([...siteSegments, ...remainder.slice(0, width)])
      );
      if (list) {
        consumed = width;
        break;
      }
    }

    if (!list) {
      throw new ClassificationError(
        "Unresolvable",
        `${remainder.join("/")} is not a list or library of ${siteUrl}`
      );
    }

    const relativePath = remainder.join("/");
    if (consumed === remainder.length) {
      return { ...base, kind: "Library", relativePath, list };
    }

    const folderPath = toServerRelative(segments);
    const exists = await this.client.folderExists(siteUrl, folderPath);
    if (!exists) {
      throw new ClassificationError("NotFound", `Folder ${folderPath} does not exist`);
    }

    return { ...base, kind: "Folder", relativePath, list, folderPath };
  }

  private fail(
    inputUrl: string,
    reason: ClassificationFailure,
    message: string
  ): ClassificationFailed {
    this.logger.warn({ url: inputUrl, reason }, `Classification failed: ${message}`);
    return { kind: "Error", inputUrl, reason, message };
  }
}
