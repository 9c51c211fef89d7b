/**
 * Services Index
 * Wires the audit engine from its collaborators
 */

import type { Logger } from "../config/logger.js";
import type { ScannerSettings } from "../config/scanner-settings.js";
import type { ContentServiceClient, DirectoryServiceClient } from "../types/clients.js";
import type { Storage } from "../storage/index.js";
import { AuditOrchestratorService } from "./audit-orchestrator.service.js";
import { ContentWalkerService } from "./content-walker.service.js";
import type { DirectoryGroupCache } from "./directory-group-cache.js";
import { GroupResolutionService } from "./group-resolution.service.js";
import { PermissionAccessorService } from "./permission-accessor.service.js";
import { ResolutionContext } from "./resolution-context.js";
import { UrlClassifierService } from "./url-classifier.service.js";

export interface AuditEngineDependencies {
  content: ContentServiceClient;
  directory: DirectoryServiceClient;
  settings: ScannerSettings;
  storage: Pick<Storage, "checkpoints" | "createSink">;
  directoryCache: DirectoryGroupCache;
  tenantRootUrl: string;
  logger: Logger;
}

export interface AuditEngine {
  context: ResolutionContext;
  classifier: UrlClassifierService;
  resolver: GroupResolutionService;
  accessor: PermissionAccessorService;
  walker: ContentWalkerService;
  orchestrator: AuditOrchestratorService;
}

export function createAuditEngine(deps: AuditEngineDependencies): AuditEngine {
  const { content, directory, settings, logger } = deps;

  const context = new ResolutionContext(deps.directoryCache);
  const classifier = new UrlClassifierService(
    content,
    deps.tenantRootUrl,
    logger.child({ component: "classifier" })
  );
  const resolver = new GroupResolutionService(
    content,
    directory,
    settings,
    logger.child({ component: "resolver" })
  );
  const accessor = new PermissionAccessorService(content, resolver, settings);
  const walker = new ContentWalkerService(content, accessor, settings);
  const orchestrator = new AuditOrchestratorService({
    classifier,
    walker,
    createSink: deps.storage.createSink,
    checkpoints: deps.storage.checkpoints,
    context,
    outputBatchSize: settings.outputBatchSize,
    logger: logger.child({ component: "orchestrator" }),
  });

  return { context, classifier, resolver, accessor, walker, orchestrator };
}

export { cacheService, CacheService, CacheTTL } from "./cache.service.js";
export { DirectoryGroupCache } from "./directory-group-cache.js";
export { ScanRunnerService } from "./scan-runner.service.js";
export type { ScanState, ScanStatus } from "./scan-runner.service.js";
export type { BatchResult, JobResult } from "./audit-orchestrator.service.js";
export type { Classification } from "./url-classifier.service.js";
