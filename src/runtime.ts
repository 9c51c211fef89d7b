/**
 * Runtime
 * Builds everything the server and the CLI share from the environment
 */

import { createServiceClients } from "./clients/index.js";
import type { Env } from "./config/environment.js";
import type { Logger } from "./config/logger.js";
import { loadScannerSettings, type ScannerSettings } from "./config/scanner-settings.js";
import { cacheService, CacheTTL } from "./services/cache.service.js";
import { DirectoryGroupCache } from "./services/directory-group-cache.js";
import { createAuditEngine, type AuditEngine } from "./services/index.js";
import { createStorage, type Storage } from "./storage/index.js";

export interface Runtime {
  settings: ScannerSettings;
  storage: Storage;
  directoryCache: DirectoryGroupCache;
  engine: AuditEngine;
  /** Persistent cache, when REDIS_URL is set */
  persistentCache: typeof cacheService | null;
  close: () => Promise<void>;
}

export async function createRuntime(config: Env, logger: Logger): Promise<Runtime> {
  const settings = await loadScannerSettings(config.SCANNER_SETTINGS_PATH);
  const storage = await createStorage(config);

  let persistentCache: typeof cacheService | null = null;
  if (config.REDIS_URL) {
    await cacheService.connect();
    persistentCache = cacheService;
  }

  const directoryCache = new DirectoryGroupCache(
    logger.child({ component: "directory-cache" }),
    persistentCache,
    CacheTTL.DIRECTORY_GROUPS
  );
  const { content, directory } = createServiceClients(config, logger);

  const engine = createAuditEngine({
    content,
    directory,
    settings,
    storage,
    directoryCache,
    tenantRootUrl: config.TENANT_ROOT_URL,
    logger,
  });

  return {
    settings,
    storage,
    directoryCache,
    engine,
    persistentCache,
    close: async () => {
      await storage.close();
      await cacheService.disconnect();
    },
  };
}
