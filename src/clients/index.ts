/**
 * Clients Index
 * Builds the content and directory clients from the environment
 */

import type { Env } from "../config/environment.js";
import type { Logger } from "../config/logger.js";
import type { TokenProvider } from "../types/clients.js";
import type { RetryPolicy } from "../utils/retry.js";
import { GraphDirectoryClient } from "./graph.client.js";
import { SharePointContentClient } from "./sharepoint.client.js";

/**
 * Token provider for a token acquired outside this service
 */
export function staticToken(token: string): TokenProvider {
  return async () => token;
}

export function retryPolicyFromEnv(
  config: Pick<Env, "REQUEST_RETRIES" | "RETRY_BASE_DELAY_MS" | "REQUEST_TIMEOUT_MS">
): RetryPolicy {
  return {
    retries: config.REQUEST_RETRIES,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
  };
}

export function createServiceClients(config: Env, logger: Logger) {
  const policy = retryPolicyFromEnv(config);
  return {
    content: new SharePointContentClient({
      getToken: staticToken(config.SHAREPOINT_ACCESS_TOKEN),
      policy,
      logger: logger.child({ component: "sharepoint" }),
    }),
    directory: new GraphDirectoryClient({
      baseUrl: config.GRAPH_BASE_URL,
      getToken: staticToken(config.GRAPH_ACCESS_TOKEN),
      policy,
      logger: logger.child({ component: "graph" }),
    }),
  };
}

export { GraphDirectoryClient } from "./graph.client.js";
export { SharePointContentClient } from "./sharepoint.client.js";
export { HttpJsonClient } from "./http-client.js";
