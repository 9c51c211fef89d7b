/**
 * JSON-over-HTTP helper shared by the SharePoint and Graph clients
 * Adds the bearer token, applies the retry policy and validates payloads with zod
 */

import type { z } from "zod";
import type { Logger } from "../config/logger.js";
import type { TokenProvider } from "../types/clients.js";
import { ServiceRequestError } from "../utils/errors.js";
import { withRetry, type RetryPolicy } from "../utils/retry.js";

export interface HttpJsonClientOptions {
  /** Name used in errors and logs */
  service: string;
  getToken: TokenProvider;
  policy: RetryPolicy;
  logger: Logger;
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

export class HttpJsonClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpJsonClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * GET a JSON document
   * @param url - Absolute URL
   * @param schema - Shape of the payload
   * @param operation - Label for logs and errors
   * @returns Parsed payload, or null when the service answers 404
   */
  async getJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    operation: string
  ): Promise<T | null> {
    return withRetry(
      async (signal) => {
        const token = await this.options.getToken();
        const response = await this.fetchImpl(url, {
          method: "GET",
          headers: {
            Accept: "application/json",
            Authorization: `Bearer ${token}`,
            ...this.options.headers,
          },
          signal,
        });

        if (response.status === 404) {
          return null;
        }

        if (!response.ok) {
          const body = await response.text().catch(() => "");
          throw new ServiceRequestError(
            this.options.service,
            response.status,
            body.slice(0, 500) || response.statusText,
            parseRetryAfter(response.headers.get("retry-after"))
          );
        }

        const payload: unknown = await response.json();
        const parsed = schema.safeParse(payload);
        if (!parsed.success) {
          throw new ServiceRequestError(
            this.options.service,
            response.status,
            `Unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`
          );
        }
        return parsed.data;
      },
      this.options.policy,
      {
        operation: `${this.options.service} ${operation}`,
        details: { url },
        onRetry: (attempt, error, delayMs) => {
          this.options.logger.warn(
            {
              url,
              attempt,
              delayMs,
              error: error instanceof Error ? error.message : String(error),
            },
            `${this.options.service} ${operation}: retrying`
          );
        },
      }
    );
  }
}
