/**
 * Bounded retry with backoff and a per-attempt timeout
 * Wraps every content and directory service call
 */

import { ResolutionError, ServiceRequestError, errorMessage } from "./errors.js";

export interface RetryPolicy {
  /** Attempts after the first one */
  retries: number;
  /** Delay before retry n is baseDelayMs * n unless the service sent Retry-After */
  baseDelayMs: number;
  timeoutMs: number;
  /** Injected in tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryContext {
  operation: string;
  details?: Record<string, unknown>;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

class AttemptTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryable(error: unknown): boolean {
  if (error instanceof ServiceRequestError) {
    return error.isRetryable;
  }
  // Timeouts and network failures
  return true;
}

/**
 * Run fn until it succeeds, a non-retryable error occurs or the retries run out.
 * Every failure leaves as a ResolutionError carrying the last error as cause.
 * @param fn - Receives an AbortSignal that fires when the attempt times out
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  context: RetryContext
): Promise<T> {
  const sleep = policy.sleep ?? delay;
  let lastError: unknown;

  for (let attempt = 0; attempt <= policy.retries; attempt++) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), policy.timeoutMs);

    try {
      return await fn(controller.signal);
    } catch (error) {
      lastError = controller.signal.aborted
        ? new AttemptTimeoutError(policy.timeoutMs)
        : error;

      if (!isRetryable(lastError) || attempt === policy.retries) {
        break;
      }

      const retryAfter =
        lastError instanceof ServiceRequestError ? lastError.retryAfterMs : undefined;
      const waitMs = retryAfter ?? policy.baseDelayMs * (attempt + 1);
      context.onRetry?.(attempt + 1, lastError, waitMs);
      await sleep(waitMs);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  throw new ResolutionError(
    `${context.operation} failed: ${errorMessage(lastError)}`,
    {
      operation: context.operation,
      ...context.details,
      ...(lastError instanceof ServiceRequestError && { status: lastError.status }),
    },
    lastError
  );
}
