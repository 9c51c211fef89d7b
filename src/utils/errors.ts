/**
 * Custom Error Classes
 * Provides consistent error handling across the engine, the CLI and the API
 */

/**
 * Base application error
 */
export abstract class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = true;
    if (details) {
      this.details = details;
    }

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

// =============================================================================
// AUDIT ENGINE ERRORS
// =============================================================================

/**
 * Why a URL could not be mapped to a site, library or folder
 */
export type ClassificationFailure =
  | "Malformed"
  | "OutsideTenant"
  | "NotFound"
  | "Unauthorized"
  | "Unresolvable";

/**
 * 422 - Input URL cannot be mapped to a resource; the job is skipped
 */
export class ClassificationError extends AppError {
  public readonly reason: ClassificationFailure;

  constructor(
    reason: ClassificationFailure,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, 422, "CLASSIFICATION_ERROR", { reason, ...details });
    this.reason = reason;
  }
}

/**
 * 502 - A content or directory lookup failed after retries
 * The principal or list is reported as unresolved and processing continues
 */
export class ResolutionError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, 502, "RESOLUTION_ERROR", details);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  /** Upstream HTTP status, when the failure came from a service response */
  get upstreamStatus(): number | undefined {
    return this.cause instanceof ServiceRequestError
      ? this.cause.status
      : undefined;
  }

  /** The service refused the credentials */
  get isAuthorizationFailure(): boolean {
    return this.cause instanceof ServiceRequestError && this.cause.isAuthorizationFailure;
  }
}

/**
 * 500 - Output or checkpoint write failed; fatal for the run
 */
export class SinkError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 500, "SINK_ERROR", details);
    this.isOperational = false;
  }
}

/**
 * Upstream HTTP failure from the content or directory service
 */
export class ServiceRequestError extends AppError {
  public readonly status: number;
  public readonly retryAfterMs?: number;

  constructor(
    service: string,
    status: number,
    message: string,
    retryAfterMs?: number
  ) {
    super(`${service} request failed (${status}): ${message}`, 502, "UPSTREAM_ERROR", {
      service,
      status,
    });
    this.status = status;
    if (retryAfterMs !== undefined) {
      this.retryAfterMs = retryAfterMs;
    }
  }

  /** 408, 429 and 5xx are worth another attempt */
  get isRetryable(): boolean {
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }

  get isAuthorizationFailure(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

// =============================================================================
// API ERRORS
// =============================================================================

/**
 * 400 Bad Request - Invalid input or validation error
 */
export class ValidationError extends AppError {
  constructor(
    message: string = "Invalid input",
    details?: Record<string, unknown>
  ) {
    super(message, 400, "VALIDATION_ERROR", details);
  }
}

/**
 * 401 Unauthorized - Authentication required
 */
export class UnauthorizedError extends AppError {
  constructor(message: string = "Authentication required") {
    super(message, 401, "UNAUTHORIZED");
  }
}

/**
 * 503 Service Unavailable - A required setting or dependency is missing
 */
export class ServiceUnavailableError extends AppError {
  constructor(message: string = "Service unavailable", code: string = "SERVICE_UNAVAILABLE") {
    super(message, 503, code);
  }
}

/**
 * 404 Not Found - Resource not found
 */
export class NotFoundError extends AppError {
  constructor(resource: string = "Resource", id?: string | number) {
    const message = id
      ? `${resource} not found: ${id}`
      : `${resource} not found`;
    super(message, 404, "NOT_FOUND", { resource, id });
  }
}

/**
 * 409 Conflict - e.g. a scan is already running
 */
export class ConflictError extends AppError {
  constructor(
    message: string = "Resource already exists",
    details?: Record<string, unknown>
  ) {
    super(message, 409, "CONFLICT", details);
  }
}

/**
 * 500 Internal Server Error
 */
export class InternalError extends AppError {
  constructor(
    message: string = "An internal error occurred",
    requestId?: string
  ) {
    super(
      message,
      500,
      "INTERNAL_ERROR",
      requestId ? { requestId } : undefined
    );
    this.isOperational = false;
  }
}

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap any error into an AppError
 */
export function wrapError(error: unknown, requestId?: string): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, requestId);
  }

  return new InternalError("An unexpected error occurred", requestId);
}
