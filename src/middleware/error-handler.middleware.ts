/**
 * Global Error Handler Middleware
 * Catches all errors and returns consistent error responses
 */

import type {
  Request,
  Response,
  NextFunction,
  ErrorRequestHandler,
} from "express";
import { wrapError } from "../utils/errors.js";
import { logger } from "../config/logger.js";
import { isDevelopment } from "../config/environment.js";
import type { ApiErrorResponse } from "../types/index.js";
import { getRequestId } from "./request-id.middleware.js";

/**
 * Body parser failures carry an HTTP status and a `type`
 */
function isMalformedBody(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

/**
 * Global error handler middleware
 * Should be registered AFTER all routes
 */
export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response<ApiErrorResponse>,
  _next: NextFunction
): void => {
  const requestId = getRequestId(req);

  if (isMalformedBody(err)) {
    res.status(400).json({
      success: false,
      error: {
        code: "VALIDATION_ERROR",
        message: "Request body is not valid JSON",
        requestId,
      },
    });
    return;
  }

  const appError = wrapError(err, requestId);

  const logContext = {
    requestId,
    method: req.method,
    path: req.path,
    statusCode: appError.statusCode,
    errorCode: appError.code,
    isOperational: appError.isOperational,
  };

  if (appError.isOperational) {
    logger.warn(logContext, `[${appError.code}] ${appError.message}`);
  } else {
    logger.error(
      {
        ...logContext,
        stack: appError.stack,
        originalError: err instanceof Error ? err.message : String(err),
      },
      `[${appError.code}] ${appError.message}`
    );
  }

  const response: ApiErrorResponse = {
    success: false,
    error: {
      code: appError.code,
      message: appError.isOperational
        ? appError.message
        : "An internal error occurred",
      requestId,
    },
  };

  if (appError.isOperational && appError.details) {
    response.error.details = appError.details;
  }

  if (isDevelopment && appError.stack) {
    response.error.stack = appError.stack;
  }

  res.status(appError.statusCode).json(response);
};

/**
 * Not found handler
 * Returns 404 for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response<ApiErrorResponse>): void {
  res.status(404).json({
    success: false,
    error: {
      code: "NOT_FOUND",
      message: `Route not found: ${req.method} ${req.path}`,
      requestId: getRequestId(req),
    },
  });
}
