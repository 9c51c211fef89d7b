/**
 * Request ID Middleware
 * Generates unique request IDs for tracking and debugging
 */

import type { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";

/**
 * Extended request with request ID
 */
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Request ID header name
 */
const REQUEST_ID_HEADER = "X-Request-ID";

/**
 * Middleware to generate and attach request ID
 * - Reuses a caller-supplied ID when it is a single non-empty header
 * - Generates a new UUID otherwise
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const incoming = req.headers[REQUEST_ID_HEADER.toLowerCase()];
  const requestId =
    typeof incoming === "string" && incoming.trim().length > 0
      ? incoming.trim()
      : uuidv4();

  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  next();
}

/**
 * Get request ID from request object
 */
export function getRequestId(req: Request): string {
  return req.requestId || "unknown";
}
