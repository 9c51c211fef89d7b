import { createHash, timingSafeEqual } from "node:crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { logger } from "../config/logger.js";
import { ServiceUnavailableError, UnauthorizedError } from "../utils/errors.js";
import { getRequestId } from "./request-id.middleware.js";

/**
 * Constant-time comparison of two secrets of any length
 */
function secretsMatch(provided: string, expected: string): boolean {
  const a = createHash("sha256").update(provided).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

/**
 * Shared-secret bearer authentication
 * Without a configured secret every request is refused.
 *
 * Usage:
 *   app.use("/api/v1", createAuthMiddleware(env.API_SECRET), routes);
 */
export function createAuthMiddleware(secret: string | undefined): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!secret) {
      logger.error({ path: req.path }, "API_SECRET is not configured; refusing request");
      next(new ServiceUnavailableError("API secret is not configured", "AUTH_NOT_CONFIGURED"));
      return;
    }

    const header = req.headers.authorization;
    if (!header || !header.startsWith("Bearer ")) {
      next(new UnauthorizedError("Missing bearer token"));
      return;
    }

    if (!secretsMatch(header.slice("Bearer ".length).trim(), secret)) {
      logger.warn({ path: req.path, requestId: getRequestId(req) }, "Rejected bearer token");
      next(new UnauthorizedError("Invalid bearer token"));
      return;
    }

    next();
  };
}
