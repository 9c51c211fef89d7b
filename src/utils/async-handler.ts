/**
 * Async Handler Utility
 * Wraps async controller functions: the resolved value becomes the `data`
 * of a success response, a rejection goes to the global error handler
 */

import type { Request, Response, NextFunction } from "express";
import type { ApiResponse } from "../types/index.js";

/**
 * Controller function type that returns data or throws an error
 */
export type ControllerFunction<TData = unknown> = (
  req: Request,
  res: Response
) => Promise<TData>;

/**
 * Wraps an async controller function
 *
 * @example
 * ```ts
 * router.get("/", asyncHandler(async () => scanRunner.getCurrent()));
 * ```
 */
export function asyncHandler<TData = unknown>(
  controller: ControllerFunction<TData>
): (req: Request, res: Response<ApiResponse<TData>>, next: NextFunction) => void {
  return (req, res, next) => {
    controller(req, res)
      .then((data) => {
        const statusCode = res.statusCode || 200;
        res.status(statusCode).json(successResponse(data));
      })
      .catch(next);
  };
}

/**
 * Helper to create a success response
 */
export function successResponse<TData>(
  data: TData,
  message?: string
): ApiResponse<TData> {
  return {
    success: true,
    data,
    ...(message && { message }),
  };
}
