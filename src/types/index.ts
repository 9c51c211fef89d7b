/**
 * Standard API success response
 */
export interface ApiResponse<T> {
  success: true;
  data: T;
  message?: string;
}

/**
 * Standard API error response
 */
export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    requestId?: string;
    stack?: string;
  };
}

/**
 * Result of a single dependency probe
 */
export interface DependencyCheck {
  status: "ok" | "error" | "disabled";
  latency?: number;
  error?: string;
}
