/**
 * Logger Configuration
 * Structured logging with Pino
 */

import pino from "pino";
import { env, isDevelopment } from "./environment.js";

/**
 * Log levels
 */
type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

/**
 * Get log level from environment
 */
function getLogLevel(): LogLevel {
  const level = (env.LOG_LEVEL || "info").toLowerCase();
  const validLevels: LogLevel[] = [
    "fatal",
    "error",
    "warn",
    "info",
    "debug",
    "trace",
    "silent",
  ];
  const match = validLevels.find((candidate) => candidate === level);
  return match ?? "info";
}

/**
 * Create base logger configuration
 */
const baseOptions: pino.LoggerOptions = {
  level: getLogLevel(),
  formatters: {
    level: (label: string) => ({ level: label }),
    bindings: (bindings: pino.Bindings) => ({
      pid: bindings["pid"],
      host: bindings["hostname"],
      service: "inheritance-auditor",
    }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  redact: {
    paths: [
      "password",
      "token",
      "accessToken",
      "authorization",
      "secret",
      "*.token",
      "*.accessToken",
      "headers.authorization",
      "req.headers.authorization",
    ],
    remove: true,
  },
};

/**
 * Development transport (pretty print)
 */
const devTransport: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "HH:MM:ss.l",
    ignore: "pid,hostname",
    singleLine: false,
  },
};

/**
 * Create the logger instance
 */
export const logger = isDevelopment
  ? pino({ ...baseOptions, transport: devTransport })
  : pino(baseOptions);

export type Logger = pino.Logger;

/**
 * Create a child logger with context
 * @param context - Additional context for the logger
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Create a job-scoped logger
 * Every line carries the job index and URL so a single job can be re-run by hand
 */
export function createJobLogger(
  parent: Logger,
  runId: string,
  jobIndex: number,
  jobUrl: string
): Logger {
  return parent.child({ runId, jobIndex, jobUrl });
}

/**
 * Log application startup
 */
export function logStartup(port: number, environment: string): void {
  logger.info(
    {
      event: "server_start",
      port,
      environment,
      nodeVersion: process.version,
      timestamp: new Date().toISOString(),
    },
    `🚀 Inheritance auditor API running on port ${port} (${environment})`
  );
}

/**
 * Log application shutdown
 */
export function logShutdown(reason: string): void {
  logger.info(
    {
      event: "server_shutdown",
      reason,
      timestamp: new Date().toISOString(),
    },
    `🛑 Shutting down: ${reason}`
  );
}

/**
 * Log Redis connection
 */
export function logRedisConnection(
  status: "connected" | "disconnected" | "error",
  detail?: string
): void {
  const level = status === "error" ? "error" : "info";
  logger[level](
    {
      event: "redis_connection",
      status,
      ...(detail && { detail }),
      timestamp: new Date().toISOString(),
    },
    `Redis ${status}`
  );
}
