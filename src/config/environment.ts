import { z } from "zod";
import dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable schema with validation
 * Service endpoints and tokens have placeholders so tests and the
 * `classify` dry run work without a tenant
 */
const envSchema = z.object({
  // Application
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.string().optional(),

  // Storage
  STORAGE_DRIVER: z
    .enum(["postgres", "file"])
    .default("file")
    .describe("Where output rows and checkpoints are written"),
  DATABASE_URL: z
    .string()
    .url()
    .optional()
    .default("postgresql://localhost:5432/inheritance_auditor")
    .describe("PostgreSQL connection string"),
  OUTPUT_DIR: z
    .string()
    .default("./output")
    .describe("Folder for CSV output and JSON checkpoints (file driver)"),

  // Redis (optional directory group cache persistence)
  REDIS_URL: z
    .string()
    .url()
    .optional()
    .describe("Redis connection string; unset disables the persistent cache"),
  DIRECTORY_CACHE_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(24 * 60 * 60),

  // HTTP API
  API_SECRET: z
    .string()
    .min(1)
    .optional()
    .describe("Shared bearer secret for the /api/v1 routes"),
  ALLOWED_ORIGINS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    )
    .describe("Comma-separated CORS origins outside development"),

  // Tenant and services
  TENANT_ROOT_URL: z
    .string()
    .url()
    .default("https://contoso.sharepoint.com")
    .describe("Root URL of the SharePoint tenant, e.g. https://contoso.sharepoint.com"),
  SHAREPOINT_ACCESS_TOKEN: z
    .string()
    .optional()
    .default("sp_token_placeholder"),
  GRAPH_ACCESS_TOKEN: z.string().optional().default("graph_token_placeholder"),
  GRAPH_BASE_URL: z
    .string()
    .url()
    .default("https://graph.microsoft.com/v1.0"),
  SCANNER_SETTINGS_PATH: z.string().default("./scanner-settings.json"),

  // Resilience around content and directory calls
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  REQUEST_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables
 */
function validateEnv(): Env {
  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("❌ Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment variables. Check the errors above.");
  }

  return parsed.data;
}

/**
 * Validated environment configuration
 * Throws an error at startup if validation fails
 */
export const env = validateEnv();

/**
 * Check if running in development mode
 */
export const isDevelopment = env.NODE_ENV === "development";
