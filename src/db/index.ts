import { sql } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { createLogger } from "../config/logger.js";
import * as schema from "./schema.js";

const log = createLogger({ component: "database" });

export type Database = NodePgDatabase<typeof schema>;

export type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

export interface DatabaseConnection {
  db: Database;
  /** Round trip to the server */
  ping: () => Promise<void>;
  close: () => Promise<void>;
}

/**
 * Open a pool for the output and checkpoint tables
 * Connections are made on first query
 * @param connectionString - PostgreSQL URL
 */
export function connectDatabase(connectionString: string): DatabaseConnection {
  const pool = new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on("error", (err) => {
    log.error({ error: err.message }, "Unexpected PostgreSQL pool error");
  });

  const db = drizzle(pool, { schema });

  return {
    db,
    ping: async () => {
      await db.execute(sql`SELECT 1`);
    },
    close: async () => {
      await pool.end();
      log.info("Database connections closed");
    },
  };
}
