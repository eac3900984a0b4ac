import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";

import { maskDatabaseUrl } from "../config.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool } = pg;

export interface DatabaseHandle {
  db: Kysely<Database>;
  close: () => Promise<void>;
}

/**
 * Open a pooled Kysely instance for one run
 */
export function createDatabase(databaseUrl: string): DatabaseHandle {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 1, // single writer
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5000,
  });

  pool.on("error", (error) => {
    dbLogger.error({ error }, "Idle database client error");
  });

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });

  dbLogger.debug({ url: maskDatabaseUrl(databaseUrl) }, "Database pool created");

  return {
    db,
    close: async () => {
      try {
        // db.destroy() also ends the pool
        await db.destroy();
        dbLogger.debug("Database connection closed");
      } catch (error) {
        dbLogger.error({ error }, "Error closing database connection");
        throw error;
      }
    },
  };
}
