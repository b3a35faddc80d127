/**
 * Database Initialization
 * PostgreSQL via drizzle-orm and the postgres driver
 */

import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { redactUrl } from "../lib/config";
import { logger } from "../lib/logger";
import * as schema from "./schema";

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseOptions {
  url: string;
  /** Server-side statement timeout and client connect timeout, in ms */
  timeoutMs: number;
  maxConnections?: number;
}

let db: Database | null = null;
let pgConnection: ReturnType<typeof postgres> | null = null;

/**
 * Open the connection pool. Connections are lazy, so an unreachable server
 * surfaces on the first query rather than here.
 */
export function initializeDatabase(options: DatabaseOptions): Database {
  if (db) {
    logger.warn("Database already initialized");
    return db;
  }

  logger.info({ url: redactUrl(options.url) }, "Initializing PostgreSQL database connection...");

  pgConnection = postgres(options.url, {
    max: options.maxConnections ?? 10,
    connect_timeout: Math.max(1, Math.ceil(options.timeoutMs / 1000)),
    idle_timeout: 30,
    connection: {
      application_name: "sitepulse",
      statement_timeout: options.timeoutMs,
    },
  });
  db = drizzle(pgConnection, { schema });

  logger.info("PostgreSQL connection pool ready");
  return db;
}

/**
 * Close database connection
 */
export async function closeDatabase(): Promise<void> {
  if (pgConnection) {
    await pgConnection.end({ timeout: 5 });
    pgConnection = null;
  }
  db = null;
  logger.info("Database connection closed");
}

export { schema };
