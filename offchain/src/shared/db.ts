import { Pool, QueryResult } from "pg";
import { logger } from "./logger";

let pool: Pool | null = null;
let dbConnected = false;

/**
 * Anything that can run a parameterised query. The pg pool satisfies it;
 * tests pass an in-memory stand-in.
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<Pick<QueryResult, "rows" | "rowCount">>;
}

export async function initDatabase(connectionString: string | undefined): Promise<boolean> {
  if (!connectionString) {
    logger.warn("[DB] DATABASE_URL not set. Event journal disabled.");
    return false;
  }

  try {
    pool = new Pool({
      connectionString,
    });

    // Test connection
    await pool.query("SELECT 1");
    dbConnected = true;
    logger.info("[DB] Connected to Postgres");
    return true;
  } catch (error) {
    logger.error("[DB] Failed to connect to Postgres", { error });
    throw error;
  }
}

export function isDatabaseConnected(): boolean {
  return dbConnected;
}

export const query = async (text: string, params?: unknown[]) => {
  if (!pool || !dbConnected) {
    throw new Error("Database not connected");
  }
  return pool.query(text, params);
};

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    dbConnected = false;
  }
}
