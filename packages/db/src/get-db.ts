/**
 * packages/db - DB connection helper
 *
 * The pool behind `Db` is the process-scoped store handle: create it once at startup with
 * `getDb()`, pass it to every component, and drain it with `closeDb()` on shutdown.
 */

import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";

import * as schema from "./schema";

export type Db = ReturnType<typeof drizzle<typeof schema>>;

export interface DbOptions {
  /** Maximum pooled connections (pg default: 10) */
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

export function getDb(connectionString: string, options: DbOptions = {}): Db {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new pg.Pool({
    connectionString,
    max: options.maxConnections,
    idleTimeoutMillis: options.idleTimeoutMs,
    connectionTimeoutMillis: options.connectionTimeoutMs,
  });

  return drizzle(pool, { schema });
}

/**
 * Wait for in-flight queries and close every pooled connection
 */
export async function closeDb(db: Db): Promise<void> {
  await db.$client.end();
}
