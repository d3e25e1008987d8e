import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Returns the ORM handle together with the raw client so callers can close the pool.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 5 });
  const db = drizzle(sql);
  return { db, sql };
};

export type Database = ReturnType<typeof createDb>["db"];
