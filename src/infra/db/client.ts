import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Builds both typed ORM and raw SQL clients so the caller can close the pool once the command finishes.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 5 });
  const db = drizzle(sql);
  return { db, sql };
};
