import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema";

type Database = PostgresJsDatabase<typeof schema>;

let client: ReturnType<typeof postgres> | null = null;
let db: Database | null = null;

/**
 * Lazily connect; only the postgres cache backend needs DATABASE_URL.
 */
export function getDb(): Database {
  if (db) return db;

  const DATABASE_URL = process.env.DATABASE_URL;
  if (!DATABASE_URL) {
    throw new Error("DATABASE_URL environment variable is required for the postgres cache backend");
  }

  client = postgres(DATABASE_URL);
  db = drizzle(client, { schema });
  return db;
}

export async function closeDb() {
  if (!client) return;
  await client.end();
  client = null;
  db = null;
}
