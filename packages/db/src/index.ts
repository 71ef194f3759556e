import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import * as schema from "./schema.js";

let pool: Pool | undefined;

export function createDbClient(databaseUrl = process.env.DATABASE_URL) {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }

  if (!pool) {
    pool = new Pool({
      connectionString: databaseUrl
    });
  }

  return drizzle(pool, { schema });
}

export async function closeDbClient(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = undefined;
  await current.end();
}

export type CadenceDb = ReturnType<typeof createDbClient>;

export * from "./schema.js";
export * from "./mappers.js";
export * from "./repos/index.js";
export { eq, desc, and, sql } from "drizzle-orm";
