import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import { closeDbClient, createDbClient } from "./index.js";

export async function runMigrations(): Promise<void> {
  const db = createDbClient();
  await migrate(db, {
    migrationsFolder: fileURLToPath(new URL("../drizzle", import.meta.url))
  });
}

if (import.meta.url === `file://${process.argv[1]}`) {
  runMigrations()
    .then(async () => {
      await closeDbClient();
      console.log("db migrations complete");
    })
    .catch((error: unknown) => {
      console.error("db migrations failed", error);
      process.exit(1);
    });
}
