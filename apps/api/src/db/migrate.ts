import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { logEvent } from "../lib/logger";
import { pool } from "./client";

const __filename = fileURLToPath(import.meta.url);
const __dirname = fileURLToPath(new URL(".", import.meta.url));
const schemaPath = join(__dirname, "schema.sql");

export async function runMigrations() {
  const sql = readFileSync(schemaPath, "utf8");
  await pool.query(sql);
}

if (process.argv[1] === __filename) {
  runMigrations()
    .then(() => {
      logEvent("info", "db_schema_applied", { schemaPath });
    })
    .catch((error: unknown) => {
      logEvent("error", "db_migration_failed", {
        error: error instanceof Error ? error.message : "UNKNOWN_ERROR",
      });
      process.exitCode = 1;
    })
    .finally(async () => {
      await pool.end();
    });
}
