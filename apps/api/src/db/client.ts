import { Pool } from "pg";
import { readDatabaseUrl } from "../lib/env";

export const DOMAIN_TABLES = ["session_results", "session_result_players"] as const;

export const AUTH_TABLES = [
  "user",
  "session",
  "account",
  "verification",
] as const;

export function isDatabaseConfigured() {
  return readDatabaseUrl() !== null;
}

export const pool = new Pool({
  connectionString: readDatabaseUrl() ?? undefined,
});
