import postgres from "postgres";
import { readConfig } from "@/lib/config";

export type Sql = postgres.Sql;

let client: Sql | null = null;

export function getSql() {
  if (client) {
    return client;
  }

  const config = readConfig();
  if (!config.DATABASE_URL) {
    throw new Error("DATABASE_URL is required");
  }

  // PgBouncer in transaction mode does not keep named prepared statements
  // between transactions, so use the simple query protocol.
  client = postgres(config.DATABASE_URL, {
    prepare: false,
    max: config.DATABASE_POOL_MAX
  });

  return client;
}
