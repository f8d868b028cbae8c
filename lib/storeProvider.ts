import { readConfig } from "@/lib/config";
import { getSql } from "@/lib/db";
import { createMemoryStore } from "@/lib/memoryStore";
import { createPostgresStore } from "@/lib/repository";
import type { TournamentStore } from "@/lib/store";

let store: TournamentStore | null = null;

/**
 * PostgreSQL when DATABASE_URL is set, otherwise a process-local store that
 * forgets everything on restart.
 */
export function getStore() {
  if (!store) {
    store = readConfig().DATABASE_URL ? createPostgresStore(getSql()) : createMemoryStore();
  }

  return store;
}
