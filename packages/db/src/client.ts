import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import SQLite from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema/index.js";

export type Database = ReturnType<typeof createDb>;

export interface ConnectionOptions {
  /** How long a statement waits on another connection's lock, blocking the event loop meanwhile. */
  busyTimeoutMs?: number;
}

const BUSY_TIMEOUT_MS = 5_000;

export function createDb(path: string, options: ConnectionOptions = {}) {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const client = new SQLite(path);
  client.pragma(`busy_timeout = ${options.busyTimeoutMs ?? BUSY_TIMEOUT_MS}`);
  return drizzle(client, { schema });
}

/** Opens a connection, hands it to `fn`, and closes it again whatever happens. */
export function withConnection<T>(
  path: string,
  fn: (db: Database) => T,
  options: ConnectionOptions = {},
): T {
  const db = createDb(path, options);
  try {
    return fn(db);
  } finally {
    db.$client.close();
  }
}
