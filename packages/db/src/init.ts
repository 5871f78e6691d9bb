import { sql } from "drizzle-orm";
import type { Database } from "./client.js";

/** Creates the metadata tables when they do not exist yet. Safe to run on every start. */
export function ensureSchema(db: Database) {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS uploads (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      file_id TEXT UNIQUE NOT NULL,
      filename TEXT NOT NULL,
      provider TEXT,
      content_type TEXT NOT NULL,
      bytes INTEGER NOT NULL,
      uploaded_at TEXT NOT NULL
    )
  `);
  db.run(sql`
    CREATE TABLE IF NOT EXISTS runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id TEXT UNIQUE NOT NULL,
      thread_id TEXT NOT NULL,
      assistant_id TEXT,
      status TEXT NOT NULL,
      schema_profile TEXT,
      metadata_json TEXT,
      started_at TEXT NOT NULL
    )
  `);
}
