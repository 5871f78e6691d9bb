import { RUN_STATUSES } from "@statement-agents/utils";
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const runs = sqliteTable("runs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  run_id: text("run_id").notNull().unique(),
  thread_id: text("thread_id").notNull(),
  assistant_id: text("assistant_id"),
  status: text("status", { enum: RUN_STATUSES }).notNull(),
  schema_profile: text("schema_profile"),
  metadata_json: text("metadata_json", { mode: "json" }).$type<Record<string, string>>(),
  started_at: text("started_at").notNull(),
});
