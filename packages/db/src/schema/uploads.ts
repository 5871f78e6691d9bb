import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const uploads = sqliteTable("uploads", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  file_id: text("file_id").notNull().unique(),
  filename: text("filename").notNull(),
  provider: text("provider"),
  content_type: text("content_type").notNull(),
  bytes: integer("bytes").notNull(),
  uploaded_at: text("uploaded_at").notNull(),
});
