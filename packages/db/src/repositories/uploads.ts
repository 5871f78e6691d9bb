import type { UploadRecord } from "@statement-agents/utils";
import { asc, eq } from "drizzle-orm";
import type { Database } from "../client.js";
import { uploads } from "../schema/uploads.js";

export class UploadRepository {
  constructor(private db: Database) {}

  /** Insert, or replace every field of the row that already holds this `file_id`. */
  upsert(record: UploadRecord) {
    const values = {
      file_id: record.file_id,
      filename: record.filename,
      provider: record.provider,
      content_type: record.content_type,
      bytes: record.bytes,
      uploaded_at: record.uploaded_at.toISOString(),
    };
    this.db
      .insert(uploads)
      .values(values)
      .onConflictDoUpdate({ target: uploads.file_id, set: values })
      .run();
  }

  findByFileId(fileId: string) {
    return this.db.select().from(uploads).where(eq(uploads.file_id, fileId)).get() ?? null;
  }

  list() {
    return this.db.select().from(uploads).orderBy(asc(uploads.id)).all();
  }
}
