import type { RunRecord, RunStatus } from "@statement-agents/utils";
import { asc, eq } from "drizzle-orm";
import type { Database } from "../client.js";
import { runs } from "../schema/runs.js";

export class RunRepository {
  constructor(private db: Database) {}

  upsert(record: RunRecord) {
    const values = {
      run_id: record.run_id,
      thread_id: record.thread_id,
      assistant_id: record.assistant_id,
      status: record.status,
      schema_profile: record.schema_profile,
      metadata_json: record.metadata,
      started_at: record.started_at.toISOString(),
    };
    this.db
      .insert(runs)
      .values(values)
      .onConflictDoUpdate({ target: runs.run_id, set: values })
      .run();
  }

  /** Returns the number of rows touched; 0 when the run id is unknown. */
  updateStatus(runId: string, status: RunStatus): number {
    const result = this.db.update(runs).set({ status }).where(eq(runs.run_id, runId)).run();
    return result.changes;
  }

  findByRunId(runId: string) {
    return this.db.select().from(runs).where(eq(runs.run_id, runId)).get() ?? null;
  }

  list() {
    return this.db.select().from(runs).orderBy(asc(runs.id)).all();
  }
}
