import type { RunRecord, RunStatus, UploadRecord } from "@statement-agents/utils";
import { withConnection } from "./client.js";
import { ensureSchema } from "./init.js";
import { type Repositories, createRepositories } from "./repositories/index.js";

// Side-writes give up quickly on a locked file rather than stall every in-flight request.
const SIDE_WRITE_BUSY_TIMEOUT_MS = 250;

export type WriteErrorHandler = (error: unknown, write: string) => void;

export interface MetadataStoreOptions {
  /** Called when a scheduled side-write fails. Defaults to logging the failure. */
  onWriteError?: WriteErrorHandler;
}

const logWriteError: WriteErrorHandler = (error, write) => {
  console.error(`Metadata write failed (${write}):`, error);
};

/**
 * SQLite-backed log of uploads and runs.
 *
 * `logUpload` and `logRun` are best-effort side-writes: they return immediately, run on a later
 * turn of the event loop, and report failures to `onWriteError` instead of the caller. Each write
 * opens its own connection and closes it once the statement has committed.
 */
export class MetadataStore {
  private pending = new Set<Promise<void>>();
  private onWriteError: WriteErrorHandler;

  constructor(
    private databasePath: string,
    options: MetadataStoreOptions = {},
  ) {
    this.onWriteError = options.onWriteError ?? logWriteError;
    withConnection(this.databasePath, ensureSchema);
  }

  logUpload(record: UploadRecord): void {
    console.debug(`Persisting upload metadata for file_id=${record.file_id}`);
    this.schedule(`upload ${record.file_id}`, (repos) => repos.uploads.upsert(record));
  }

  logRun(record: RunRecord): void {
    console.debug(`Persisting run metadata for run_id=${record.run_id}`);
    this.schedule(`run ${record.run_id}`, (repos) => repos.runs.upsert(record));
  }

  /** Resolves to false when no run with this id has been logged. */
  async updateRunStatus(runId: string, status: RunStatus): Promise<boolean> {
    console.debug(`Updating run status run_id=${runId} status=${status}`);
    await nextTick();
    const changes = withConnection(this.databasePath, (db) =>
      createRepositories(db).runs.updateStatus(runId, status),
    );
    return changes > 0;
  }

  /** Waits for every scheduled side-write, including ones scheduled while waiting. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  private schedule(write: string, fn: (repos: Repositories) => void) {
    const task: Promise<void> = nextTick()
      .then(() => {
        withConnection(this.databasePath, (db) => fn(createRepositories(db)), {
          busyTimeoutMs: SIDE_WRITE_BUSY_TIMEOUT_MS,
        });
      })
      .catch((error: unknown) => this.reportWriteError(error, write))
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  private reportWriteError(error: unknown, write: string) {
    try {
      this.onWriteError(error, write);
    } catch (hookError) {
      console.error(`Metadata write error handler failed (${write}):`, hookError);
    }
  }
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
