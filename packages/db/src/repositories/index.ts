import type { Database } from "../client.js";
import { RunRepository } from "./runs.js";
import { UploadRepository } from "./uploads.js";

export { RunRepository, UploadRepository };

export interface Repositories {
  uploads: UploadRepository;
  runs: RunRepository;
}

export function createRepositories(db: Database): Repositories {
  return {
    uploads: new UploadRepository(db),
    runs: new RunRepository(db),
  };
}
