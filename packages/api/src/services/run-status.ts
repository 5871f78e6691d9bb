import { RUN_STATUSES, type RunStatus } from "@statement-agents/utils";

const PROVIDER_STATUS_MAP: Record<string, RunStatus> = {
  in_progress: "running",
  requires_action: "running",
  cancelling: "running",
  expired: "failed",
  incomplete: "failed",
};

function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUSES.some((status) => status === value);
}

/** Folds the provider's run statuses onto the five we record. Unknown values count as queued. */
export function normalizeRunStatus(value: string | undefined): RunStatus {
  if (value === undefined) return "queued";
  if (isRunStatus(value)) return value;
  return Object.hasOwn(PROVIDER_STATUS_MAP, value) ? PROVIDER_STATUS_MAP[value] : "queued";
}
