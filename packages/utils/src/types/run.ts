import { z } from "zod";
import {
  DEFAULT_SCHEMA_PROFILE,
  RUN_STATUSES,
  type RunStatus,
  SCHEMA_PROFILE_NAMES,
} from "../constants.js";

export const startRunSchema = z.object({
  file_ids: z.array(z.string().min(1)).min(1, "At least one file id is required"),
  instructions: z.string(),
  response_schema: z.enum(SCHEMA_PROFILE_NAMES).default(DEFAULT_SCHEMA_PROFILE),
  metadata: z.record(z.string()).nullish(),
});
export type StartRunInput = z.infer<typeof startRunSchema>;

export const updateRunStatusSchema = z.object({
  status: z.enum(RUN_STATUSES),
});
export type UpdateRunStatusInput = z.infer<typeof updateRunStatusSchema>;

/**
 * Input accepted by the run orchestrator. `response_schema` is a plain string here:
 * names outside the registry start a run without structured-output enforcement.
 */
export interface AgentRunRequest {
  file_ids: string[];
  instructions: string;
  response_schema: string;
  metadata?: Record<string, string> | null;
}

export interface RunRecord {
  run_id: string;
  thread_id: string;
  assistant_id: string | null;
  status: RunStatus;
  schema_profile: string | null;
  metadata: Record<string, string>;
  started_at: Date;
}

export interface AgentRunResult {
  run_id: string;
  status: RunStatus;
  thread_id: string;
  started_at: Date;
  dashboard_url: string | null;
  assistant_id: string;
  requested_schema: string;
  metadata: Record<string, string>;
}
