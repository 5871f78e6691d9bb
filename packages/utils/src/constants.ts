export const MAX_UPLOAD_MB = 25;
export const MAX_UPLOAD_BYTES = MAX_UPLOAD_MB * 1024 * 1024;
/** Largest request body the server reads: one upload plus room for the multipart framing. */
export const MAX_REQUEST_BODY_BYTES = MAX_UPLOAD_BYTES + 1024 * 1024;

export const SPREADSHEET_CONTENT_TYPES = [
  "text/csv",
  "application/vnd.ms-excel",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
] as const;
export type SpreadsheetContentType = (typeof SPREADSHEET_CONTENT_TYPES)[number];

export const DEFAULT_UPLOAD_FILENAME = "upload";
export const DEFAULT_CONTENT_TYPE = "application/octet-stream";

export const RUN_STATUSES = ["queued", "running", "completed", "failed", "cancelled"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export const SCHEMA_PROFILE_NAMES = ["default", "income_cashflow_expense"] as const;
export type SchemaProfileName = (typeof SCHEMA_PROFILE_NAMES)[number];
export const DEFAULT_SCHEMA_PROFILE: SchemaProfileName = "income_cashflow_expense";

export const ENVIRONMENTS = ["local", "staging", "production"] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
export const OPENAI_BETA_HEADER = "assistants=v2";

/** One minute per provider request, no retries. */
export const UPSTREAM_TIMEOUT_MS = 60_000;
/** Upstream error bodies are cut to this many characters before they reach logs or callers. */
export const UPSTREAM_ERROR_BODY_LIMIT = 500;
