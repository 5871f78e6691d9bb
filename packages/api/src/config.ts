import { homedir } from "node:os";
import { join } from "node:path";
import {
  ConfigurationError,
  DEFAULT_OPENAI_BASE_URL,
  ENVIRONMENTS,
  type Environment,
} from "@statement-agents/utils";
import { z } from "zod";

export interface Settings {
  environment: Environment;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiAssistantId: string | null;
  corsAllowOrigins: string[];
  dataDirectory: string;
  databasePath: string;
  port: number;
}

const DEFAULT_CORS_ORIGINS = ["http://localhost:3000"];

// Blank variables are treated as unset.
const optional = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const envSchema = z.object({
  ENVIRONMENT: optional.pipe(z.enum(ENVIRONMENTS).default("staging")),
  OPENAI_API_KEY: optional,
  OPENAI_BASE_URL: optional.pipe(z.string().url().default(DEFAULT_OPENAI_BASE_URL)),
  OPENAI_ASSISTANT_ID: optional,
  CORS_ALLOW_ORIGINS: optional,
  DATA_DIRECTORY: optional.pipe(z.string().default("./data")),
  DATABASE_PATH: optional,
  PORT: optional.pipe(z.coerce.number().int().positive().default(8000)),
});

function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Reads runtime settings from environment variables. A missing API key or assistant id is
 * not an error here; the agent service rejects requests that need them.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  const parsed = result.data;

  const origins = parsed.CORS_ALLOW_ORIGINS?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);
  const dataDirectory = expandHome(parsed.DATA_DIRECTORY);

  return {
    environment: parsed.ENVIRONMENT,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    openaiAssistantId: parsed.OPENAI_ASSISTANT_ID ?? null,
    corsAllowOrigins: origins && origins.length > 0 ? origins : DEFAULT_CORS_ORIGINS,
    dataDirectory,
    databasePath: parsed.DATABASE_PATH
      ? expandHome(parsed.DATABASE_PATH)
      : join(dataDirectory, "metadata.db"),
    port: parsed.PORT,
  };
}
