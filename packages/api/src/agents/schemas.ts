import { readFileSync } from "node:fs";

export interface ResponseFormat {
  type: "json_schema";
  json_schema: Record<string, unknown>;
  strict: true;
}

function loadSchema(file: string): Record<string, unknown> {
  return JSON.parse(readFileSync(new URL(file, import.meta.url), "utf-8"));
}

const profiles = new Map<string, ResponseFormat>([
  [
    "income_cashflow_expense",
    {
      type: "json_schema",
      json_schema: loadSchema("./financial-report.schema.json"),
      strict: true,
    },
  ],
]);

/** `response_format` payload for a schema profile, or null when the profile has none. */
export function getResponseFormat(profile: string): ResponseFormat | null {
  return profiles.get(profile) ?? null;
}
