import type { MetadataStore } from "@statement-agents/db";
import {
  type AgentRunRequest,
  type AgentRunResult,
  ConfigurationError,
  DEFAULT_CONTENT_TYPE,
  DEFAULT_UPLOAD_FILENAME,
  ProtocolError,
  type UploadResult,
  type UploadSource,
} from "@statement-agents/utils";
import { z } from "zod";
import { DEFAULT_RUN_INSTRUCTIONS, REVIEW_MESSAGE, getResponseFormat } from "../agents/index.js";
import type { Settings } from "../config.js";
import { type FetchLike, OpenAIClient } from "./openai.js";
import { normalizeRunStatus } from "./run-status.js";

const FILES_SERVICE = "OpenAI Files API";
const THREADS_SERVICE = "OpenAI Threads API";
const AGENTS_SERVICE = "OpenAI Agents API";

// Only `id` is required; a malformed optional field is dropped instead of failing the call.
const fileObjectSchema = z.object({
  id: z.string().min(1),
  filename: z.string().optional().catch(undefined),
});

const threadObjectSchema = z.object({
  id: z.string().min(1),
});

const runObjectSchema = z.object({
  id: z.string().min(1),
  status: z.string().optional().catch(undefined),
  created_at: z.number().finite().optional().catch(undefined),
  dashboard_url: z.string().nullish().catch(undefined),
  assistant_id: z.string().nullish().catch(undefined),
});

/** Provider timestamps are epoch seconds; anything that is not a valid date falls back to now. */
function startedAt(createdAt: number | undefined): Date {
  if (createdAt === undefined) return new Date();
  const date = new Date(createdAt * 1000);
  return Number.isNaN(date.getTime()) ? new Date() : date;
}

export type AgentSettings = Pick<Settings, "openaiApiKey" | "openaiBaseUrl" | "openaiAssistantId">;

/** Coordinates uploads and run creation against the provider, logging each to the store. */
export class AgentService {
  constructor(
    private settings: AgentSettings,
    private store: MetadataStore | null = null,
    private fetchImplementation?: FetchLike,
  ) {}

  async uploadSource(file: UploadSource, provider: string | null): Promise<UploadResult> {
    const client = this.createClient();
    const contents = new Uint8Array(await file.arrayBuffer());
    const filename = file.name || DEFAULT_UPLOAD_FILENAME;
    const contentType = file.type || DEFAULT_CONTENT_TYPE;

    const form = new FormData();
    form.append("purpose", "assistants");
    form.append("file", new Blob([contents], { type: contentType }), filename);

    console.info(`Uploading file '${filename}' (${contents.length} bytes) to ${FILES_SERVICE}`);
    const payload = await client.postForm("/files", form, FILES_SERVICE);

    const parsed = fileObjectSchema.safeParse(payload);
    if (!parsed.success) {
      console.error(`${FILES_SERVICE} response missing file id:`, payload);
      throw new ProtocolError(`${FILES_SERVICE} response did not include a file id.`);
    }

    const result: UploadResult = {
      file_id: parsed.data.id,
      filename: parsed.data.filename ?? filename,
      provider,
      content_type: contentType,
      bytes: contents.length,
      uploaded_at: new Date(),
    };

    this.store?.logUpload({ ...result });
    return result;
  }

  async startAgentRun(request: AgentRunRequest): Promise<AgentRunResult> {
    const client = this.createClient();
    const assistantId = this.settings.openaiAssistantId;
    if (!assistantId) {
      throw new ConfigurationError("OPENAI_ASSISTANT_ID is not configured.");
    }

    const message = {
      role: "user",
      content: [{ type: "text", text: REVIEW_MESSAGE }],
      attachments: request.file_ids.map((fileId) => ({ file_id: fileId })),
    };

    console.info(`Creating thread with ${request.file_ids.length} attachments`);
    const threadPayload = await client.postJson(
      "/threads",
      { messages: [message] },
      THREADS_SERVICE,
    );
    const thread = threadObjectSchema.safeParse(threadPayload);
    if (!thread.success) {
      console.error(`${THREADS_SERVICE} response missing id:`, threadPayload);
      throw new ProtocolError(`${THREADS_SERVICE} response did not include a thread id.`);
    }
    const threadId = thread.data.id;

    const metadata = request.metadata ?? {};
    const runBody: Record<string, unknown> = { assistant_id: assistantId };
    if (Object.keys(metadata).length > 0) {
      runBody.metadata = metadata;
    }
    const responseFormat = getResponseFormat(request.response_schema);
    if (responseFormat) {
      runBody.response_format = responseFormat;
    }
    runBody.instructions = request.instructions.trim() || DEFAULT_RUN_INSTRUCTIONS;

    const runPayload = await client.postJson(
      `/threads/${encodeURIComponent(threadId)}/runs`,
      runBody,
      AGENTS_SERVICE,
    );
    const run = runObjectSchema.safeParse(runPayload);
    if (!run.success) {
      console.error(`${AGENTS_SERVICE} response missing run id:`, runPayload);
      throw new ProtocolError(`${AGENTS_SERVICE} response did not include a run id.`);
    }

    const result: AgentRunResult = {
      run_id: run.data.id,
      status: normalizeRunStatus(run.data.status),
      thread_id: threadId,
      started_at: startedAt(run.data.created_at),
      dashboard_url: run.data.dashboard_url ?? null,
      assistant_id: run.data.assistant_id ?? assistantId,
      requested_schema: request.response_schema,
      metadata,
    };

    this.store?.logRun({
      run_id: result.run_id,
      thread_id: threadId,
      assistant_id: result.assistant_id,
      status: result.status,
      schema_profile: request.response_schema,
      metadata,
      started_at: result.started_at,
    });
    return result;
  }

  private createClient(): OpenAIClient {
    const apiKey = this.settings.openaiApiKey;
    if (!apiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is not configured.");
    }
    return new OpenAIClient({
      apiKey,
      baseUrl: this.settings.openaiBaseUrl,
      fetchImplementation: this.fetchImplementation,
    });
  }
}
