import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MetadataStore, createRepositories, withConnection } from "@statement-agents/db";
import {
  ConfigurationError,
  ConnectivityError,
  ProtocolError,
  UpstreamStatusError,
} from "@statement-agents/utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_RUN_INSTRUCTIONS,
  REVIEW_MESSAGE,
  getResponseFormat,
} from "../src/agents/index.js";
import { AgentService, type AgentSettings } from "../src/services/agent-service.js";
import { buildFetchMock, jsonBody, jsonResponse, uploadSource } from "./helpers.js";

const settings: AgentSettings = {
  openaiApiKey: "test-key",
  openaiBaseUrl: "https://provider.test/v1",
  openaiAssistantId: "asst_test",
};

describe("AgentService", () => {
  let dir: string;
  let databasePath: string;
  let store: MetadataStore;

  const readUploads = () =>
    withConnection(databasePath, (db) => createRepositories(db).uploads.list());
  const readRuns = () => withConnection(databasePath, (db) => createRepositories(db).runs.list());

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "agent-service-"));
    databasePath = join(dir, "metadata.db");
    store = new MetadataStore(databasePath);
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    await store.drain();
    rmSync(dir, { recursive: true, force: true });
  });

  describe("uploadSource", () => {
    it("forwards the file to the Files endpoint and logs the upload", async () => {
      const { calls, mock } = buildFetchMock([
        jsonResponse({ id: "file_abc", filename: "q1.csv" }),
      ]);
      const service = new AgentService(settings, store, mock);
      const before = Date.now();

      const result = await service.uploadSource(
        uploadSource("q1.csv", "text/csv", "a".repeat(1024)),
        null,
      );

      expect(result).toEqual({
        file_id: "file_abc",
        filename: "q1.csv",
        provider: null,
        content_type: "text/csv",
        bytes: 1024,
        uploaded_at: expect.any(Date),
      });
      expect(result.uploaded_at.getTime()).toBeGreaterThanOrEqual(before);
      expect(result.uploaded_at.getTime()).toBeLessThanOrEqual(Date.now());

      expect(calls).toHaveLength(1);
      expect(calls[0].url).toBe("https://provider.test/v1/files");
      expect(calls[0].init.method).toBe("POST");
      const headers = new Headers(calls[0].init.headers);
      expect(headers.get("Authorization")).toBe("Bearer test-key");
      expect(headers.get("OpenAI-Beta")).toBe("assistants=v2");

      const body = calls[0].init.body;
      if (!(body instanceof FormData)) throw new Error("expected a multipart body");
      expect(body.get("purpose")).toBe("assistants");
      const part = body.get("file");
      if (part === null || typeof part === "string") throw new Error("expected a file part");
      expect(part.name).toBe("q1.csv");
      expect(part.type).toBe("text/csv");
      expect(part.size).toBe(1024);

      await store.drain();
      const rows = readUploads();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        file_id: "file_abc",
        filename: "q1.csv",
        provider: null,
        content_type: "text/csv",
        bytes: 1024,
        uploaded_at: result.uploaded_at.toISOString(),
      });
    });

    it("counts bytes rather than characters", async () => {
      const { mock } = buildFetchMock([jsonResponse({ id: "file_1" })]);
      const service = new AgentService(settings, store, mock);

      const result = await service.uploadSource(
        uploadSource("fx.csv", "text/csv", "€1,€2"),
        null,
      );

      expect(result.bytes).toBe(9);
    });

    it("falls back to the caller's filename and keeps the provider hint", async () => {
      const { mock } = buildFetchMock([jsonResponse({ id: "file_1" })]);
      const service = new AgentService(settings, store, mock);

      const result = await service.uploadSource(
        uploadSource("ledger.csv", "text/csv", "x"),
        "xero",
      );

      expect(result).toMatchObject({ file_id: "file_1", filename: "ledger.csv", provider: "xero" });
    });

    it("defaults a missing filename and content type", async () => {
      const { mock } = buildFetchMock([jsonResponse({ id: "file_1" })]);
      const service = new AgentService(settings, store, mock);

      const result = await service.uploadSource(uploadSource("", "", "x"), null);

      expect(result.filename).toBe("upload");
      expect(result.content_type).toBe("application/octet-stream");
    });

    it("fails before calling the provider when no API key is set", async () => {
      const { mock } = buildFetchMock([]);
      const service = new AgentService({ ...settings, openaiApiKey: null }, store, mock);

      await expect(
        service.uploadSource(uploadSource("q1.csv", "text/csv", "x"), null),
      ).rejects.toThrow(new ConfigurationError("OPENAI_API_KEY is not configured."));
      expect(mock).not.toHaveBeenCalled();
    });

    it("reports the upstream status and at most 500 characters of the body", async () => {
      const { mock } = buildFetchMock([new Response("x".repeat(800), { status: 500 })]);
      const service = new AgentService(settings, store, mock);

      const err = await service
        .uploadSource(uploadSource("q1.csv", "text/csv", "x"), null)
        .catch((e: unknown) => e);

      if (!(err instanceof UpstreamStatusError)) throw new Error("expected UpstreamStatusError");
      expect(err.upstreamStatus).toBe(500);
      expect(err.body).toBe("x".repeat(500));
      expect(err.message).toBe(`OpenAI Files API error (500): ${"x".repeat(500)}`);
      expect(err.statusCode).toBe(502);
      expect(err.code).toBe("UPSTREAM_ERROR");
    });

    it("maps transport failures to a connectivity error", async () => {
      const failure = new TypeError("fetch failed", {
        cause: new Error("getaddrinfo ENOTFOUND provider.test"),
      });
      const { mock } = buildFetchMock([failure]);
      const service = new AgentService(settings, store, mock);

      await expect(
        service.uploadSource(uploadSource("q1.csv", "text/csv", "x"), null),
      ).rejects.toThrow(
        new ConnectivityError(
          "OpenAI Files API",
          "fetch failed (getaddrinfo ENOTFOUND provider.test)",
        ),
      );
    });

    it("reports a timeout as a connectivity error", async () => {
      const timeout = Object.assign(new Error("The operation was aborted due to timeout"), {
        name: "TimeoutError",
      });
      const { mock } = buildFetchMock([timeout]);
      const service = new AgentService(settings, store, mock);

      const err = await service
        .uploadSource(uploadSource("q1.csv", "text/csv", "x"), null)
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ConnectivityError);
      expect(err).toHaveProperty("message", "Failed to reach OpenAI Files API: request timed out");
    });

    it("rejects a success response without a file id and logs nothing", async () => {
      const { mock } = buildFetchMock([jsonResponse({ filename: "q1.csv" })]);
      const service = new AgentService(settings, store, mock);

      await expect(
        service.uploadSource(uploadSource("q1.csv", "text/csv", "x"), null),
      ).rejects.toThrow(
        new ProtocolError("OpenAI Files API response did not include a file id."),
      );

      await store.drain();
      expect(readUploads()).toEqual([]);
    });

    it("rejects a success response that is not JSON", async () => {
      const { mock } = buildFetchMock([new Response("<html>ok</html>", { status: 200 })]);
      const service = new AgentService(settings, store, mock);

      await expect(
        service.uploadSource(uploadSource("q1.csv", "text/csv", "x"), null),
      ).rejects.toBeInstanceOf(ProtocolError);
    });

    it("returns the result even when the metadata write fails", async () => {
      const onWriteError = vi.fn();
      const failingStore = new MetadataStore(databasePath, { onWriteError });
      withConnection(databasePath, (db) => db.$client.exec("DROP TABLE uploads"));
      const { mock } = buildFetchMock([jsonResponse({ id: "file_abc" })]);
      const service = new AgentService(settings, failingStore, mock);

      const result = await service.uploadSource(uploadSource("q1.csv", "text/csv", "x"), null);
      await failingStore.drain();

      expect(result.file_id).toBe("file_abc");
      expect(onWriteError).toHaveBeenCalledTimes(1);
    });

    it("works without a store", async () => {
      const { mock } = buildFetchMock([jsonResponse({ id: "file_abc" })]);
      const service = new AgentService(settings, null, mock);

      await expect(
        service.uploadSource(uploadSource("q1.csv", "text/csv", "x"), null),
      ).resolves.toMatchObject({ file_id: "file_abc" });
    });
  });

  describe("startAgentRun", () => {
    it("creates a thread, starts a run with the default instructions, and logs it", async () => {
      const { calls, mock } = buildFetchMock([
        jsonResponse({ id: "thread_1" }),
        jsonResponse({ id: "run_1", status: "queued", created_at: 1700000000 }),
      ]);
      const service = new AgentService(settings, store, mock);

      const result = await service.startAgentRun({
        file_ids: ["file_abc"],
        instructions: "",
        response_schema: "income_cashflow_expense",
      });

      expect(result).toEqual({
        run_id: "run_1",
        status: "queued",
        thread_id: "thread_1",
        started_at: new Date("2023-11-14T22:13:20.000Z"),
        dashboard_url: null,
        assistant_id: "asst_test",
        requested_schema: "income_cashflow_expense",
        metadata: {},
      });

      expect(calls).toHaveLength(2);
      expect(calls[0].url).toBe("https://provider.test/v1/threads");
      expect(new Headers(calls[0].init.headers).get("Content-Type")).toBe("application/json");
      expect(jsonBody(calls[0])).toEqual({
        messages: [
          {
            role: "user",
            content: [{ type: "text", text: REVIEW_MESSAGE }],
            attachments: [{ file_id: "file_abc" }],
          },
        ],
      });

      expect(calls[1].url).toBe("https://provider.test/v1/threads/thread_1/runs");
      expect(jsonBody(calls[1])).toEqual({
        assistant_id: "asst_test",
        response_format: getResponseFormat("income_cashflow_expense"),
        instructions: DEFAULT_RUN_INSTRUCTIONS,
      });

      await store.drain();
      const rows = readRuns();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        run_id: "run_1",
        thread_id: "thread_1",
        assistant_id: "asst_test",
        status: "queued",
        schema_profile: "income_cashflow_expense",
        metadata_json: {},
        started_at: "2023-11-14T22:13:20.000Z",
      });
    });

    it("keeps attachment order, trims instructions, and forwards metadata", async () => {
      const { calls, mock } = buildFetchMock([
        jsonResponse({ id: "thread_9" }),
        jsonResponse({
          id: "run_2",
          status: "in_progress",
          assistant_id: "asst_other",
          dashboard_url: "https://dashboard.test/runs/run_2",
        }),
      ]);
      const service = new AgentService(settings, store, mock);
      const before = Date.now();

      const result = await service.startAgentRun({
        file_ids: ["file_b", "file_a"],
        instructions: "  Focus on Q1 revenue  ",
        response_schema: "default",
        metadata: { client: "acme" },
      });

      expect(jsonBody(calls[0])).toMatchObject({
        messages: [{ attachments: [{ file_id: "file_b" }, { file_id: "file_a" }] }],
      });
      expect(jsonBody(calls[1])).toEqual({
        assistant_id: "asst_test",
        metadata: { client: "acme" },
        instructions: "Focus on Q1 revenue",
      });
      expect(result).toMatchObject({
        run_id: "run_2",
        status: "running",
        thread_id: "thread_9",
        dashboard_url: "https://dashboard.test/runs/run_2",
        assistant_id: "asst_other",
        requested_schema: "default",
        metadata: { client: "acme" },
      });
      expect(result.started_at.getTime()).toBeGreaterThanOrEqual(before);
    });

    it("omits response_format for a profile outside the registry", async () => {
      const { calls, mock } = buildFetchMock([
        jsonResponse({ id: "thread_1" }),
        jsonResponse({ id: "run_1" }),
      ]);
      const service = new AgentService(settings, store, mock);

      const result = await service.startAgentRun({
        file_ids: ["file_abc"],
        instructions: "Summarise",
        response_schema: "balance_sheet",
        metadata: {},
      });

      expect(jsonBody(calls[1])).toEqual({ assistant_id: "asst_test", instructions: "Summarise" });
      expect(result.status).toBe("queued");
      expect(result.requested_schema).toBe("balance_sheet");
    });

    it("requires an assistant id before calling the provider", async () => {
      const { mock } = buildFetchMock([]);
      const service = new AgentService({ ...settings, openaiAssistantId: null }, store, mock);

      await expect(
        service.startAgentRun({
          file_ids: ["file_abc"],
          instructions: "",
          response_schema: "income_cashflow_expense",
        }),
      ).rejects.toThrow(new ConfigurationError("OPENAI_ASSISTANT_ID is not configured."));
      expect(mock).not.toHaveBeenCalled();
    });

    it("requires an API key before calling the provider", async () => {
      const { mock } = buildFetchMock([]);
      const service = new AgentService({ ...settings, openaiApiKey: null }, store, mock);

      await expect(
        service.startAgentRun({
          file_ids: ["file_abc"],
          instructions: "",
          response_schema: "income_cashflow_expense",
        }),
      ).rejects.toBeInstanceOf(ConfigurationError);
      expect(mock).not.toHaveBeenCalled();
    });

    it("stops when the thread response has no id", async () => {
      const { calls, mock } = buildFetchMock([jsonResponse({ object: "thread" })]);
      const service = new AgentService(settings, store, mock);

      await expect(
        service.startAgentRun({
          file_ids: ["file_abc"],
          instructions: "",
          response_schema: "income_cashflow_expense",
        }),
      ).rejects.toThrow(
        new ProtocolError("OpenAI Threads API response did not include a thread id."),
      );
      expect(calls).toHaveLength(1);
    });

    it("surfaces a failed run creation with its status and body", async () => {
      const { mock } = buildFetchMock([
        jsonResponse({ id: "thread_1" }),
        new Response('{"error":"bad request"}', { status: 400 }),
      ]);
      const service = new AgentService(settings, store, mock);

      const err = await service
        .startAgentRun({
          file_ids: ["file_abc"],
          instructions: "",
          response_schema: "income_cashflow_expense",
        })
        .catch((e: unknown) => e);

      if (!(err instanceof UpstreamStatusError)) throw new Error("expected UpstreamStatusError");
      expect(err.upstreamStatus).toBe(400);
      expect(err.message).toBe('OpenAI Agents API error (400): {"error":"bad request"}');

      await store.drain();
      expect(readRuns()).toEqual([]);
    });

    it("rejects a run response without an id", async () => {
      const { mock } = buildFetchMock([
        jsonResponse({ id: "thread_1" }),
        jsonResponse({ status: "queued" }),
      ]);
      const service = new AgentService(settings, store, mock);

      await expect(
        service.startAgentRun({
          file_ids: ["file_abc"],
          instructions: "",
          response_schema: "income_cashflow_expense",
        }),
      ).rejects.toThrow(
        new ProtocolError("OpenAI Agents API response did not include a run id."),
      );
    });

    it("ignores a non-numeric created_at", async () => {
      const { mock } = buildFetchMock([
        jsonResponse({ id: "thread_1" }),
        jsonResponse({ id: "run_1", created_at: "yesterday" }),
      ]);
      const service = new AgentService(settings, store, mock);
      const before = Date.now();

      const result = await service.startAgentRun({
        file_ids: ["file_abc"],
        instructions: "",
        response_schema: "income_cashflow_expense",
      });

      expect(result.started_at.getTime()).toBeGreaterThanOrEqual(before);
    });

    it("falls back to now when created_at is out of the date range", async () => {
      const onWriteError = vi.fn();
      const guardedStore = new MetadataStore(databasePath, { onWriteError });
      const { mock } = buildFetchMock([
        jsonResponse({ id: "thread_1" }),
        jsonResponse({ id: "run_1", status: "queued", created_at: 1e20 }),
      ]);
      const service = new AgentService(settings, guardedStore, mock);
      const before = Date.now();

      const result = await service.startAgentRun({
        file_ids: ["file_abc"],
        instructions: "",
        response_schema: "income_cashflow_expense",
      });
      await guardedStore.drain();

      expect(Number.isNaN(result.started_at.getTime())).toBe(false);
      expect(result.started_at.getTime()).toBeGreaterThanOrEqual(before);
      expect(onWriteError).not.toHaveBeenCalled();
      const rows = readRuns();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        run_id: "run_1",
        started_at: result.started_at.toISOString(),
      });
    });
  });
});
