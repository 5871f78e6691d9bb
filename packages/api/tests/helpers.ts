import type { UploadSource } from "@statement-agents/utils";
import { vi } from "vitest";
import type { FetchLike } from "../src/services/openai.js";

export interface RecordedCall {
  url: string;
  init: RequestInit;
}

export function jsonResponse(data: unknown, status = 200) {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Replays the given responses in order and records every request it receives. */
export function buildFetchMock(responses: Array<Response | Error>) {
  const calls: RecordedCall[] = [];
  const queue = [...responses];

  const mock = vi.fn<FetchLike>(async (url, init) => {
    calls.push({ url, init });
    const next = queue.shift();
    if (!next) throw new Error(`Unexpected request to ${url}`);
    if (next instanceof Error) throw next;
    return next;
  });

  return { calls, mock };
}

export function jsonBody(call: RecordedCall): unknown {
  return JSON.parse(String(call.init.body));
}

export function uploadSource(name: string, type: string, content: string): UploadSource {
  const blob = new Blob([content], { type });
  return { name, type, arrayBuffer: () => blob.arrayBuffer() };
}
