import {
  ConnectivityError,
  OPENAI_BETA_HEADER,
  UPSTREAM_ERROR_BODY_LIMIT,
  UPSTREAM_TIMEOUT_MS,
  UpstreamStatusError,
} from "@statement-agents/utils";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface OpenAIClientOptions {
  apiKey: string;
  baseUrl: string;
  fetchImplementation?: FetchLike;
  timeoutMs?: number;
}

/**
 * Thin wrapper around the provider's REST API. One attempt per call: a non-2xx status becomes
 * `UpstreamStatusError`, a transport failure becomes `ConnectivityError`.
 */
export class OpenAIClient {
  private fetchImplementation: FetchLike;
  private timeoutMs: number;

  constructor(private options: OpenAIClientOptions) {
    this.fetchImplementation = options.fetchImplementation ?? fetch;
    this.timeoutMs = options.timeoutMs ?? UPSTREAM_TIMEOUT_MS;
  }

  postForm(path: string, form: FormData, service: string): Promise<unknown> {
    return this.send(path, { method: "POST", body: form }, service);
  }

  postJson(path: string, body: unknown, service: string): Promise<unknown> {
    return this.send(
      path,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      },
      service,
    );
  }

  private async send(path: string, init: RequestInit, service: string): Promise<unknown> {
    const headers = new Headers(init.headers);
    headers.set("Authorization", `Bearer ${this.options.apiKey}`);
    headers.set("OpenAI-Beta", OPENAI_BETA_HEADER);

    let res: Response;
    try {
      res = await this.fetchImplementation(`${this.options.baseUrl}${path}`, {
        ...init,
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      console.error(`Failed to reach ${service}:`, err);
      throw new ConnectivityError(service, describeTransportError(err));
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      const body = text.slice(0, UPSTREAM_ERROR_BODY_LIMIT);
      console.error(`${service} error (${res.status}): ${body}`);
      throw new UpstreamStatusError(service, res.status, body);
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      console.error(`Failed to read ${service} response:`, err);
      throw new ConnectivityError(service, describeTransportError(err));
    }

    try {
      return JSON.parse(text);
    } catch {
      // Non-JSON bodies surface as a missing id in the caller.
      return null;
    }
  }
}

function describeTransportError(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === "TimeoutError") return "request timed out";
    const cause = err.cause instanceof Error ? err.cause.message : null;
    return cause ? `${err.message} (${cause})` : err.message;
  }
  return String(err);
}
