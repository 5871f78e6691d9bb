import type { IncomingMessage, ServerResponse } from "node:http";
import { AppError, MAX_REQUEST_BODY_BYTES, PayloadTooLargeError } from "@statement-agents/utils";

export type FetchHandler = (request: Request) => Promise<Response>;

export interface RequestListenerOptions {
  /** Bodies past this size are refused with 413 before the handler runs. */
  maxBodyBytes?: number;
}

function tooLarge(limit: number) {
  return new PayloadTooLargeError(`Request body exceeds ${limit} bytes`);
}

// Stops collecting once the limit is passed. The socket stays open so the 413 can still be sent.
function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  const declared = Number(req.headers["content-length"]);
  if (Number.isFinite(declared) && declared > limit) {
    return Promise.reject(tooLarge(limit));
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    const onData = (chunk: Buffer) => {
      received += chunk.length;
      if (received > limit) {
        req.off("data", onData);
        req.pause();
        reject(tooLarge(limit));
        return;
      }
      chunks.push(chunk);
    };
    req.on("data", onData);
    req.once("end", () => resolve(Buffer.concat(chunks)));
    req.once("error", reject);
  });
}

export async function toRequest(
  req: IncomingMessage,
  maxBodyBytes = MAX_REQUEST_BODY_BYTES,
): Promise<Request> {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(key, item);
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }

  const method = req.method ?? "GET";
  const hasBody = method !== "GET" && method !== "HEAD";
  return new Request(url, {
    method,
    headers,
    body: hasBody ? await readBody(req, maxBodyBytes) : undefined,
  });
}

export async function writeResponse(res: ServerResponse, response: Response) {
  const body = Buffer.from(await response.arrayBuffer());
  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  res.setHeader("Content-Length", String(body.length));
  res.end(body);
}

async function respond(
  req: IncomingMessage,
  res: ServerResponse,
  handler: FetchHandler,
  maxBodyBytes: number,
) {
  let request: Request;
  try {
    request = await toRequest(req, maxBodyBytes);
  } catch (err) {
    if (!(err instanceof AppError)) throw err;
    // The rest of the body is never read, so the connection cannot be reused.
    res.setHeader("Connection", "close");
    const body = { error: { code: err.code, message: err.message } };
    await writeResponse(res, Response.json(body, { status: err.statusCode }));
    return;
  }
  await writeResponse(res, await handler(request));
}

/** Adapts a fetch-style handler to a `node:http` request listener. */
export function createRequestListener(handler: FetchHandler, options: RequestListenerOptions = {}) {
  const maxBodyBytes = options.maxBodyBytes ?? MAX_REQUEST_BODY_BYTES;

  return (req: IncomingMessage, res: ServerResponse) => {
    respond(req, res, handler, maxBodyBytes).catch((err: unknown) => {
      console.error("Request handling failed:", err);
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end();
    });
  };
}
