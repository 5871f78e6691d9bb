import { AppError, ValidationError } from "@statement-agents/utils";
import type { ApiContext } from "./context.js";
import { applyCorsHeaders, handlePreflight } from "./middleware/cors.js";
import * as health from "./routes/health.js";
import * as runs from "./routes/runs.js";
import * as uploads from "./routes/uploads.js";

type Handler = (request: Request, ctx: ApiContext, ...params: string[]) => Promise<Response>;

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

function route(method: string, path: string, handler: Handler): Route {
  const patternStr = path.replace(/:\w+/g, "([^/]+)");
  return {
    method,
    pattern: new RegExp(`^${patternStr}$`),
    handler,
  };
}

const routes: Route[] = [
  route("GET", "/health", health.getHealth),

  // Uploads
  route("POST", "/api/uploads", uploads.uploadFile),

  // Runs
  route("POST", "/api/runs", runs.createRun),
  route("PATCH", "/api/runs/:runId/status", runs.updateRunStatus),
];

function decodeParam(param: string): string {
  try {
    return decodeURIComponent(param);
  } catch {
    throw new ValidationError("Malformed path parameter");
  }
}

function errorResponse(err: unknown): Response {
  if (err instanceof AppError) {
    return Response.json(
      {
        error: {
          code: err.code,
          message: err.message,
          ...(err instanceof ValidationError && err.details ? { details: err.details } : {}),
        },
      },
      { status: err.statusCode },
    );
  }

  console.error("Unhandled API error:", err);
  return Response.json(
    { error: { code: "INTERNAL_ERROR", message: "Internal server error" } },
    { status: 500 },
  );
}

async function dispatch(request: Request, ctx: ApiContext): Promise<Response> {
  const path = new URL(request.url).pathname;

  for (const r of routes) {
    if (r.method !== request.method) continue;
    const match = path.match(r.pattern);
    if (!match) continue;

    try {
      const params = match.slice(1).map(decodeParam);
      return await r.handler(request, ctx, ...params);
    } catch (err) {
      return errorResponse(err);
    }
  }

  return Response.json(
    { error: { code: "NOT_FOUND", message: "API route not found" } },
    { status: 404 },
  );
}

export function createApiHandler(ctx: ApiContext) {
  const allowOrigins = ctx.settings.corsAllowOrigins;

  return async (request: Request): Promise<Response> => {
    const preflight = handlePreflight(request, allowOrigins);
    if (preflight) return preflight;

    const response = await dispatch(request, ctx);
    return applyCorsHeaders(request, response, allowOrigins);
  };
}
