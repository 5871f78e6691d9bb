const ALLOWED_METHODS = "GET, POST, PATCH, OPTIONS";
const PREFLIGHT_MAX_AGE_SECONDS = 600;

function allowedOrigin(request: Request, allowOrigins: string[]): string | null {
  const origin = request.headers.get("origin");
  if (!origin) return null;
  return allowOrigins.includes("*") || allowOrigins.includes(origin) ? origin : null;
}

/** Answers a CORS preflight. Returns null when the request is not one. */
export function handlePreflight(request: Request, allowOrigins: string[]): Response | null {
  if (request.method !== "OPTIONS" || !request.headers.has("access-control-request-method")) {
    return null;
  }
  const origin = allowedOrigin(request, allowOrigins);
  if (!origin) {
    return new Response(null, { status: 403 });
  }
  return new Response(null, {
    status: 204,
    headers: {
      "Access-Control-Allow-Origin": origin,
      "Access-Control-Allow-Credentials": "true",
      "Access-Control-Allow-Methods": ALLOWED_METHODS,
      "Access-Control-Allow-Headers":
        request.headers.get("access-control-request-headers") ?? "Content-Type",
      "Access-Control-Max-Age": String(PREFLIGHT_MAX_AGE_SECONDS),
      Vary: "Origin",
    },
  });
}

export function applyCorsHeaders(request: Request, response: Response, allowOrigins: string[]) {
  const origin = allowedOrigin(request, allowOrigins);
  if (!origin) return response;
  response.headers.set("Access-Control-Allow-Origin", origin);
  response.headers.set("Access-Control-Allow-Credentials", "true");
  response.headers.append("Vary", "Origin");
  return response;
}
